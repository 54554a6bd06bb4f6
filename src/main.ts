import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
    bufferLogs: true,
  });

  const logger = new Logger('Bootstrap');

  configureApp(app);
  app.enableCors();

  const portEnv = process.env.PORT;
  let port = 3000;
  if (portEnv) {
    const parsedPort = parseInt(portEnv, 10);
    if (isNaN(parsedPort)) {
      logger.warn(`Invalid PORT environment variable: "${portEnv}". Defaulting to port ${port}.`);
    } else {
      port = parsedPort;
    }
  } else {
    logger.log(`PORT environment variable not set. Defaulting to port ${port}.`);
  }

  const host = '0.0.0.0';

  await app.listen(port, host);

  logger.log(`Application is listening on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`, error instanceof Error ? error.stack : undefined);
  process.exit(1);
});
