import { Module, NestModule, MiddlewareConsumer, RequestMethod } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { APP_GUARD } from '@nestjs/core';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { ProductsModule } from './products/products.module';
import { CategoriesModule } from './categories/categories.module';
import { BrandsModule } from './brands/brands.module';
import { DummyModule } from './dummy/dummy.module';
import { RequestLoggerMiddleware } from './common/middleware/request-logger.middleware';

const DEFAULT_THROTTLE_TTL_MS = 60000;
const DEFAULT_THROTTLE_LIMIT = 60;

function readInt(configService: ConfigService, key: string, fallback: number): number {
  const parsed = parseInt(configService.get<string>(key) ?? '', 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    EventEmitterModule.forRoot({ wildcard: true, delimiter: '.' }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: readInt(configService, 'THROTTLE_TTL_MS', DEFAULT_THROTTLE_TTL_MS),
          limit: readInt(configService, 'THROTTLE_LIMIT', DEFAULT_THROTTLE_LIMIT),
        },
      ],
    }),
    CommonModule,
    ProductsModule,
    CategoriesModule,
    BrandsModule,
    DummyModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
