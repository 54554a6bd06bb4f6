import {
  HttpStatus,
  INestApplication,
  UnprocessableEntityException,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CatalogExceptionFilter } from './common/filters/catalog-exception.filter';

const DEFAULT_PATH_PREFIX = 'api';

/** Collects nested class-validator messages as "path: message" strings. */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

/** Global prefix, validation and error mapping; shared by main.ts and the HTTP tests. */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);
  app.setGlobalPrefix(configService.get<string>('API_PATH_PREFIX') || DEFAULT_PATH_PREFIX);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      exceptionFactory: (errors) => new UnprocessableEntityException(flattenValidationErrors(errors)),
    }),
  );
  app.useGlobalFilters(new CatalogExceptionFilter());
}
