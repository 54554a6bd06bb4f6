import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_PAGE_SIZE } from './dto/pagination-query.dto';
import { PageRequest } from './types/page';

const DEFAULT_MAX_PAGE_SIZE = 100;
const DEFAULT_SLUG_MAX_ATTEMPTS = 10;
const DEFAULT_CURRENCY = 'USD';

/** Typed view over the catalog's environment settings. */
@Injectable()
export class CatalogSettings {
  private readonly logger = new Logger(CatalogSettings.name);

  readonly maxPageSize: number;
  readonly slugMaxAttempts: number;
  readonly defaultCurrency: string;

  constructor(configService: ConfigService) {
    this.maxPageSize = this.readPositiveInt(configService, 'CATALOG_MAX_PAGE_SIZE', DEFAULT_MAX_PAGE_SIZE);
    this.slugMaxAttempts = this.readPositiveInt(configService, 'CATALOG_SLUG_MAX_ATTEMPTS', DEFAULT_SLUG_MAX_ATTEMPTS);
    const currency = configService.get<string>('CATALOG_DEFAULT_CURRENCY');
    this.defaultCurrency = currency && /^[A-Z]{3}$/.test(currency) ? currency : DEFAULT_CURRENCY;
  }

  /** Applies the default page size and clamps `limit` to the configured maximum. */
  pageRequest(limit?: number, offset?: number): PageRequest {
    return {
      limit: Math.min(limit ?? DEFAULT_PAGE_SIZE, this.maxPageSize),
      offset: offset ?? 0,
    };
  }

  private readPositiveInt(configService: ConfigService, key: string, fallback: number): number {
    const raw = configService.get<string>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed) || parsed <= 0) {
      this.logger.warn(`Invalid ${key} value: "${raw}". Defaulting to ${fallback}.`);
      return fallback;
    }
    return parsed;
  }
}
