import { Injectable, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from '@supabase/supabase-js';

const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/** Client bound to the schema named by `SUPABASE_DB_SCHEMA`. */
export type CatalogSupabaseClient = ReturnType<typeof createCatalogClient>;

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private _supabase?: CatalogSupabaseClient;
  private initializationPromise: Promise<void> | null = null;

  constructor(private configService: ConfigService) {}

  async initialize(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = (async () => {
      this.logger.log('SupabaseService initialize() - Initializing client...');
      const supabaseUrl = this.configService.get<string>('SUPABASE_URL');
      // The catalog is a trusted backend: prefer the service role key, fall back to anon (subject to RLS).
      const serviceKey = this.configService.get<string>('SUPABASE_SERVICE_ROLE_KEY');
      const anonKey = this.configService.get<string>('SUPABASE_ANON_KEY');
      const key = serviceKey || anonKey;

      if (!supabaseUrl || !key) {
        this.logger.error('SUPABASE_URL or a Supabase key is missing in config! Supabase client NOT initialized.');
        throw new InternalServerErrorException('Supabase config missing for client initialization.');
      }
      if (!serviceKey) {
        this.logger.warn('SUPABASE_SERVICE_ROLE_KEY missing in config! Using anon key; writes may be rejected by RLS.');
      }

      const schema = this.configService.get<string>('SUPABASE_DB_SCHEMA') || 'public';
      const timeoutMs = this.getRequestTimeoutMs();

      try {
        this._supabase = createCatalogClient(supabaseUrl, key, schema, timeoutMs);
        this.logger.log(`Supabase client initialized (schema: ${schema}, request timeout: ${timeoutMs}ms).`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to initialize Supabase client: ${message}`, error instanceof Error ? error.stack : undefined);
        throw new InternalServerErrorException('Failed to initialize Supabase client.');
      }
    })();

    return this.initializationPromise;
  }

  getClient(): CatalogSupabaseClient {
    if (!this._supabase) {
      this.logger.error('Attempted to get Supabase client, but it is not initialized. This may indicate an issue with the async provider setup.');
      throw new InternalServerErrorException('Supabase client is not available. Initialization might have failed or is not complete.');
    }
    return this._supabase;
  }

  private getRequestTimeoutMs(): number {
    const raw = this.configService.get<string>('SUPABASE_REQUEST_TIMEOUT_MS');
    const parsed = raw ? parseInt(raw, 10) : NaN;
    if (isNaN(parsed) || parsed <= 0) {
      return DEFAULT_REQUEST_TIMEOUT_MS;
    }
    return parsed;
  }
}

function createCatalogClient(supabaseUrl: string, key: string, schema: string, timeoutMs: number) {
  return createClient(supabaseUrl, key, {
    db: { schema },
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: createTimeoutFetch(timeoutMs) },
  });
}

/**
 * Wraps the global fetch so every PostgREST call is aborted after `timeoutMs`,
 * unless the caller already supplied its own signal.
 */
export function createTimeoutFetch(timeoutMs: number): typeof fetch {
  return (input, init) => {
    if (init?.signal) {
      return fetch(input, init);
    }
    return fetch(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  };
}
