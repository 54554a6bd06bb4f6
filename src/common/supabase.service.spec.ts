import { InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';

describe('SupabaseService', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('refuses to hand out a client before initialization', () => {
    const service = new SupabaseService(new ConfigService({}));

    expect(() => service.getClient()).toThrow(InternalServerErrorException);
  });

  it('fails initialization without a url or key', async () => {
    const service = new SupabaseService(new ConfigService({ SUPABASE_URL: 'http://localhost:54321' }));

    await expect(service.initialize()).rejects.toThrow(
      new InternalServerErrorException('Supabase config missing for client initialization.'),
    );
  });
});
