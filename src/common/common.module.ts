import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { CatalogSettings } from './catalog-settings.service';
import { CatalogEventsService } from './events/catalog-events.service';
import { CatalogEventLogListener } from './events/catalog-event-log.listener';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    CatalogSettings,
    CatalogEventsService,
    CatalogEventLogListener,
    {
      provide: SupabaseService,
      useFactory: async (configService: ConfigService) => {
        const service = new SupabaseService(configService);
        await service.initialize();
        return service;
      },
      inject: [ConfigService],
    },
  ],
  exports: [SupabaseService, CatalogSettings, CatalogEventsService],
})
export class CommonModule {}
