import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { CatalogEvent } from './catalog-events.service';

@Injectable()
export class CatalogEventLogListener {
  private readonly logger = new Logger('CatalogEvents');

  @OnEvent('product.*')
  @OnEvent('category.*')
  @OnEvent('brand.*')
  @OnEvent('dummy.*')
  handleCatalogEvent(event: CatalogEvent): void {
    this.logger.log(`EVENT PUBLISHED: ${event.eventType} - ${JSON.stringify(event)}`);
  }
}
