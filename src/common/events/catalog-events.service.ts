import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';

export type CatalogEntity = 'product' | 'category' | 'brand' | 'dummy';
export type CatalogAction = 'created' | 'updated' | 'deleted';
export type CatalogEventType = `${CatalogEntity}.${CatalogAction}`;

export interface CatalogEvent {
  eventId: string;
  eventType: CatalogEventType;
  aggregateId: string;
  occurredOn: string;
  data: Record<string, unknown>;
  previousData?: Record<string, unknown>;
}

/**
 * Fire-and-forget publication of catalog changes. Nothing consumes these
 * beyond CatalogEventLogListener; delivery is not guaranteed.
 */
@Injectable()
export class CatalogEventsService {
  private readonly logger = new Logger(CatalogEventsService.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(
    eventType: CatalogEventType,
    aggregateId: string | number,
    data: Record<string, unknown>,
    previousData?: Record<string, unknown>,
  ): CatalogEvent {
    const event: CatalogEvent = {
      eventId: uuidv4(),
      eventType,
      aggregateId: String(aggregateId),
      occurredOn: new Date().toISOString(),
      data,
      ...(previousData ? { previousData } : {}),
    };
    this.logger.debug(`Emitting ${eventType} for ${event.aggregateId}`);
    this.eventEmitter.emit(eventType, event);
    return event;
  }
}
