import { EVENT_STANDARD, EVENT_VERSION, EventEnvelope, ServiceEvent } from '../types/event.types';
import { logger } from '../config/logger';

/**
 * Event publication for off-system indexers. Append-only; nothing in this
 * service reads events back.
 */
export interface EventPublisher {
  publish(event: ServiceEvent): void;
}

export const EVENT_LOG_PREFIX = 'EVENT_JSON:';

export function toEnvelope(event: ServiceEvent): EventEnvelope {
  return {
    standard: EVENT_STANDARD,
    version: EVENT_VERSION,
    event: event.event,
    data: event.data,
  };
}

// One log line per event: EVENT_JSON:{"standard":...,"version":...,"event":...,"data":...}
export class LogEventPublisher implements EventPublisher {
  private eventLogger = logger.child({ component: 'events' });

  publish(event: ServiceEvent): void {
    this.eventLogger.info(`${EVENT_LOG_PREFIX}${JSON.stringify(toEnvelope(event))}`);
  }
}
