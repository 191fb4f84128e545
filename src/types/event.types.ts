import { ResourceInitParamsDto } from './resource.types';

/**
 * Observability events for off-system indexers
 *
 * Payloads are in wire format (decimal-string amounts) because they are
 * serialized as soon as they are published.
 */

export const EVENT_STANDARD = 'slot-booking';
export const EVENT_VERSION = '1.0.0';

export interface ResourceCreationEvent {
  event: 'resource_creation';
  data: {
    name: string;
    resource_account_id: string;
    owner_id: string;
    init_params: ResourceInitParamsDto;
  };
}

export interface ResourceCreationFailureEvent {
  event: 'resource_creation_failure';
  data: {
    name: string;
    owner_id: string;
    creator_id: string;
    reason: string;
    refunded: string;
  };
}

export interface BookingCreationEvent {
  event: 'booking_creation';
  data: {
    resource_id: string;
    id: string;
    booker_id: string;
    start: number;
    end: number;
    price: string;
  };
}

export interface BookingCancellationEvent {
  event: 'booking_cancellation';
  data: {
    resource_id: string;
    id: string;
    booker_id: string;
    refunded: string;
  };
}

export type ServiceEvent =
  | ResourceCreationEvent
  | ResourceCreationFailureEvent
  | BookingCreationEvent
  | BookingCancellationEvent;

export interface EventEnvelope {
  standard: typeof EVENT_STANDARD;
  version: typeof EVENT_VERSION;
  event: ServiceEvent['event'];
  data: ServiceEvent['data'];
}
