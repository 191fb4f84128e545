import { Account } from '../../types/account.types';
import { Booking } from '../../types/booking.types';
import { Resource } from '../../types/resource.types';
import { ProvisioningAttempt } from '../../types/provisioning.types';
import { SortedMap } from '../../utils/sorted-map';

// Ledger and boundary index of one resource; always mutated together
export interface BookingCollection {
  byId: Map<bigint, Booking>;
  startsByTime: SortedMap<bigint>;
  endsByTime: SortedMap<bigint>;
}

/**
 * In-process storage substrate
 *
 * One collection per concern, each in its own namespace. Mutations happen
 * synchronously inside a single repository call, so no caller can observe
 * a half-applied write.
 */
export class MemoryStore {
  readonly accounts = new Map<string, Account>();
  readonly resources = new Map<string, Resource>();
  readonly bookings = new Map<string, BookingCollection>();
  readonly factoryOwners = new Map<string, string>();
  readonly provisionedNames = new Set<string>();
  readonly provisioningAttempts = new Map<string, ProvisioningAttempt>();

  bookingsOf(resourceId: string): BookingCollection {
    let collection = this.bookings.get(resourceId);
    if (!collection) {
      collection = {
        byId: new Map(),
        startsByTime: new SortedMap(),
        endsByTime: new SortedMap(),
      };
      this.bookings.set(resourceId, collection);
    }
    return collection;
  }
}
