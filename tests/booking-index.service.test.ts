import { BookingIndexService } from '../src/services/booking-index.service';
import { MemoryStore } from '../src/repositories/memory/memory-store';
import { InMemoryBookingRepository } from '../src/repositories/memory/booking.repository';
import { InMemoryResourceRepository } from '../src/repositories/memory/resource.repository';
import { ErrorCode } from '../src/types/error.types';
import { sampleInitParams } from './helpers/fixtures';

const RESOURCE = 'room.test';

describe('BookingIndexService', () => {
  let store: MemoryStore;
  let bookings: InMemoryBookingRepository;
  let index: BookingIndexService;

  beforeEach(async () => {
    store = new MemoryStore();
    const resources = new InMemoryResourceRepository(store);
    await resources.deploy(RESOURCE);
    await resources.initialize(RESOURCE, sampleInitParams({ minDurationMs: 0 }));

    bookings = new InMemoryBookingRepository(store);
    index = new BookingIndexService(bookings);

    await bookings.commit({
      resourceId: RESOURCE,
      interval: { begin: 100, end: 200 },
      consumerId: 'alice.test',
      priceCharged: 100n,
    });
  });

  it.each([
    ['adjacent after', 200, 300],
    ['adjacent before', 0, 100],
    ['far after', 500, 600],
  ])('accepts an interval %s an existing booking', async (_label, begin, end) => {
    await expect(index.checkNoCollision(RESOURCE, { begin, end })).resolves.toBeUndefined();
  });

  it.each([
    ['overlapping its end', 150, 250],
    ['overlapping its start', 50, 150],
    ['inside it', 120, 180],
    ['containing it', 50, 250],
    ['equal to it', 100, 200],
  ])('rejects an interval %s', async (_label, begin, end) => {
    await expect(index.checkNoCollision(RESOURCE, { begin, end })).rejects.toMatchObject({
      code: ErrorCode.BOOKING_COLLISION,
      statusCode: 409,
      details: { begin, end, conflictingBookingId: '1' },
    });
  });

  it('fits an interval exactly between two bookings', async () => {
    await bookings.commit({
      resourceId: RESOURCE,
      interval: { begin: 300, end: 400 },
      consumerId: 'alice.test',
      priceCharged: 100n,
    });

    await expect(index.checkNoCollision(RESOURCE, { begin: 200, end: 300 })).resolves.toBeUndefined();
    await expect(index.checkNoCollision(RESOURCE, { begin: 199, end: 300 })).rejects.toMatchObject({
      details: { conflictingBookingId: '1' },
    });
    await expect(index.checkNoCollision(RESOURCE, { begin: 200, end: 301 })).rejects.toMatchObject({
      details: { conflictingBookingId: '2' },
    });
  });

  it('ignores bookings of other resources', async () => {
    await expect(index.checkNoCollision('other.test', { begin: 100, end: 200 })).resolves.toBeUndefined();
  });

  it('fails loudly when the index points at a missing ledger record', async () => {
    store.bookingsOf(RESOURCE).byId.delete(1n);

    await expect(index.checkNoCollision(RESOURCE, { begin: 150, end: 250 })).rejects.toMatchObject({
      code: ErrorCode.INTERNAL_ERROR,
    });
  });
});
