import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { Container } from '../src/container';
import { createReadyResource, createTestContainer } from './helpers/fixtures';

/**
 * Many consumers race for the same slot over HTTP. Exactly one booking may
 * commit; every other caller gets a collision and keeps its deposit.
 */

const ROOM = 'room.test';
const CONCURRENT_REQUESTS = 50;
const PRICE = 7200000n;

describe('Concurrent bookings', () => {
  let container: Container;
  let app: Application;
  const consumers = Array.from({ length: CONCURRENT_REQUESTS }, (_, i) => `consumer-${i}.test`);

  beforeAll(async () => {
    ({ container } = createTestContainer());
    await createReadyResource(container, ROOM);
    for (const consumer of consumers) {
      await container.accountService.openAccount(consumer, PRICE);
    }
    app = createApp(container);
  });

  it('commits exactly one of many simultaneous requests for the same interval', async () => {
    const responses = await Promise.all(
      consumers.map((consumer) =>
        request(app)
          .post(`/v1/resources/${ROOM}/bookings`)
          .set('X-Account-Id', consumer)
          .set('X-Attached-Deposit', PRICE.toString())
          .send({ begin: 0, end: 7200000 })
      )
    );

    const created = responses.filter((r) => r.status === 201);
    const collisions = responses.filter((r) => r.status === 409);
    expect(created).toHaveLength(1);
    expect(collisions).toHaveLength(CONCURRENT_REQUESTS - 1);
    for (const response of collisions) {
      expect(response.body.error.code).toBe('BOOKING_COLLISION');
    }

    const winner: string = created[0]?.body.data.consumer_id;
    for (const consumer of consumers) {
      const { balance } = await container.accountService.getAccount(consumer);
      expect(balance).toBe(consumer === winner ? 0n : PRICE);
    }
    expect((await container.accountService.getAccount(ROOM)).balance).toBe(PRICE);
  });

  it('commits every request for pairwise disjoint intervals', async () => {
    const hour = 3600000;
    const hourly = Array.from({ length: 10 }, (_, i) => `hourly-${i}.test`);
    for (const consumer of hourly) {
      await container.accountService.openAccount(consumer, BigInt(hour));
    }

    const responses = await Promise.all(
      hourly.map((consumer, i) =>
        request(app)
          .post(`/v1/resources/${ROOM}/bookings`)
          .set('X-Account-Id', consumer)
          .set('X-Attached-Deposit', String(hour))
          .send({ begin: (10 + i) * hour, end: (11 + i) * hour })
      )
    );

    expect(responses.map((r) => r.status)).toEqual(hourly.map(() => 201));

    const ledger = await container.bookingService.listBookings(ROOM, { limit: 500, offset: 0 });
    expect(ledger).toHaveLength(11);
    expect(new Set(ledger.map((b) => b.id)).size).toBe(11);
    expect(ledger.map((b) => b.id).sort((a, b) => (a < b ? -1 : 1))[10]).toBe(11n);
  });
});
