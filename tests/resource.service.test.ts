import { Container } from '../src/container';
import { ErrorCode } from '../src/types/error.types';
import { ResourceStatus } from '../src/types/resource.types';
import { createReadyResource, createTestContainer, decayingRent, sampleInitParams } from './helpers/fixtures';

describe('ResourceService', () => {
  let container: Container;

  beforeEach(() => {
    ({ container } = createTestContainer());
  });

  it('reads back exactly the parameters it was initialized with', async () => {
    const params = sampleInitParams({
      title: 'Studio B',
      description: 'Sound-proofed, 20 m²',
      contact: '+49 30 0000000',
      minDurationMs: 900000,
      imageUrls: ['https://example.com/b1.png', 'https://example.com/b2.png'],
      tags: ['audio', 'recording'],
      pricing: decayingRent(500n, 2n, 86400000),
    });
    await createReadyResource(container, 'studio.test', params);

    const resource = await container.resourceService.getInitializedResource('studio.test');

    expect(resource.params).toEqual(params);
    expect(resource.nextBookingId).toBe(1n);
  });

  it('initializes only once', async () => {
    const original = sampleInitParams();
    await createReadyResource(container, 'room.test', original);

    await expect(
      container.resourceService.initialize('room.test', sampleInitParams({ title: 'Replaced' }))
    ).rejects.toMatchObject({ code: ErrorCode.ALREADY_INITIALIZED, statusCode: 409 });

    const resource = await container.resourceService.getInitializedResource('room.test');
    expect(resource.params.title).toBe(original.title);
  });

  it('reports a deployed resource as not yet initialized', async () => {
    await container.resourceService.deploy('bare.test');

    await expect(container.resourceService.getResource('bare.test')).resolves.toMatchObject({
      status: ResourceStatus.DEPLOYED,
      accountId: 'bare.test',
    });
    await expect(container.resourceService.getInitializedResource('bare.test')).rejects.toMatchObject({
      code: ErrorCode.NOT_INITIALIZED,
    });
  });

  it('cannot initialize a resource that was never deployed', async () => {
    await expect(container.resourceService.initialize('ghost.test', sampleInitParams())).rejects.toMatchObject({
      code: ErrorCode.RESOURCE_NOT_FOUND,
      statusCode: 404,
    });
  });

  it('rejects invalid parameters before touching state', async () => {
    await container.resourceService.deploy('bare.test');

    await expect(
      container.resourceService.initialize('bare.test', sampleInitParams({ title: '   ', minDurationMs: -1 }))
    ).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      details: { errors: ['title must not be empty', 'min_duration_ms must be a non-negative integer'] },
    });
    await expect(container.resourceService.getResource('bare.test')).resolves.toMatchObject({
      status: ResourceStatus.DEPLOYED,
    });
  });

  it('removes a resource together with its bookings', async () => {
    await createReadyResource(container, 'room.test', sampleInitParams({ minDurationMs: 0, pricing: decayingRent(0n, 0n, 0) }));
    await container.bookingService.book(
      { callerId: 'room.test', attachedDeposit: 0n },
      { resourceId: 'room.test', interval: { begin: 0, end: 10 } }
    );

    await container.resourceService.undeploy('room.test');

    await expect(container.resourceService.getResource('room.test')).rejects.toMatchObject({
      code: ErrorCode.RESOURCE_NOT_FOUND,
    });
    await expect(container.bookingService.getBooking('room.test', 1n)).rejects.toMatchObject({
      code: ErrorCode.BOOKING_NOT_FOUND,
    });
  });

  describe('initializer access', () => {
    it('refuses callers other than the resource and its parent account', async () => {
      await container.resourceService.deploy('room.rooms.test');

      await expect(
        container.resourceService.initializeAs(
          { callerId: 'stranger.test', attachedDeposit: 0n },
          'room.rooms.test',
          sampleInitParams({ title: 'Taken over' })
        )
      ).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        statusCode: 403,
        details: { callerId: 'stranger.test' },
      });
      await expect(container.resourceService.getResource('room.rooms.test')).resolves.toMatchObject({
        status: ResourceStatus.DEPLOYED,
      });
    });

    it('lets the parent account initialize', async () => {
      await container.resourceService.deploy('room.rooms.test');

      const resource = await container.resourceService.initializeAs(
        { callerId: 'rooms.test', attachedDeposit: 0n },
        'room.rooms.test',
        sampleInitParams()
      );

      expect(resource.status).toBe(ResourceStatus.INITIALIZED);
      expect(resource.params.title).toBe('Meeting room 4');
    });

    it('lets the resource account initialize itself', async () => {
      await container.resourceService.deploy('room.rooms.test');

      await expect(
        container.resourceService.initializeAs(
          { callerId: 'room.rooms.test', attachedDeposit: 0n },
          'room.rooms.test',
          sampleInitParams()
        )
      ).resolves.toMatchObject({ status: ResourceStatus.INITIALIZED });
    });
  });

  describe('deployAndInitialize', () => {
    it('deploys and initializes in one call', async () => {
      const resource = await container.resourceService.deployAndInitialize('room.test', sampleInitParams());

      expect(resource.status).toBe(ResourceStatus.INITIALIZED);
      await expect(container.resourceService.getInitializedResource('room.test')).resolves.toMatchObject({
        accountId: 'room.test',
      });
    });

    it('removes the deployment when the initializer fails', async () => {
      jest.spyOn(container.repositories.resources, 'initialize').mockRejectedValueOnce(new Error('write failed'));

      await expect(container.resourceService.deployAndInitialize('room.test', sampleInitParams())).rejects.toThrow(
        'write failed'
      );
      await expect(container.resourceService.getResource('room.test')).rejects.toMatchObject({
        code: ErrorCode.RESOURCE_NOT_FOUND,
      });
    });

    it('deploys nothing when the parameters are invalid', async () => {
      await expect(
        container.resourceService.deployAndInitialize('room.test', sampleInitParams({ title: '' }))
      ).rejects.toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
      await expect(container.resourceService.getResource('room.test')).rejects.toMatchObject({
        code: ErrorCode.RESOURCE_NOT_FOUND,
      });
    });
  });
});
