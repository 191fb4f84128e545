import { ResourceRepository } from '../resource.repository';
import {
  DeployedResource,
  InitializedResource,
  Resource,
  ResourceInitParams,
  ResourceStatus,
} from '../../types/resource.types';
import { AppError, ErrorCode } from '../../types/error.types';
import { throwIfAborted } from '../../utils/abort';
import { MemoryStore } from './memory-store';

const copyParams = (params: ResourceInitParams): ResourceInitParams => ({
  ...params,
  coordinates: [params.coordinates[0], params.coordinates[1]],
  imageUrls: [...params.imageUrls],
  tags: [...params.tags],
  pricing: { ...params.pricing },
});

const copyResource = (resource: Resource): Resource =>
  resource.status === ResourceStatus.INITIALIZED ? { ...resource, params: copyParams(resource.params) } : { ...resource };

export class InMemoryResourceRepository implements ResourceRepository {
  constructor(private store: MemoryStore) {}

  async findByAccountId(accountId: string): Promise<Resource | null> {
    const resource = this.store.resources.get(accountId);
    return resource ? copyResource(resource) : null;
  }

  async deploy(accountId: string, signal?: AbortSignal): Promise<DeployedResource> {
    throwIfAborted(signal);
    if (this.store.resources.has(accountId)) {
      throw new AppError(ErrorCode.ACCOUNT_EXISTS, `Code already deployed to ${accountId}`, 409, { accountId });
    }
    const resource: DeployedResource = { status: ResourceStatus.DEPLOYED, accountId, deployedAt: new Date() };
    this.store.resources.set(accountId, resource);
    return { ...resource };
  }

  async initialize(
    accountId: string,
    params: ResourceInitParams,
    signal?: AbortSignal
  ): Promise<InitializedResource | null> {
    throwIfAborted(signal);
    const existing = this.store.resources.get(accountId);
    if (!existing || existing.status !== ResourceStatus.DEPLOYED) {
      return null;
    }
    const resource: InitializedResource = {
      status: ResourceStatus.INITIALIZED,
      accountId,
      params: copyParams(params),
      nextBookingId: 1n,
      deployedAt: existing.deployedAt,
      initializedAt: new Date(),
    };
    this.store.resources.set(accountId, resource);
    return { ...resource, params: copyParams(resource.params) };
  }

  async remove(accountId: string): Promise<void> {
    this.store.resources.delete(accountId);
    this.store.bookings.delete(accountId);
  }
}
