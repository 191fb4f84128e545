import { ResourceRepository } from '../repositories/resource.repository';
import {
  DeployedResource,
  InitializedResource,
  Resource,
  ResourceInitParams,
  ResourceStatus,
} from '../types/resource.types';
import { PricingPolicyType } from '../types/pricing.types';
import { CallContext } from '../types/account.types';
import { AppError, ErrorCode } from '../types/error.types';
import { CallQueue } from '../utils/call-queue';
import { parentAccountId } from '../utils/account-id';
import { logger } from '../config/logger';

/**
 * Resource Service
 *
 * Lifecycle of a resource aggregate: code deployment, the one-time
 * initializer and lookups. Writes to one resource are serialized on its
 * account id.
 */
export class ResourceService {
  constructor(
    private resourceRepo: ResourceRepository,
    private callQueue: CallQueue
  ) {}

  async getResource(accountId: string): Promise<Resource> {
    const resource = await this.resourceRepo.findByAccountId(accountId);
    if (!resource) {
      throw new AppError(ErrorCode.RESOURCE_NOT_FOUND, `Resource ${accountId} not found`, 404);
    }
    return resource;
  }

  async getInitializedResource(accountId: string): Promise<InitializedResource> {
    const resource = await this.getResource(accountId);
    if (resource.status !== ResourceStatus.INITIALIZED) {
      throw new AppError(ErrorCode.NOT_INITIALIZED, `Resource ${accountId} is not initialized`, 409);
    }
    return resource;
  }

  async deploy(accountId: string): Promise<DeployedResource> {
    return this.callQueue.run(accountId, async () => {
      const resource = await this.resourceRepo.deploy(accountId);
      logger.info('Resource code deployed', { accountId });
      return resource;
    });
  }

  async undeploy(accountId: string): Promise<void> {
    await this.callQueue.run(accountId, () => this.resourceRepo.remove(accountId));
  }

  /**
   * Deploy code and run the initializer as one call on the resource
   *
   * Nothing else queued on the account can observe the deployed but
   * uninitialized state. If the initializer fails the deployment is removed
   * before the slot is released.
   */
  async deployAndInitialize(
    accountId: string,
    params: ResourceInitParams,
    signal?: AbortSignal
  ): Promise<InitializedResource> {
    validateInitParams(params);

    return this.callQueue.run(accountId, async () => {
      await this.resourceRepo.deploy(accountId, signal);
      logger.info('Resource code deployed', { accountId });

      try {
        return await this.initializeDeployed(accountId, params, signal);
      } catch (error) {
        await this.resourceRepo.remove(accountId);
        throw error;
      }
    });
  }

  /**
   * Initialize a deployed resource (once)
   *
   * Business rules:
   * - The resource must have been deployed
   * - A second call fails with ALREADY_INITIALIZED and changes nothing
   */
  async initialize(accountId: string, params: ResourceInitParams): Promise<InitializedResource> {
    validateInitParams(params);
    return this.callQueue.run(accountId, () => this.initializeDeployed(accountId, params));
  }

  /**
   * Initializer as called from outside
   *
   * Only the resource account itself or the parent account that created it
   * may initialize it.
   */
  async initializeAs(ctx: CallContext, accountId: string, params: ResourceInitParams): Promise<InitializedResource> {
    if (ctx.callerId !== accountId && ctx.callerId !== parentAccountId(accountId)) {
      throw new AppError(
        ErrorCode.UNAUTHORIZED,
        `Only ${accountId} or its parent account can initialize it`,
        403,
        { callerId: ctx.callerId }
      );
    }
    return this.initialize(accountId, params);
  }

  private async initializeDeployed(
    accountId: string,
    params: ResourceInitParams,
    signal?: AbortSignal
  ): Promise<InitializedResource> {
    const existing = await this.getResource(accountId);
    if (existing.status === ResourceStatus.INITIALIZED) {
      throw new AppError(ErrorCode.ALREADY_INITIALIZED, `Resource ${accountId} is already initialized`, 409);
    }

    const initialized = await this.resourceRepo.initialize(accountId, params, signal);
    if (!initialized) {
      throw new AppError(ErrorCode.ALREADY_INITIALIZED, `Resource ${accountId} is already initialized`, 409);
    }

    logger.info('Resource initialized', {
      accountId,
      title: params.title,
      pricing: params.pricing.type,
      minDurationMs: params.minDurationMs,
    });
    return initialized;
  }
}

const isNonNegativeSafeInteger = (value: number): boolean => Number.isSafeInteger(value) && value >= 0;

function validateInitParams(params: ResourceInitParams): void {
  const problems: string[] = [];

  if (params.title.trim().length === 0) problems.push('title must not be empty');
  if (!isNonNegativeSafeInteger(params.minDurationMs)) problems.push('min_duration_ms must be a non-negative integer');
  if (!params.coordinates.every(Number.isFinite)) problems.push('coordinates must be finite numbers');

  switch (params.pricing.type) {
    case PricingPolicyType.FLAT_RENT:
      break;
    case PricingPolicyType.DECAYING_REFUND_RENT:
      if (!isNonNegativeSafeInteger(params.pricing.refundWindowMs)) {
        problems.push('refund_window_ms must be a non-negative integer');
      }
      break;
  }

  if (problems.length > 0) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, 'Invalid resource init params', 400, { errors: problems });
  }
}
