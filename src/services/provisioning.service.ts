import { v4 as uuidv4 } from 'uuid';
import { FactoryRepository } from '../repositories/factory.repository';
import { ProvisioningAttemptRepository } from '../repositories/provisioning-attempt.repository';
import { AccountService } from './account.service';
import { ResourceDeployer } from './deployment.service';
import { EventPublisher } from './event.service';
import {
  CreateResourceInput,
  DeploymentOutcome,
  ProvisioningAttempt,
  ProvisioningResolution,
  ProvisioningStatus,
  RefundPolicy,
} from '../types/provisioning.types';
import { CallContext } from '../types/account.types';
import { AppError, ErrorCode } from '../types/error.types';
import { isValidSubAccountName, subAccountId } from '../utils/account-id';
import { CallQueue } from '../utils/call-queue';
import { TIMEOUT_REASON, timeoutError } from '../utils/abort';
import { toInitParamsDto } from '../utils/serializers';
import { logger } from '../config/logger';

export interface ProvisioningConfig {
  factoryAccountId: string;
  initialOwnerId: string;
  storageCost: bigint;
  refundPolicy: RefundPolicy;
  timeoutMs: number;
}

// Deposit required by owner-only calls to confirm intent
export const OWNER_CALL_DEPOSIT = 1n;

/**
 * Provisioning Service (the factory)
 *
 * Two-phase protocol for creating resources:
 *
 * 1. createResource (synchronous): checks the name, records a PENDING
 *    attempt, keeps the attached deposit and returns at once.
 * 2. resolveAttempt (continuation): runs as a separate call on the factory
 *    queue once the deployment chain has settled, carrying the full
 *    context of the attempt. Success adds the name to the provisioned set;
 *    anything else refunds the creator and leaves the name free.
 */
export class ProvisioningService {
  private inFlight = new Map<string, Promise<void>>();

  constructor(
    private factoryRepo: FactoryRepository,
    private attemptRepo: ProvisioningAttemptRepository,
    private accountService: AccountService,
    private deployer: ResourceDeployer,
    private events: EventPublisher,
    private callQueue: CallQueue,
    private config: ProvisioningConfig
  ) {}

  get factoryAccountId(): string {
    return this.config.factoryAccountId;
  }

  /**
   * Make sure the factory account and its owner record exist
   */
  async initialize(): Promise<void> {
    const { factoryAccountId, initialOwnerId } = this.config;
    const account = await this.accountService.getAccount(factoryAccountId).catch((error: unknown) => {
      if (error instanceof AppError && error.code === ErrorCode.ACCOUNT_NOT_FOUND) return null;
      throw error;
    });
    if (!account) {
      await this.accountService.openAccount(factoryAccountId, 0n);
    }
    const owner = await this.factoryRepo.ensureState(factoryAccountId, initialOwnerId);
    logger.info('Factory ready', { factoryAccountId, owner });
  }

  async getOwner(): Promise<string> {
    const owner = await this.factoryRepo.getOwner(this.config.factoryAccountId);
    if (!owner) {
      throw new AppError(ErrorCode.INTERNAL_ERROR, 'Factory state is not initialized', 500);
    }
    return owner;
  }

  /**
   * Transfer factory ownership
   *
   * Business rules:
   * - Only the current owner may call this
   * - Exactly OWNER_CALL_DEPOSIT must be attached
   * - The new owner must differ from the caller
   */
  async setOwner(ctx: CallContext, newOwnerId: string): Promise<string> {
    const factoryId = this.config.factoryAccountId;

    return this.callQueue.run(factoryId, () =>
      this.accountService.withAttachedDeposit(ctx, factoryId, async () => {
        await this.assertOwner(ctx);
        if (newOwnerId === ctx.callerId) {
          throw new AppError(ErrorCode.VALIDATION_ERROR, 'New owner must differ from the current owner', 400);
        }
        await this.factoryRepo.setOwner(factoryId, newOwnerId);
        logger.info('Factory owner changed', { factoryId, from: ctx.callerId, to: newOwnerId });
        return newOwnerId;
      })
    );
  }

  async isProvisioned(name: string): Promise<boolean> {
    return this.factoryRepo.hasName(name);
  }

  async getAttempt(id: string): Promise<ProvisioningAttempt> {
    const attempt = await this.attemptRepo.findById(id);
    if (!attempt) {
      throw new AppError(ErrorCode.ATTEMPT_NOT_FOUND, `Provisioning attempt ${id} not found`, 404);
    }
    return attempt;
  }

  /**
   * Accept a create_resource request
   *
   * Fails synchronously (nothing issued, deposit returned) when the name is
   * taken or invalid, or the deposit does not cover the storage cost.
   * Otherwise returns the PENDING attempt; the outcome arrives later
   * through resolveAttempt.
   */
  async createResource(ctx: CallContext, input: CreateResourceInput): Promise<ProvisioningAttempt> {
    const factoryId = this.config.factoryAccountId;
    logger.info('Creating resource', { name: input.name, ownerId: input.ownerId, creatorId: ctx.callerId });

    const attempt = await this.callQueue.run(factoryId, () =>
      this.accountService.withAttachedDeposit(ctx, factoryId, async () => {
        if (await this.factoryRepo.hasName(input.name)) {
          throw new AppError(ErrorCode.NAME_TAKEN, `Resource name "${input.name}" is already provisioned`, 409, {
            name: input.name,
          });
        }

        if (!isValidSubAccountName(input.name, factoryId)) {
          throw new AppError(ErrorCode.INVALID_RESOURCE_NAME, `Invalid resource name "${input.name}"`, 400, {
            name: input.name,
            resourceAccountId: subAccountId(input.name, factoryId),
          });
        }

        if (ctx.attachedDeposit < this.config.storageCost) {
          throw new AppError(
            ErrorCode.INSUFFICIENT_FUNDS,
            `Attached deposit ${ctx.attachedDeposit} does not cover storage cost ${this.config.storageCost}`,
            402,
            { required: this.config.storageCost.toString(), provided: ctx.attachedDeposit.toString() }
          );
        }

        return this.attemptRepo.create({
          id: uuidv4(),
          name: input.name,
          resourceAccountId: subAccountId(input.name, factoryId),
          ownerId: input.ownerId,
          creatorId: ctx.callerId,
          attachedDeposit: ctx.attachedDeposit,
          initParams: input.initParams,
          status: ProvisioningStatus.PENDING,
          createdAt: new Date(),
        });
      })
    );

    this.issue(attempt);
    logger.info('Resource provisioning issued', { attemptId: attempt.id, resourceAccountId: attempt.resourceAccountId });
    return attempt;
  }

  /**
   * Confirmation continuation of one attempt
   *
   * Acts only on a PENDING attempt, so a repeated invocation changes
   * nothing. Any outcome other than explicit success is a failure.
   */
  async resolveAttempt(resolution: ProvisioningResolution): Promise<ProvisioningAttempt | null> {
    const attempt = await this.attemptRepo.findById(resolution.attemptId);
    if (!attempt || attempt.status !== ProvisioningStatus.PENDING) {
      logger.warn('Ignoring resolution of a settled provisioning attempt', {
        attemptId: resolution.attemptId,
        status: attempt?.status,
      });
      return null;
    }

    if (resolution.outcome.status === 'success') {
      return this.confirm(resolution);
    }
    return this.fail(resolution, resolution.outcome.reason);
  }

  /** Resolves once every issued attempt has been resolved. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  private issue(attempt: ProvisioningAttempt): void {
    const settled = this.runChain(attempt)
      .then((outcome) =>
        this.callQueue.run(this.config.factoryAccountId, () =>
          this.resolveAttempt({
            attemptId: attempt.id,
            name: attempt.name,
            resourceAccountId: attempt.resourceAccountId,
            ownerId: attempt.ownerId,
            creatorId: attempt.creatorId,
            attachedDeposit: attempt.attachedDeposit,
            initParams: attempt.initParams,
            outcome,
          })
        )
      )
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error('Provisioning continuation failed; attempt left PENDING', {
            attemptId: attempt.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      )
      .finally(() => this.inFlight.delete(attempt.id));

    this.inFlight.set(attempt.id, settled);
  }

  /**
   * Run the deployment chain under the provisioning deadline
   *
   * Whichever comes first wins: the chain's own outcome, or the deadline,
   * which aborts the chain's signal and reports a timeout failure without
   * waiting for the chain to notice.
   */
  private runChain(attempt: ProvisioningAttempt): Promise<DeploymentOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<DeploymentOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(timeoutError());
        resolve({ status: 'failure', reason: TIMEOUT_REASON });
      }, this.config.timeoutMs);
      timer.unref();
    });

    const chain = this.deployer
      .deploy({
        factoryAccountId: this.config.factoryAccountId,
        resourceAccountId: attempt.resourceAccountId,
        deposit: attempt.attachedDeposit,
        initParams: attempt.initParams,
        signal: controller.signal,
      })
      .catch(
        (error: unknown): DeploymentOutcome => ({
          status: 'failure',
          reason: error instanceof Error ? error.message : String(error),
        })
      );

    return Promise.race([chain, deadline]).finally(() => clearTimeout(timer));
  }

  private async confirm(resolution: ProvisioningResolution): Promise<ProvisioningAttempt | null> {
    if (!(await this.factoryRepo.addName(resolution.name))) {
      logger.warn('Ignoring confirmation for an already provisioned name', { name: resolution.name });
      return null;
    }

    const settled = await this.attemptRepo.settle(resolution.attemptId, {
      status: ProvisioningStatus.CONFIRMED,
      settledAt: new Date(),
    });

    this.events.publish({
      event: 'resource_creation',
      data: {
        name: resolution.name,
        resource_account_id: resolution.resourceAccountId,
        owner_id: resolution.ownerId,
        init_params: toInitParamsDto(resolution.initParams),
      },
    });

    logger.info('Resource provisioned', { name: resolution.name, attemptId: resolution.attemptId });
    return settled;
  }

  private async fail(resolution: ProvisioningResolution, reason: string): Promise<ProvisioningAttempt | null> {
    const refund = this.refundFor(resolution.attachedDeposit);
    await this.accountService.transfer(this.config.factoryAccountId, resolution.creatorId, refund);

    const settled = await this.attemptRepo.settle(resolution.attemptId, {
      status: ProvisioningStatus.FAILED,
      failureReason: reason,
      refundedAmount: refund,
      settledAt: new Date(),
    });

    this.events.publish({
      event: 'resource_creation_failure',
      data: {
        name: resolution.name,
        owner_id: resolution.ownerId,
        creator_id: resolution.creatorId,
        reason,
        refunded: refund.toString(),
      },
    });

    logger.warn('Resource provisioning failed, creator refunded', {
      name: resolution.name,
      attemptId: resolution.attemptId,
      reason,
      refunded: refund.toString(),
    });
    return settled;
  }

  private refundFor(deposit: bigint): bigint {
    switch (this.config.refundPolicy) {
      case RefundPolicy.FULL:
        return deposit;
      case RefundPolicy.MINUS_STORAGE_COST:
        return deposit > this.config.storageCost ? deposit - this.config.storageCost : 0n;
    }
  }

  private async assertOwner(ctx: CallContext): Promise<void> {
    if (ctx.attachedDeposit !== OWNER_CALL_DEPOSIT) {
      throw new AppError(
        ErrorCode.UNAUTHORIZED,
        `Owner-only calls require an attached deposit of exactly ${OWNER_CALL_DEPOSIT}`,
        403
      );
    }
    const owner = await this.getOwner();
    if (ctx.callerId !== owner) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Only the factory owner can call this method', 403);
    }
  }
}
