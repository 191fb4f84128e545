import { AccountService } from './account.service';
import { ResourceService } from './resource.service';
import { DeploymentOutcome, DeploymentRequest } from '../types/provisioning.types';
import { AppError, ErrorCode } from '../types/error.types';
import { TIMEOUT_REASON, throwIfAborted } from '../utils/abort';
import { logger } from '../config/logger';

/**
 * The external create/fund/deploy/init chain behind create_resource.
 *
 * Callers see only the terminal outcome. Implementations should settle
 * promptly once `signal` aborts; the coordinator stops waiting at its
 * deadline either way.
 */
export interface ResourceDeployer {
  deploy(request: DeploymentRequest): Promise<DeploymentOutcome>;
}

type Compensation = { step: string; undo: () => Promise<void> };

/**
 * Runs the chain against the platform's account system and resource
 * store: open the sub-account, deploy and initialize the resource, then
 * fund it. Each completed step registers how to undo itself; on failure the
 * steps are undone in reverse order, which returns the deposit to the
 * factory account and leaves no trace of the sub-account.
 *
 * Every forward step carries the signal and the chain re-checks it after
 * each step, so a chain that completes after the deadline unwinds itself
 * instead of leaving a resource the coordinator has already failed. The
 * promise never rejects.
 */
export class PlatformResourceDeployer implements ResourceDeployer {
  constructor(
    private accountService: AccountService,
    private resourceService: ResourceService
  ) {}

  async deploy(request: DeploymentRequest): Promise<DeploymentOutcome> {
    const { factoryAccountId, resourceAccountId, deposit, initParams, signal } = request;
    const compensations: Compensation[] = [];
    const chainLogger = logger.child({ resourceAccountId });

    try {
      throwIfAborted(signal);
      await this.accountService.openAccount(resourceAccountId, 0n, signal);
      compensations.push({ step: 'create_account', undo: () => this.accountService.closeAccount(resourceAccountId) });

      throwIfAborted(signal);
      await this.resourceService.deployAndInitialize(resourceAccountId, initParams, signal);
      compensations.push({ step: 'deploy_and_initialize', undo: () => this.resourceService.undeploy(resourceAccountId) });

      // The deposit leaves the factory last, so a deadline refund finds it there
      throwIfAborted(signal);
      await this.accountService.transfer(factoryAccountId, resourceAccountId, deposit, signal);
      compensations.push({
        step: 'transfer',
        undo: () => this.accountService.transfer(resourceAccountId, factoryAccountId, deposit),
      });

      throwIfAborted(signal);
      chainLogger.info('Resource deployment chain succeeded');
      return { status: 'success' };
    } catch (error) {
      const reason = signal.aborted ? TIMEOUT_REASON : this.describe(error);
      chainLogger.warn('Resource deployment chain failed, rolling back', {
        reason,
        completedSteps: compensations.map((c) => c.step),
      });
      const rollbackErrors = await this.rollBack(compensations);
      return {
        status: 'failure',
        reason: rollbackErrors.length > 0 ? `${reason}; rollback incomplete: ${rollbackErrors.join(', ')}` : reason,
      };
    }
  }

  private async rollBack(compensations: Compensation[]): Promise<string[]> {
    const failures: string[] = [];
    for (const compensation of [...compensations].reverse()) {
      try {
        await compensation.undo();
      } catch (error) {
        logger.error('Deployment rollback step failed', { step: compensation.step, error: this.describe(error) });
        failures.push(compensation.step);
      }
    }
    return failures;
  }

  private describe(error: unknown): string {
    if (error instanceof AppError) {
      return error.code === ErrorCode.PROVISIONING_FAILED ? error.message : `${error.code}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
