import { AccountRepository } from '../repositories/account.repository';
import { Account, CallContext } from '../types/account.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Account Service
 *
 * The host platform's account system: balances, transfers and the
 * attached-deposit convention of inbound calls.
 */
export class AccountService {
  constructor(private accountRepo: AccountRepository) {}

  async getAccount(id: string): Promise<Account> {
    const account = await this.accountRepo.findById(id);
    if (!account) {
      throw new AppError(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${id} not found`, 404);
    }
    return account;
  }

  async openAccount(id: string, initialBalance: bigint, signal?: AbortSignal): Promise<Account> {
    logger.info('Opening account', { id, initialBalance: initialBalance.toString() });
    return this.accountRepo.create(id, initialBalance, signal);
  }

  async closeAccount(id: string): Promise<void> {
    await this.accountRepo.delete(id);
  }

  async transfer(fromId: string, toId: string, amount: bigint, signal?: AbortSignal): Promise<void> {
    if (amount === 0n) return;
    logger.debug('Transferring funds', { fromId, toId, amount: amount.toString() });
    await this.accountRepo.transfer(fromId, toId, amount, signal);
  }

  /**
   * Run an inbound call with its attached deposit
   *
   * The deposit moves from the caller to `targetId` before the call runs.
   * If the call fails, the deposit goes back to the caller and the error is
   * re-thrown, so a failed call never keeps the caller's funds.
   */
  async withAttachedDeposit<T>(ctx: CallContext, targetId: string, call: () => Promise<T>): Promise<T> {
    await this.transfer(ctx.callerId, targetId, ctx.attachedDeposit);

    try {
      return await call();
    } catch (error) {
      try {
        await this.transfer(targetId, ctx.callerId, ctx.attachedDeposit);
      } catch (revertError) {
        logger.error('Failed to return attached deposit', {
          callerId: ctx.callerId,
          targetId,
          amount: ctx.attachedDeposit.toString(),
          error: revertError instanceof Error ? revertError.message : String(revertError),
        });
        throw new AppError(ErrorCode.INTERNAL_ERROR, 'Call failed and its deposit could not be returned', 500, {
          callerId: ctx.callerId,
          amount: ctx.attachedDeposit.toString(),
        });
      }
      throw error;
    }
  }
}
