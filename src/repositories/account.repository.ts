import { SupabaseClient } from '@supabase/supabase-js';
import { Account, AccountRow } from '../types/account.types';
import { AppError, ErrorCode } from '../types/error.types';
import { abortable } from '../utils/abort';
import { logger } from '../config/logger';

/**
 * Account Repository
 *
 * Balances of platform accounts. `transfer` is the only way funds move and
 * is atomic: either both balances change or neither does. Writes made on
 * behalf of a provisioning chain take its abort signal.
 */
export interface AccountRepository {
  findById(id: string): Promise<Account | null>;
  create(id: string, balance: bigint, signal?: AbortSignal): Promise<Account>;
  delete(id: string): Promise<void>;
  transfer(fromId: string, toId: string, amount: bigint, signal?: AbortSignal): Promise<void>;
}

// PostgREST renders numeric as a JSON number; read balances as text to keep every digit
export const ACCOUNT_COLUMNS = 'id, balance::text, created_at';

export class SupabaseAccountRepository implements AccountRepository {
  constructor(private client: SupabaseClient) {}

  async findById(id: string): Promise<Account | null> {
    const { data, error } = await this.client.from('accounts').select(ACCOUNT_COLUMNS).eq('id', id).single<AccountRow>();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find account', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find account: ${error.message}`, 500);
    }

    return fromAccountRow(data);
  }

  async create(id: string, balance: bigint, signal?: AbortSignal): Promise<Account> {
    logger.debug('Creating account', { id, balance: balance.toString() });

    const { data, error } = await abortable(
      this.client.from('accounts').insert({ id, balance: balance.toString() }).select(ACCOUNT_COLUMNS),
      signal
    ).single<AccountRow>();

    if (error) {
      if (error.code === '23505') {
        throw new AppError(ErrorCode.ACCOUNT_EXISTS, `Account ${id} already exists`, 409, { id });
      }
      logger.error('Failed to create account', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to create account: ${error.message}`, 500);
    }

    return fromAccountRow(data);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client.from('accounts').delete().eq('id', id);

    if (error) {
      logger.error('Failed to delete account', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to delete account: ${error.message}`, 500);
    }
  }

  /**
   * Move funds between accounts using the transfer_funds database function,
   * which locks both rows and checks the sender's balance inside the lock.
   */
  async transfer(fromId: string, toId: string, amount: bigint, signal?: AbortSignal): Promise<void> {
    const { data: outcome, error } = await abortable(
      this.client.rpc('transfer_funds', {
        p_from: fromId,
        p_to: toId,
        p_amount: amount.toString(),
      }),
      signal
    );

    if (error) {
      logger.error('Failed to transfer funds', { fromId, toId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to transfer funds: ${error.message}`, 500);
    }

    if (outcome === 'account_not_found') {
      throw new AppError(ErrorCode.ACCOUNT_NOT_FOUND, 'Transfer account not found', 404, { fromId, toId });
    }
    if (outcome === 'insufficient_balance') {
      throw new AppError(ErrorCode.INSUFFICIENT_BALANCE, `Account ${fromId} cannot cover ${amount}`, 402, {
        accountId: fromId,
        required: amount.toString(),
      });
    }
  }
}

export function fromAccountRow(row: AccountRow): Account {
  return {
    id: row.id,
    balance: BigInt(row.balance),
    createdAt: new Date(row.created_at),
  };
}
