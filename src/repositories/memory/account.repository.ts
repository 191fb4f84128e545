import { AccountRepository } from '../account.repository';
import { Account } from '../../types/account.types';
import { AppError, ErrorCode } from '../../types/error.types';
import { throwIfAborted } from '../../utils/abort';
import { MemoryStore } from './memory-store';

export class InMemoryAccountRepository implements AccountRepository {
  constructor(private store: MemoryStore) {}

  async findById(id: string): Promise<Account | null> {
    const account = this.store.accounts.get(id);
    return account ? { ...account } : null;
  }

  async create(id: string, balance: bigint, signal?: AbortSignal): Promise<Account> {
    throwIfAborted(signal);
    if (this.store.accounts.has(id)) {
      throw new AppError(ErrorCode.ACCOUNT_EXISTS, `Account ${id} already exists`, 409, { id });
    }
    const account: Account = { id, balance, createdAt: new Date() };
    this.store.accounts.set(id, account);
    return { ...account };
  }

  async delete(id: string): Promise<void> {
    this.store.accounts.delete(id);
  }

  async transfer(fromId: string, toId: string, amount: bigint, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const from = this.store.accounts.get(fromId);
    const to = this.store.accounts.get(toId);
    if (!from || !to) {
      throw new AppError(ErrorCode.ACCOUNT_NOT_FOUND, 'Transfer account not found', 404, { fromId, toId });
    }
    if (from.balance < amount) {
      throw new AppError(ErrorCode.INSUFFICIENT_BALANCE, `Account ${fromId} cannot cover ${amount}`, 402, {
        accountId: fromId,
        required: amount.toString(),
      });
    }
    from.balance -= amount;
    to.balance += amount;
  }
}
