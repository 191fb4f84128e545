import { AccountService } from '../src/services/account.service';
import { MemoryStore } from '../src/repositories/memory/memory-store';
import { InMemoryAccountRepository } from '../src/repositories/memory/account.repository';
import { ErrorCode } from '../src/types/error.types';

describe('AccountService', () => {
  let accounts: AccountService;

  const balanceOf = async (id: string): Promise<bigint> => (await accounts.getAccount(id)).balance;

  beforeEach(async () => {
    accounts = new AccountService(new InMemoryAccountRepository(new MemoryStore()));
    await accounts.openAccount('alice.test', 1000n);
    await accounts.openAccount('shop.test', 0n);
  });

  it('refuses to open an account twice', async () => {
    await expect(accounts.openAccount('alice.test', 0n)).rejects.toMatchObject({
      code: ErrorCode.ACCOUNT_EXISTS,
      statusCode: 409,
    });
  });

  it('moves funds between accounts', async () => {
    await accounts.transfer('alice.test', 'shop.test', 400n);

    expect(await balanceOf('alice.test')).toBe(600n);
    expect(await balanceOf('shop.test')).toBe(400n);
  });

  it('refuses transfers the sender cannot cover', async () => {
    await expect(accounts.transfer('alice.test', 'shop.test', 1001n)).rejects.toMatchObject({
      code: ErrorCode.INSUFFICIENT_BALANCE,
      statusCode: 402,
    });
    expect(await balanceOf('alice.test')).toBe(1000n);
  });

  it('refuses transfers to unknown accounts', async () => {
    await expect(accounts.transfer('alice.test', 'ghost.test', 1n)).rejects.toMatchObject({
      code: ErrorCode.ACCOUNT_NOT_FOUND,
    });
  });

  describe('withAttachedDeposit', () => {
    it('keeps the deposit when the call succeeds', async () => {
      const result = await accounts.withAttachedDeposit(
        { callerId: 'alice.test', attachedDeposit: 250n },
        'shop.test',
        async () => 'done'
      );

      expect(result).toBe('done');
      expect(await balanceOf('shop.test')).toBe(250n);
    });

    it('returns the deposit and rethrows when the call fails', async () => {
      await expect(
        accounts.withAttachedDeposit({ callerId: 'alice.test', attachedDeposit: 250n }, 'shop.test', async () => {
          throw new Error('handler failed');
        })
      ).rejects.toThrow('handler failed');

      expect(await balanceOf('alice.test')).toBe(1000n);
      expect(await balanceOf('shop.test')).toBe(0n);
    });

    it('never runs the call when the deposit cannot be taken', async () => {
      const handler = jest.fn(async () => 'unreachable');

      await expect(
        accounts.withAttachedDeposit({ callerId: 'alice.test', attachedDeposit: 5000n }, 'shop.test', handler)
      ).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_BALANCE });
      expect(handler).not.toHaveBeenCalled();
    });
  });
});
