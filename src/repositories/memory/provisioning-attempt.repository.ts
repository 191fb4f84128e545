import { ProvisioningAttemptRepository } from '../provisioning-attempt.repository';
import { ProvisioningAttempt, ProvisioningStatus, SettleAttemptParams } from '../../types/provisioning.types';
import { MemoryStore } from './memory-store';

export class InMemoryProvisioningAttemptRepository implements ProvisioningAttemptRepository {
  constructor(private store: MemoryStore) {}

  async create(attempt: ProvisioningAttempt): Promise<ProvisioningAttempt> {
    this.store.provisioningAttempts.set(attempt.id, { ...attempt });
    return { ...attempt };
  }

  async findById(id: string): Promise<ProvisioningAttempt | null> {
    const attempt = this.store.provisioningAttempts.get(id);
    return attempt ? { ...attempt } : null;
  }

  async settle(id: string, params: SettleAttemptParams): Promise<ProvisioningAttempt | null> {
    const attempt = this.store.provisioningAttempts.get(id);
    if (!attempt || attempt.status !== ProvisioningStatus.PENDING) return null;

    const settled: ProvisioningAttempt = {
      ...attempt,
      status: params.status,
      settledAt: params.settledAt,
      ...(params.failureReason !== undefined && { failureReason: params.failureReason }),
      ...(params.refundedAmount !== undefined && { refundedAmount: params.refundedAmount }),
    };
    this.store.provisioningAttempts.set(id, settled);
    return { ...settled };
  }
}
