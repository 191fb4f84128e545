import { SupabaseClient } from '@supabase/supabase-js';
import {
  ProvisioningAttempt,
  ProvisioningAttemptRow,
  ProvisioningStatus,
  SettleAttemptParams,
} from '../types/provisioning.types';
import { AppError, ErrorCode } from '../types/error.types';
import { fromInitParamsDto, toInitParamsDto } from '../utils/serializers';
import { logger } from '../config/logger';

/**
 * Provisioning Attempt Repository
 *
 * One row per create_resource call. Rows start PENDING and are settled
 * exactly once to CONFIRMED or FAILED.
 */
export interface ProvisioningAttemptRepository {
  create(attempt: ProvisioningAttempt): Promise<ProvisioningAttempt>;
  findById(id: string): Promise<ProvisioningAttempt | null>;
  /** Returns null when the attempt is missing or no longer PENDING. */
  settle(id: string, params: SettleAttemptParams): Promise<ProvisioningAttempt | null>;
}

// Deposits and refunds are numeric; read them as text to keep every digit
export const ATTEMPT_COLUMNS =
  'id, name, resource_account_id, owner_id, creator_id, attached_deposit::text, init_params, ' +
  'status, failure_reason, refunded_amount::text, created_at, settled_at';

export class SupabaseProvisioningAttemptRepository implements ProvisioningAttemptRepository {
  constructor(private client: SupabaseClient) {}

  async create(attempt: ProvisioningAttempt): Promise<ProvisioningAttempt> {
    logger.debug('Recording provisioning attempt', { id: attempt.id, name: attempt.name });

    const { data, error } = await this.client
      .from('provisioning_attempts')
      .insert({
        id: attempt.id,
        name: attempt.name,
        resource_account_id: attempt.resourceAccountId,
        owner_id: attempt.ownerId,
        creator_id: attempt.creatorId,
        attached_deposit: attempt.attachedDeposit.toString(),
        init_params: toInitParamsDto(attempt.initParams),
        status: attempt.status,
        created_at: attempt.createdAt.toISOString(),
      })
      .select(ATTEMPT_COLUMNS)
      .single<ProvisioningAttemptRow>();

    if (error) {
      logger.error('Failed to record provisioning attempt', { id: attempt.id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to record provisioning attempt: ${error.message}`, 500);
    }

    return fromAttemptRow(data);
  }

  async findById(id: string): Promise<ProvisioningAttempt | null> {
    const { data, error } = await this.client
      .from('provisioning_attempts')
      .select(ATTEMPT_COLUMNS)
      .eq('id', id)
      .single<ProvisioningAttemptRow>();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find provisioning attempt', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find provisioning attempt: ${error.message}`, 500);
    }

    return fromAttemptRow(data);
  }

  /**
   * Atomic operation: only updates if status is PENDING
   */
  async settle(id: string, params: SettleAttemptParams): Promise<ProvisioningAttempt | null> {
    const { data, error } = await this.client
      .from('provisioning_attempts')
      .update({
        status: params.status,
        failure_reason: params.failureReason ?? null,
        refunded_amount: params.refundedAmount?.toString() ?? null,
        settled_at: params.settledAt.toISOString(),
      })
      .eq('id', id)
      .eq('status', ProvisioningStatus.PENDING)
      .select(ATTEMPT_COLUMNS)
      .single<ProvisioningAttemptRow>();

    if (error) {
      if (error.code === 'PGRST116') {
        logger.debug('Provisioning attempt not settled - not pending', { id });
        return null;
      }
      logger.error('Failed to settle provisioning attempt', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to settle provisioning attempt: ${error.message}`, 500);
    }

    return fromAttemptRow(data);
  }
}

export function fromAttemptRow(row: ProvisioningAttemptRow): ProvisioningAttempt {
  return {
    id: row.id,
    name: row.name,
    resourceAccountId: row.resource_account_id,
    ownerId: row.owner_id,
    creatorId: row.creator_id,
    attachedDeposit: BigInt(row.attached_deposit),
    initParams: fromInitParamsDto(row.init_params),
    status: toProvisioningStatus(row.status),
    createdAt: new Date(row.created_at),
    ...(row.failure_reason !== null && { failureReason: row.failure_reason }),
    ...(row.refunded_amount !== null && { refundedAmount: BigInt(row.refunded_amount) }),
    ...(row.settled_at !== null && { settledAt: new Date(row.settled_at) }),
  };
}

function toProvisioningStatus(status: string): ProvisioningStatus {
  switch (status) {
    case ProvisioningStatus.CONFIRMED:
      return ProvisioningStatus.CONFIRMED;
    case ProvisioningStatus.FAILED:
      return ProvisioningStatus.FAILED;
    default:
      return ProvisioningStatus.PENDING;
  }
}
