import { ResourceInitParams, ResourceInitParamsDto } from './resource.types';

/**
 * Provisioning (factory) domain types
 */

// PENDING -> CONFIRMED | FAILED; both outcomes are terminal
export enum ProvisioningStatus {
  PENDING = 'PENDING',
  CONFIRMED = 'CONFIRMED',
  FAILED = 'FAILED',
}

export enum RefundPolicy {
  FULL = 'full',
  MINUS_STORAGE_COST = 'minus_storage_cost',
}

export interface ProvisioningAttempt {
  id: string;
  name: string;
  resourceAccountId: string;
  ownerId: string;
  creatorId: string;
  attachedDeposit: bigint;
  initParams: ResourceInitParams;
  status: ProvisioningStatus;
  failureReason?: string;
  refundedAmount?: bigint;
  createdAt: Date;
  settledAt?: Date;
}

export interface CreateResourceInput {
  name: string;
  ownerId: string;
  initParams: ResourceInitParams;
}

// Terminal outcome of the whole create/fund/deploy/init chain
export type DeploymentOutcome = { status: 'success' } | { status: 'failure'; reason: string };

export interface DeploymentRequest {
  factoryAccountId: string;
  resourceAccountId: string;
  deposit: bigint;
  initParams: ResourceInitParams;
  signal: AbortSignal;
}

// Everything the confirmation continuation needs; nothing is read from shared state
export interface ProvisioningResolution {
  attemptId: string;
  name: string;
  resourceAccountId: string;
  ownerId: string;
  creatorId: string;
  attachedDeposit: bigint;
  initParams: ResourceInitParams;
  outcome: DeploymentOutcome;
}

export interface SettleAttemptParams {
  status: ProvisioningStatus.CONFIRMED | ProvisioningStatus.FAILED;
  failureReason?: string;
  refundedAmount?: bigint;
  settledAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface ProvisioningAttemptRow {
  id: string;
  name: string;
  resource_account_id: string;
  owner_id: string;
  creator_id: string;
  attached_deposit: string;
  init_params: ResourceInitParamsDto;
  status: string;
  failure_reason: string | null;
  refunded_amount: string | null;
  created_at: string;
  settled_at: string | null;
}

export interface FactoryStateRow {
  account_id: string;
  owner_id: string;
}
