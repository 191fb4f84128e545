/**
 * Platform account types
 */

export interface Account {
  id: string;
  balance: bigint;
  createdAt: Date;
}

// Identity and attached funds of one inbound call
export interface CallContext {
  callerId: string;
  attachedDeposit: bigint;
}

// Database row type (snake_case from PostgreSQL)
export interface AccountRow {
  id: string;
  balance: string;
  created_at: string;
}
