import { PricingPolicy, PricingPolicyDto } from './pricing.types';

/**
 * Resource domain types
 */

export enum ResourceStatus {
  // Code deployed to the account, initializer not yet called
  DEPLOYED = 'DEPLOYED',
  INITIALIZED = 'INITIALIZED',
}

export interface ResourceInitParams {
  title: string;
  description: string;
  contact: string;
  // Display-only, never used arithmetically
  coordinates: [number, number];
  minDurationMs: number;
  imageUrls: string[];
  tags: string[];
  pricing: PricingPolicy;
}

export interface DeployedResource {
  status: ResourceStatus.DEPLOYED;
  accountId: string;
  deployedAt: Date;
}

export interface InitializedResource {
  status: ResourceStatus.INITIALIZED;
  accountId: string;
  params: ResourceInitParams;
  nextBookingId: bigint;
  deployedAt: Date;
  initializedAt: Date;
}

export type Resource = DeployedResource | InitializedResource;

// Wire shape of the initializer arguments
export interface ResourceInitParamsDto {
  title: string;
  description: string;
  contact: string;
  coordinates: [number, number];
  min_duration_ms: number;
  image_urls: string[];
  tags: string[];
  pricing: PricingPolicyDto;
}

// Database row type (snake_case from PostgreSQL)
export interface ResourceRow {
  account_id: string;
  status: string;
  title: string | null;
  description: string | null;
  contact: string | null;
  coordinates: number[] | null;
  min_duration_ms: number | null;
  image_urls: string[] | null;
  tags: string[] | null;
  pricing: PricingPolicyDto | null;
  next_booking_id: string;
  deployed_at: string;
  initialized_at: string | null;
}
