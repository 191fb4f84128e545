import { SupabaseClient } from '@supabase/supabase-js';
import {
  DeployedResource,
  InitializedResource,
  Resource,
  ResourceInitParams,
  ResourceRow,
  ResourceStatus,
} from '../types/resource.types';
import { AppError, ErrorCode } from '../types/error.types';
import { fromPricingDto, toPricingDto } from '../utils/serializers';
import { abortable } from '../utils/abort';
import { logger } from '../config/logger';

/**
 * Resource Repository
 *
 * One row per resource account. A row is created when code is deployed to
 * the account and filled in exactly once by the initializer.
 */
export interface ResourceRepository {
  findByAccountId(accountId: string): Promise<Resource | null>;
  deploy(accountId: string, signal?: AbortSignal): Promise<DeployedResource>;
  /** Returns null when the resource is missing or already initialized. */
  initialize(accountId: string, params: ResourceInitParams, signal?: AbortSignal): Promise<InitializedResource | null>;
  remove(accountId: string): Promise<void>;
}

export const RESOURCE_COLUMNS =
  'account_id, status, title, description, contact, coordinates, min_duration_ms, image_urls, tags, pricing, ' +
  'next_booking_id::text, deployed_at, initialized_at';

export class SupabaseResourceRepository implements ResourceRepository {
  constructor(private client: SupabaseClient) {}

  async findByAccountId(accountId: string): Promise<Resource | null> {
    const { data, error } = await this.client
      .from('resources')
      .select(RESOURCE_COLUMNS)
      .eq('account_id', accountId)
      .single<ResourceRow>();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to find resource', { accountId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find resource: ${error.message}`, 500);
    }

    return fromResourceRow(data);
  }

  async deploy(accountId: string, signal?: AbortSignal): Promise<DeployedResource> {
    logger.debug('Deploying resource', { accountId });

    const { data, error } = await abortable(
      this.client
        .from('resources')
        .insert({ account_id: accountId, status: ResourceStatus.DEPLOYED, next_booking_id: '1' })
        .select(RESOURCE_COLUMNS),
      signal
    ).single<ResourceRow>();

    if (error) {
      if (error.code === '23505') {
        throw new AppError(ErrorCode.ACCOUNT_EXISTS, `Code already deployed to ${accountId}`, 409, { accountId });
      }
      logger.error('Failed to deploy resource', { accountId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to deploy resource: ${error.message}`, 500);
    }

    return { status: ResourceStatus.DEPLOYED, accountId: data.account_id, deployedAt: new Date(data.deployed_at) };
  }

  /**
   * Initialize a deployed resource
   *
   * Atomic operation: only updates if status is DEPLOYED, so a second
   * initializer call matches no row and returns null.
   */
  async initialize(
    accountId: string,
    params: ResourceInitParams,
    signal?: AbortSignal
  ): Promise<InitializedResource | null> {
    const query = this.client
      .from('resources')
      .update({
        status: ResourceStatus.INITIALIZED,
        title: params.title,
        description: params.description,
        contact: params.contact,
        coordinates: params.coordinates,
        min_duration_ms: params.minDurationMs,
        image_urls: params.imageUrls,
        tags: params.tags,
        pricing: toPricingDto(params.pricing),
        initialized_at: new Date().toISOString(),
      })
      .eq('account_id', accountId)
      .eq('status', ResourceStatus.DEPLOYED)
      .select(RESOURCE_COLUMNS);
    const { data, error } = await abortable(query, signal).single<ResourceRow>();

    if (error) {
      if (error.code === 'PGRST116') {
        logger.debug('Resource not initialized - conditions not met', { accountId });
        return null;
      }
      logger.error('Failed to initialize resource', { accountId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to initialize resource: ${error.message}`, 500);
    }

    const resource = fromResourceRow(data);
    return resource.status === ResourceStatus.INITIALIZED ? resource : null;
  }

  async remove(accountId: string): Promise<void> {
    const { error } = await this.client.from('resources').delete().eq('account_id', accountId);

    if (error) {
      logger.error('Failed to remove resource', { accountId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to remove resource: ${error.message}`, 500);
    }
  }
}

export function fromResourceRow(row: ResourceRow): Resource {
  if (row.status !== ResourceStatus.INITIALIZED || !row.pricing || !row.initialized_at) {
    return { status: ResourceStatus.DEPLOYED, accountId: row.account_id, deployedAt: new Date(row.deployed_at) };
  }

  const [lat = 0, lon = 0] = row.coordinates ?? [];
  return {
    status: ResourceStatus.INITIALIZED,
    accountId: row.account_id,
    params: {
      title: row.title ?? '',
      description: row.description ?? '',
      contact: row.contact ?? '',
      coordinates: [lat, lon],
      minDurationMs: row.min_duration_ms ?? 0,
      imageUrls: row.image_urls ?? [],
      tags: row.tags ?? [],
      pricing: fromPricingDto(row.pricing),
    },
    nextBookingId: BigInt(row.next_booking_id),
    deployedAt: new Date(row.deployed_at),
    initializedAt: new Date(row.initialized_at),
  };
}
