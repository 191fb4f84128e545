import { SupabaseClient } from '@supabase/supabase-js';
import { FactoryStateRow } from '../types/provisioning.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Factory Repository
 *
 * Owner of each factory account and the set of resource names it has
 * provisioned. A name is added once and never removed.
 */
export interface FactoryRepository {
  /** Create the factory state if absent and return the current owner. */
  ensureState(factoryId: string, initialOwnerId: string): Promise<string>;
  getOwner(factoryId: string): Promise<string | null>;
  setOwner(factoryId: string, ownerId: string): Promise<void>;
  hasName(name: string): Promise<boolean>;
  /** Returns false when the name was already present. */
  addName(name: string): Promise<boolean>;
}

export class SupabaseFactoryRepository implements FactoryRepository {
  constructor(private client: SupabaseClient) {}

  async ensureState(factoryId: string, initialOwnerId: string): Promise<string> {
    const { error } = await this.client
      .from('factory_state')
      .upsert({ account_id: factoryId, owner_id: initialOwnerId }, { onConflict: 'account_id', ignoreDuplicates: true });

    if (error) {
      logger.error('Failed to initialize factory state', { factoryId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to initialize factory state: ${error.message}`, 500);
    }

    const owner = await this.getOwner(factoryId);
    if (!owner) {
      throw new AppError(ErrorCode.DATABASE_ERROR, 'Factory state initialized but not found', 500);
    }
    return owner;
  }

  async getOwner(factoryId: string): Promise<string | null> {
    const { data, error } = await this.client
      .from('factory_state')
      .select('*')
      .eq('account_id', factoryId)
      .single<FactoryStateRow>();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      logger.error('Failed to read factory owner', { factoryId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to read factory owner: ${error.message}`, 500);
    }

    return data.owner_id;
  }

  async setOwner(factoryId: string, ownerId: string): Promise<void> {
    const { error } = await this.client.from('factory_state').update({ owner_id: ownerId }).eq('account_id', factoryId);

    if (error) {
      logger.error('Failed to set factory owner', { factoryId, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to set factory owner: ${error.message}`, 500);
    }
  }

  async hasName(name: string): Promise<boolean> {
    const { count, error } = await this.client
      .from('provisioned_names')
      .select('name', { count: 'exact', head: true })
      .eq('name', name);

    if (error) {
      logger.error('Failed to look up provisioned name', { name, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to look up provisioned name: ${error.message}`, 500);
    }

    return (count ?? 0) > 0;
  }

  async addName(name: string): Promise<boolean> {
    const { error } = await this.client.from('provisioned_names').insert({ name });

    if (error) {
      if (error.code === '23505') return false; // Already provisioned
      logger.error('Failed to add provisioned name', { name, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to add provisioned name: ${error.message}`, 500);
    }

    return true;
  }
}
