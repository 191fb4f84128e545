import { FactoryRepository } from '../factory.repository';
import { MemoryStore } from './memory-store';

export class InMemoryFactoryRepository implements FactoryRepository {
  constructor(private store: MemoryStore) {}

  async ensureState(factoryId: string, initialOwnerId: string): Promise<string> {
    const existing = this.store.factoryOwners.get(factoryId);
    if (existing !== undefined) return existing;
    this.store.factoryOwners.set(factoryId, initialOwnerId);
    return initialOwnerId;
  }

  async getOwner(factoryId: string): Promise<string | null> {
    return this.store.factoryOwners.get(factoryId) ?? null;
  }

  async setOwner(factoryId: string, ownerId: string): Promise<void> {
    this.store.factoryOwners.set(factoryId, ownerId);
  }

  async hasName(name: string): Promise<boolean> {
    return this.store.provisionedNames.has(name);
  }

  async addName(name: string): Promise<boolean> {
    if (this.store.provisionedNames.has(name)) return false;
    this.store.provisionedNames.add(name);
    return true;
  }
}
