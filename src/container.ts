import { SupabaseClient } from '@supabase/supabase-js';
import { env } from './config/environment';
import { getSupabaseClient } from './config/database';
import { AccountRepository, SupabaseAccountRepository } from './repositories/account.repository';
import { BookingRepository, SupabaseBookingRepository } from './repositories/booking.repository';
import { FactoryRepository, SupabaseFactoryRepository } from './repositories/factory.repository';
import {
  ProvisioningAttemptRepository,
  SupabaseProvisioningAttemptRepository,
} from './repositories/provisioning-attempt.repository';
import { ResourceRepository, SupabaseResourceRepository } from './repositories/resource.repository';
import { MemoryStore } from './repositories/memory/memory-store';
import { InMemoryAccountRepository } from './repositories/memory/account.repository';
import { InMemoryBookingRepository } from './repositories/memory/booking.repository';
import { InMemoryFactoryRepository } from './repositories/memory/factory.repository';
import { InMemoryProvisioningAttemptRepository } from './repositories/memory/provisioning-attempt.repository';
import { InMemoryResourceRepository } from './repositories/memory/resource.repository';
import { AccountService } from './services/account.service';
import { BookingIndexService } from './services/booking-index.service';
import { BookingService } from './services/booking.service';
import { PlatformResourceDeployer, ResourceDeployer } from './services/deployment.service';
import { EventPublisher, LogEventPublisher } from './services/event.service';
import { ProvisioningConfig, ProvisioningService } from './services/provisioning.service';
import { ResourceService } from './services/resource.service';
import { RefundPolicy } from './types/provisioning.types';
import { CallQueue } from './utils/call-queue';
import { Clock, systemClock } from './utils/clock';

export type StorageDriver = 'memory' | 'supabase';

export interface Repositories {
  accounts: AccountRepository;
  resources: ResourceRepository;
  bookings: BookingRepository;
  factory: FactoryRepository;
  attempts: ProvisioningAttemptRepository;
}

export interface ContainerOptions {
  storage?: StorageDriver;
  repositories?: Repositories;
  clock?: Clock;
  events?: EventPublisher;
  // Replaces the platform chain, e.g. with one that always fails
  deployer?: (accountService: AccountService, resourceService: ResourceService) => ResourceDeployer;
  provisioning?: Partial<ProvisioningConfig>;
  allowAccountFunding?: boolean;
}

export interface Container {
  storage: StorageDriver;
  repositories: Repositories;
  callQueue: CallQueue;
  accountService: AccountService;
  resourceService: ResourceService;
  bookingService: BookingService;
  provisioningService: ProvisioningService;
  allowAccountFunding: boolean;
}

export function createMemoryRepositories(store: MemoryStore = new MemoryStore()): Repositories {
  return {
    accounts: new InMemoryAccountRepository(store),
    resources: new InMemoryResourceRepository(store),
    bookings: new InMemoryBookingRepository(store),
    factory: new InMemoryFactoryRepository(store),
    attempts: new InMemoryProvisioningAttemptRepository(store),
  };
}

export function createSupabaseRepositories(client: SupabaseClient): Repositories {
  return {
    accounts: new SupabaseAccountRepository(client),
    resources: new SupabaseResourceRepository(client),
    bookings: new SupabaseBookingRepository(client),
    factory: new SupabaseFactoryRepository(client),
    attempts: new SupabaseProvisioningAttemptRepository(client),
  };
}

function refundPolicyFromEnv(): RefundPolicy {
  return env.PROVISIONING_REFUND_POLICY === 'minus_storage_cost' ? RefundPolicy.MINUS_STORAGE_COST : RefundPolicy.FULL;
}

/**
 * Wires repositories, services and configuration together.
 * Anything not passed in options comes from the environment.
 */
export function createContainer(options: ContainerOptions = {}): Container {
  const storage = options.storage ?? env.STORAGE_DRIVER;
  const repositories =
    options.repositories ??
    (storage === 'supabase' ? createSupabaseRepositories(getSupabaseClient()) : createMemoryRepositories());

  const callQueue = new CallQueue();
  const clock = options.clock ?? systemClock;
  const events = options.events ?? new LogEventPublisher();

  const accountService = new AccountService(repositories.accounts);
  const resourceService = new ResourceService(repositories.resources, callQueue);
  const bookingIndex = new BookingIndexService(repositories.bookings);
  const bookingService = new BookingService(
    repositories.bookings,
    bookingIndex,
    resourceService,
    accountService,
    events,
    callQueue,
    clock
  );

  const deployer = options.deployer
    ? options.deployer(accountService, resourceService)
    : new PlatformResourceDeployer(accountService, resourceService);

  const provisioningService = new ProvisioningService(
    repositories.factory,
    repositories.attempts,
    accountService,
    deployer,
    events,
    callQueue,
    {
      factoryAccountId: env.FACTORY_ACCOUNT_ID,
      initialOwnerId: env.FACTORY_OWNER_ID,
      storageCost: BigInt(env.RESOURCE_STORAGE_COST),
      refundPolicy: refundPolicyFromEnv(),
      timeoutMs: env.PROVISIONING_TIMEOUT_MS,
      ...options.provisioning,
    }
  );

  return {
    storage,
    repositories,
    callQueue,
    accountService,
    resourceService,
    bookingService,
    provisioningService,
    allowAccountFunding: options.allowAccountFunding ?? env.ALLOW_ACCOUNT_FUNDING,
  };
}

/**
 * Wait for issued provisioning attempts to resolve, then for every call
 * still queued on an account
 */
export async function drainContainer(container: Container): Promise<void> {
  await container.provisioningService.drain();
  await container.callQueue.idle();
}
