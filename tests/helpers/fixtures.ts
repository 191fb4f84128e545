import { Container, ContainerOptions, createContainer, createMemoryRepositories } from '../../src/container';
import { EventPublisher } from '../../src/services/event.service';
import { ServiceEvent } from '../../src/types/event.types';
import { PricingPolicy, PricingPolicyType } from '../../src/types/pricing.types';
import { InitializedResource, ResourceInitParams } from '../../src/types/resource.types';
import { RefundPolicy } from '../../src/types/provisioning.types';
import { Clock } from '../../src/utils/clock';

export const FACTORY_ID = 'factory.test';
export const FACTORY_OWNER = 'owner.test';
export const STORAGE_COST = 1000n;

export class RecordingEventPublisher implements EventPublisher {
  readonly events: ServiceEvent[] = [];

  publish(event: ServiceEvent): void {
    this.events.push(event);
  }

  named<E extends ServiceEvent['event']>(name: E): Extract<ServiceEvent, { event: E }>[] {
    return this.events.filter((event): event is Extract<ServiceEvent, { event: E }> => event.event === name);
  }
}

export class ManualClock {
  constructor(public now: number = 0) {}

  readonly clock: Clock = () => this.now;
}

export const flatRent = (pricePerMs: bigint): PricingPolicy => ({
  type: PricingPolicyType.FLAT_RENT,
  pricePerMs,
});

export const decayingRent = (baseFee: bigint, pricePerMs: bigint, refundWindowMs: number): PricingPolicy => ({
  type: PricingPolicyType.DECAYING_REFUND_RENT,
  baseFee,
  pricePerMs,
  refundWindowMs,
});

export function sampleInitParams(overrides: Partial<ResourceInitParams> = {}): ResourceInitParams {
  return {
    title: 'Meeting room 4',
    description: 'Second floor, seats eight',
    contact: 'rooms@example.com',
    coordinates: [52.52, 13.405],
    minDurationMs: 3600000,
    imageUrls: ['https://example.com/room-4.jpg'],
    tags: ['meeting', 'projector'],
    pricing: flatRent(1n),
    ...overrides,
  };
}

export interface TestContext {
  container: Container;
  events: RecordingEventPublisher;
  time: ManualClock;
}

export function createTestContainer(options: ContainerOptions = {}): TestContext {
  const events = new RecordingEventPublisher();
  const time = new ManualClock();
  const container = createContainer({
    storage: 'memory',
    repositories: createMemoryRepositories(),
    clock: time.clock,
    events,
    allowAccountFunding: true,
    ...options,
    provisioning: {
      factoryAccountId: FACTORY_ID,
      initialOwnerId: FACTORY_OWNER,
      storageCost: STORAGE_COST,
      refundPolicy: RefundPolicy.FULL,
      timeoutMs: 1000,
      ...options.provisioning,
    },
  });
  return { container, events, time };
}

// Opens the resource account, deploys and initializes it
export async function createReadyResource(
  container: Container,
  accountId: string,
  params: ResourceInitParams = sampleInitParams()
): Promise<InitializedResource> {
  await container.accountService.openAccount(accountId, 0n);
  await container.resourceService.deploy(accountId);
  return container.resourceService.initialize(accountId, params);
}

// Error thrown by a synchronous call, for asserting on its fields
export function thrownBy(call: () => unknown): unknown {
  try {
    call();
  } catch (error) {
    return error;
  }
  throw new Error('Expected call to throw');
}
