import { Container } from '../src/container';
import { ProvisioningService, OWNER_CALL_DEPOSIT } from '../src/services/provisioning.service';
import { CallContext } from '../src/types/account.types';
import { AppError, ErrorCode } from '../src/types/error.types';
import { DeploymentOutcome, DeploymentRequest, ProvisioningStatus, RefundPolicy } from '../src/types/provisioning.types';
import { ResourceStatus } from '../src/types/resource.types';
import { toInitParamsDto } from '../src/utils/serializers';
import {
  FACTORY_ID,
  FACTORY_OWNER,
  RecordingEventPublisher,
  createTestContainer,
  sampleInitParams,
} from './helpers/fixtures';

const CREATOR = 'creator.test';
const OWNER = 'alice.test';
const CREATOR_BALANCE = 10000n;

const call = (callerId: string, attachedDeposit: bigint = 0n): CallContext => ({ callerId, attachedDeposit });

const stubDeployer = (outcome: DeploymentOutcome) =>
  jest.fn((_request: DeploymentRequest) => Promise.resolve(outcome));

describe('ProvisioningService', () => {
  let container: Container;
  let events: RecordingEventPublisher;
  let factory: ProvisioningService;

  const balanceOf = async (id: string): Promise<bigint> => (await container.accountService.getAccount(id)).balance;

  async function setUp(options: Parameters<typeof createTestContainer>[0] = {}): Promise<void> {
    ({ container, events } = createTestContainer(options));
    factory = container.provisioningService;
    await factory.initialize();
    await container.accountService.openAccount(CREATOR, CREATOR_BALANCE);
  }

  describe('with the platform deployer', () => {
    beforeEach(() => setUp());

    it('creates, funds, deploys and initializes the resource account', async () => {
      const params = sampleInitParams();
      const attempt = await factory.createResource(call(CREATOR, 5000n), { name: 'gamma', ownerId: OWNER, initParams: params });

      expect(attempt.status).toBe(ProvisioningStatus.PENDING);
      expect(attempt.resourceAccountId).toBe(`gamma.${FACTORY_ID}`);

      await factory.drain();

      await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({ status: ProvisioningStatus.CONFIRMED });
      expect(await factory.isProvisioned('gamma')).toBe(true);
      expect(await balanceOf(CREATOR)).toBe(5000n);
      expect(await balanceOf(FACTORY_ID)).toBe(0n);
      expect(await balanceOf(`gamma.${FACTORY_ID}`)).toBe(5000n);

      const resource = await container.resourceService.getInitializedResource(`gamma.${FACTORY_ID}`);
      expect(resource.params).toEqual(params);

      expect(events.named('resource_creation')).toEqual([
        {
          event: 'resource_creation',
          data: {
            name: 'gamma',
            resource_account_id: `gamma.${FACTORY_ID}`,
            owner_id: OWNER,
            init_params: toInitParamsDto(params),
          },
        },
      ]);
      expect(events.named('resource_creation_failure')).toEqual([]);
    });

    it('fails closed and refunds when the sub-account already exists', async () => {
      await container.accountService.openAccount(`delta.${FACTORY_ID}`, 0n);

      const attempt = await factory.createResource(call(CREATOR, 5000n), {
        name: 'delta',
        ownerId: OWNER,
        initParams: sampleInitParams(),
      });
      await factory.drain();

      await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
        status: ProvisioningStatus.FAILED,
        failureReason: `ACCOUNT_EXISTS: Account delta.${FACTORY_ID} already exists`,
        refundedAmount: 5000n,
      });
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
      expect(await factory.isProvisioned('delta')).toBe(false);
    });

    it('rolls back every completed step when the initializer fails', async () => {
      const attempt = await factory.createResource(call(CREATOR, 5000n), {
        name: 'epsilon',
        ownerId: OWNER,
        initParams: sampleInitParams({ title: ' ' }),
      });
      await factory.drain();

      await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
        status: ProvisioningStatus.FAILED,
        failureReason: 'VALIDATION_ERROR: Invalid resource init params',
      });
      await expect(container.accountService.getAccount(`epsilon.${FACTORY_ID}`)).rejects.toMatchObject({
        code: ErrorCode.ACCOUNT_NOT_FOUND,
      });
      await expect(container.resourceService.getResource(`epsilon.${FACTORY_ID}`)).rejects.toMatchObject({
        code: ErrorCode.RESOURCE_NOT_FOUND,
      });
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
      expect(await balanceOf(FACTORY_ID)).toBe(0n);
    });
  });

  describe('create_resource checks', () => {
    let deploy: ReturnType<typeof stubDeployer>;

    beforeEach(async () => {
      deploy = stubDeployer({ status: 'success' });
      await setUp({ deployer: () => ({ deploy }) });
    });

    it('rejects a provisioned name synchronously without issuing anything', async () => {
      await factory.createResource(call(CREATOR, 1000n), { name: 'alpha', ownerId: OWNER, initParams: sampleInitParams() });
      await factory.drain();
      expect(deploy).toHaveBeenCalledTimes(1);

      await expect(
        factory.createResource(call(CREATOR, 1000n), { name: 'alpha', ownerId: OWNER, initParams: sampleInitParams() })
      ).rejects.toMatchObject({ code: ErrorCode.NAME_TAKEN, statusCode: 409 });

      await factory.drain();
      expect(deploy).toHaveBeenCalledTimes(1);
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE - 1000n);
    });

    it('rejects a deposit below the storage cost', async () => {
      await expect(
        factory.createResource(call(CREATOR, 999n), { name: 'cheap', ownerId: OWNER, initParams: sampleInitParams() })
      ).rejects.toMatchObject({
        code: ErrorCode.INSUFFICIENT_FUNDS,
        details: { required: '1000', provided: '999' },
      });
      expect(deploy).not.toHaveBeenCalled();
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
    });

    it.each(['Upper', 'two.parts', 'under__score', ''])('rejects the resource name %p', async (name) => {
      await expect(
        factory.createResource(call(CREATOR, 1000n), { name, ownerId: OWNER, initParams: sampleInitParams() })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_RESOURCE_NAME, statusCode: 400 });
      expect(deploy).not.toHaveBeenCalled();
    });

    it('passes the deposit and an abort signal to the deployer', async () => {
      await factory.createResource(call(CREATOR, 1500n), { name: 'zeta', ownerId: OWNER, initParams: sampleInitParams() });
      await factory.drain();

      const request = deploy.mock.calls[0]?.[0];
      expect(request).toMatchObject({
        factoryAccountId: FACTORY_ID,
        resourceAccountId: `zeta.${FACTORY_ID}`,
        deposit: 1500n,
      });
      expect(request?.signal.aborted).toBe(false);
    });
  });

  describe('failed external sequence', () => {
    let deploy: ReturnType<typeof stubDeployer>;

    beforeEach(async () => {
      deploy = stubDeployer({ status: 'failure', reason: 'deploy rejected' });
      await setUp({ deployer: () => ({ deploy }) });
    });

    it('refunds the creator once and leaves the name free', async () => {
      const attempt = await factory.createResource(call(CREATOR, 5000n), {
        name: 'beta',
        ownerId: OWNER,
        initParams: sampleInitParams(),
      });
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE - 5000n);

      await factory.drain();

      expect(await factory.isProvisioned('beta')).toBe(false);
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
      await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
        status: ProvisioningStatus.FAILED,
        failureReason: 'deploy rejected',
        refundedAmount: 5000n,
      });
      expect(events.named('resource_creation_failure')).toEqual([
        {
          event: 'resource_creation_failure',
          data: { name: 'beta', owner_id: OWNER, creator_id: CREATOR, reason: 'deploy rejected', refunded: '5000' },
        },
      ]);
      expect(events.named('resource_creation')).toEqual([]);

      // A repeated continuation changes nothing
      await expect(
        factory.resolveAttempt({
          attemptId: attempt.id,
          name: 'beta',
          resourceAccountId: attempt.resourceAccountId,
          ownerId: OWNER,
          creatorId: CREATOR,
          attachedDeposit: 5000n,
          initParams: attempt.initParams,
          outcome: { status: 'failure', reason: 'deploy rejected' },
        })
      ).resolves.toBeNull();
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
      expect(events.named('resource_creation_failure')).toHaveLength(1);
    });

    it('allows the name to be tried again', async () => {
      await factory.createResource(call(CREATOR, 5000n), { name: 'beta', ownerId: OWNER, initParams: sampleInitParams() });
      await factory.drain();

      deploy.mockResolvedValueOnce({ status: 'success' });
      const retry = await factory.createResource(call(CREATOR, 5000n), {
        name: 'beta',
        ownerId: OWNER,
        initParams: sampleInitParams(),
      });
      await factory.drain();

      await expect(factory.getAttempt(retry.id)).resolves.toMatchObject({ status: ProvisioningStatus.CONFIRMED });
      expect(await factory.isProvisioned('beta')).toBe(true);
    });

    it('treats a rejected deployment as a failure', async () => {
      deploy.mockRejectedValueOnce(new Error('network unreachable'));

      const attempt = await factory.createResource(call(CREATOR, 5000n), {
        name: 'eta',
        ownerId: OWNER,
        initParams: sampleInitParams(),
      });
      await factory.drain();

      await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
        status: ProvisioningStatus.FAILED,
        failureReason: 'network unreachable',
      });
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
    });
  });

  it('keeps the storage cost under the minus_storage_cost policy', async () => {
    await setUp({
      deployer: () => ({ deploy: stubDeployer({ status: 'failure', reason: 'deploy rejected' }) }),
      provisioning: { refundPolicy: RefundPolicy.MINUS_STORAGE_COST },
    });

    const attempt = await factory.createResource(call(CREATOR, 5000n), {
      name: 'theta',
      ownerId: OWNER,
      initParams: sampleInitParams(),
    });
    await factory.drain();

    await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({ refundedAmount: 4000n });
    expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE - 1000n);
    expect(await balanceOf(FACTORY_ID)).toBe(1000n);
  });

  it('fails an attempt whose deployment outlives the timeout', async () => {
    const hanging = (request: DeploymentRequest): Promise<DeploymentOutcome> =>
      new Promise((resolve) => {
        request.signal.addEventListener('abort', () => resolve({ status: 'failure', reason: 'timeout' }));
      });
    await setUp({ deployer: () => ({ deploy: hanging }), provisioning: { timeoutMs: 20 } });

    const attempt = await factory.createResource(call(CREATOR, 5000n), {
      name: 'iota',
      ownerId: OWNER,
      initParams: sampleInitParams(),
    });
    await factory.drain();

    await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
      status: ProvisioningStatus.FAILED,
      failureReason: 'timeout',
    });
    expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
  });

  it('fails at the deadline even when the deployer never settles', async () => {
    const stalled = (_request: DeploymentRequest): Promise<DeploymentOutcome> => new Promise(() => undefined);
    await setUp({ deployer: () => ({ deploy: stalled }), provisioning: { timeoutMs: 20 } });

    const attempt = await factory.createResource(call(CREATOR, 5000n), {
      name: 'lambda',
      ownerId: OWNER,
      initParams: sampleInitParams(),
    });
    await factory.drain();

    await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
      status: ProvisioningStatus.FAILED,
      failureReason: 'timeout',
      refundedAmount: 5000n,
    });
    expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
    expect(await balanceOf(FACTORY_ID)).toBe(0n);
    expect(await factory.isProvisioned('lambda')).toBe(false);
  });

  it('unwinds a chain whose step finishes after the deadline', async () => {
    await setUp({ provisioning: { timeoutMs: 20 } });
    const resources = container.resourceService;
    const deployAndInitialize = resources.deployAndInitialize.bind(resources);

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    jest.spyOn(resources, 'deployAndInitialize').mockImplementation(async (accountId, params) => {
      await gate;
      return deployAndInitialize(accountId, params);
    });

    const attempt = await factory.createResource(call(CREATOR, 5000n), {
      name: 'mu',
      ownerId: OWNER,
      initParams: sampleInitParams(),
    });
    await factory.drain();

    await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({
      status: ProvisioningStatus.FAILED,
      failureReason: 'timeout',
    });
    expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);

    release();
    await new Promise((resolve) => setImmediate(resolve));

    await expect(resources.getResource(`mu.${FACTORY_ID}`)).rejects.toMatchObject({
      code: ErrorCode.RESOURCE_NOT_FOUND,
    });
    await expect(container.accountService.getAccount(`mu.${FACTORY_ID}`)).rejects.toMatchObject({
      code: ErrorCode.ACCOUNT_NOT_FOUND,
    });
    expect(await balanceOf(FACTORY_ID)).toBe(0n);
    expect(await factory.isProvisioned('mu')).toBe(false);
  });

  it('keeps outside initializer calls out of the deploy and initialize step', async () => {
    await setUp();
    const resourceAccountId = `nu.${FACTORY_ID}`;
    const attempt = await factory.createResource(call(CREATOR, 5000n), {
      name: 'nu',
      ownerId: OWNER,
      initParams: sampleInitParams(),
    });

    const intruder = sampleInitParams({ title: 'Taken over' });
    const rejections = new Set<unknown>();
    for (let round = 0; round < 100; round++) {
      if ((await factory.getAttempt(attempt.id)).status !== ProvisioningStatus.PENDING) break;
      await container.resourceService.initialize(resourceAccountId, intruder).then(
        () => rejections.add('initialized'),
        (error: unknown) => rejections.add(error instanceof AppError ? error.code : error)
      );
    }
    await factory.drain();

    expect(rejections.has('initialized')).toBe(false);
    await expect(factory.getAttempt(attempt.id)).resolves.toMatchObject({ status: ProvisioningStatus.CONFIRMED });
    const resource = await container.resourceService.getInitializedResource(resourceAccountId);
    expect(resource.params.title).toBe('Meeting room 4');
  });

  describe('ownership', () => {
    beforeEach(async () => {
      await setUp();
      await container.accountService.openAccount(FACTORY_OWNER, 10n);
    });

    it('hands the factory to a new owner', async () => {
      await expect(factory.setOwner(call(FACTORY_OWNER, OWNER_CALL_DEPOSIT), OWNER)).resolves.toBe(OWNER);

      await expect(factory.getOwner()).resolves.toBe(OWNER);
      expect(await balanceOf(FACTORY_OWNER)).toBe(9n);
    });

    it('refuses callers other than the owner', async () => {
      await expect(factory.setOwner(call(CREATOR, OWNER_CALL_DEPOSIT), CREATOR)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
        statusCode: 403,
      });
      await expect(factory.getOwner()).resolves.toBe(FACTORY_OWNER);
      expect(await balanceOf(CREATOR)).toBe(CREATOR_BALANCE);
    });

    it.each([0n, 2n])('requires a deposit of exactly one, not %p', async (deposit) => {
      await expect(factory.setOwner(call(FACTORY_OWNER, deposit), OWNER)).rejects.toMatchObject({
        code: ErrorCode.UNAUTHORIZED,
      });
      expect(await balanceOf(FACTORY_OWNER)).toBe(10n);
    });

    it('refuses a new owner equal to the caller', async () => {
      await expect(factory.setOwner(call(FACTORY_OWNER, OWNER_CALL_DEPOSIT), FACTORY_OWNER)).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
      });
    });
  });

  it('reports unknown attempts', async () => {
    await setUp();
    await expect(factory.getAttempt('00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: ErrorCode.ATTEMPT_NOT_FOUND,
    });
  });

  it('keeps the resource status consistent after confirmation', async () => {
    await setUp();
    await factory.createResource(call(CREATOR, 1000n), { name: 'kappa', ownerId: OWNER, initParams: sampleInitParams() });
    await factory.drain();

    await expect(container.resourceService.getResource(`kappa.${FACTORY_ID}`)).resolves.toMatchObject({
      status: ResourceStatus.INITIALIZED,
    });
  });
});
