import { Router } from 'express';
import { FactoryController } from '../../controllers/factory.controller';
import { validate } from '../../middleware/validation.middleware';
import { requireCaller } from '../../middleware/caller.middleware';
import {
  createResourceSchema,
  getAttemptSchema,
  getProvisionedNameSchema,
  setOwnerSchema,
} from '../../validators/factory.validator';

/**
 * Factory routes (v1)
 */
export function createFactoryRoutes(factoryController: FactoryController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/factory/resources:
   *   post:
   *     summary: Create a resource under the factory
   *     description: |
   *       Returns a PENDING provisioning attempt at once. The attached deposit
   *       funds the new resource on success and is refunded on failure.
   *     tags: [Factory]
   *     parameters:
   *       - $ref: '#/components/parameters/AccountIdHeader'
   *       - $ref: '#/components/parameters/AttachedDepositHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, owner_id, init_params]
   *             properties:
   *               name:
   *                 type: string
   *               owner_id:
   *                 type: string
   *               init_params:
   *                 $ref: '#/components/schemas/ResourceInitParams'
   *     responses:
   *       202:
   *         description: Creation issued
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ProvisioningAttempt'
   *       402:
   *         description: Deposit does not cover the storage cost
   *       409:
   *         description: Name already provisioned
   */
  router.post('/resources', requireCaller, validate(createResourceSchema), factoryController.createResource);

  /**
   * @swagger
   * /v1/factory/resources/{name}:
   *   get:
   *     summary: Whether a resource name has been provisioned
   *     tags: [Factory]
   *     parameters:
   *       - in: path
   *         name: name
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Lookup result
   */
  router.get('/resources/:name', validate(getProvisionedNameSchema), factoryController.getProvisionedName);

  /**
   * @swagger
   * /v1/factory/provisioning/{attemptId}:
   *   get:
   *     summary: Status of a provisioning attempt
   *     tags: [Factory]
   *     parameters:
   *       - in: path
   *         name: attemptId
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Attempt retrieved successfully
   *       404:
   *         description: Attempt not found
   */
  router.get('/provisioning/:attemptId', validate(getAttemptSchema), factoryController.getAttempt);

  /**
   * @swagger
   * /v1/factory/owner:
   *   get:
   *     summary: Current factory owner
   *     tags: [Factory]
   *     responses:
   *       200:
   *         description: Owner retrieved successfully
   *   put:
   *     summary: Transfer factory ownership
   *     description: Caller must be the owner and attach a deposit of exactly 1.
   *     tags: [Factory]
   *     parameters:
   *       - $ref: '#/components/parameters/AccountIdHeader'
   *       - $ref: '#/components/parameters/AttachedDepositHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [owner_id]
   *             properties:
   *               owner_id:
   *                 type: string
   *     responses:
   *       200:
   *         description: Owner updated
   *       403:
   *         description: Caller is not the owner or the deposit is not exactly 1
   */
  router.get('/owner', factoryController.getOwner);
  router.put('/owner', requireCaller, validate(setOwnerSchema), factoryController.setOwner);

  return router;
}
