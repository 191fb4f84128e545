import { Router } from 'express';
import { AccountController } from '../../controllers/account.controller';
import { validate } from '../../middleware/validation.middleware';
import { getAccountSchema, openAccountSchema } from '../../validators/account.validator';

/**
 * Account routes (v1)
 */
export function createAccountRoutes(accountController: AccountController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/accounts:
   *   post:
   *     summary: Open a platform account
   *     tags: [Accounts]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [account_id]
   *             properties:
   *               account_id:
   *                 type: string
   *               initial_balance:
   *                 type: string
   *                 description: Decimal amount; requires ALLOW_ACCOUNT_FUNDING
   *     responses:
   *       201:
   *         description: Account opened
   *       409:
   *         description: Account already exists
   */
  router.post('/', validate(openAccountSchema), accountController.openAccount);

  /**
   * @swagger
   * /v1/accounts/{accountId}:
   *   get:
   *     summary: Get account balance
   *     tags: [Accounts]
   *     parameters:
   *       - in: path
   *         name: accountId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Account retrieved successfully
   *       404:
   *         description: Account not found
   */
  router.get('/:accountId', validate(getAccountSchema), accountController.getAccount);

  return router;
}
