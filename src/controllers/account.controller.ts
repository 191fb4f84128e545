import { Request, Response } from 'express';
import { AccountService } from '../services/account.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/request';
import { toAccountResponse } from '../utils/serializers';
import { AppError, ErrorCode } from '../types/error.types';
import { getAccountSchema, openAccountSchema } from '../validators/account.validator';

/**
 * Account Controller
 *
 * HTTP request handlers for platform accounts
 */
export class AccountController {
  constructor(
    private accountService: AccountService,
    private allowFunding: boolean
  ) {}

  /**
   * POST /v1/accounts
   * Open an account, optionally with an initial balance
   */
  openAccount = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(openAccountSchema, req);
    const initialBalance = BigInt(body.initial_balance ?? '0');

    if (initialBalance > 0n && !this.allowFunding) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Opening funded accounts is disabled', 403);
    }

    const account = await this.accountService.openAccount(body.account_id, initialBalance);

    res.status(201).json(createSuccessResponse(toAccountResponse(account), 'Account opened'));
  });

  /**
   * GET /v1/accounts/:accountId
   */
  getAccount = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getAccountSchema, req);

    const account = await this.accountService.getAccount(params.accountId);

    res.status(200).json(createSuccessResponse(toAccountResponse(account)));
  });
}
