import { Request, Response } from 'express';
import { ProvisioningService } from '../services/provisioning.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest, toCallContext } from '../utils/request';
import { fromInitParamsDto, toAttemptResponse } from '../utils/serializers';
import { subAccountId } from '../utils/account-id';
import {
  createResourceSchema,
  getAttemptSchema,
  getProvisionedNameSchema,
  setOwnerSchema,
} from '../validators/factory.validator';

/**
 * Factory Controller
 *
 * HTTP request handlers for resource provisioning and factory ownership
 */
export class FactoryController {
  constructor(private provisioningService: ProvisioningService) {}

  /**
   * POST /v1/factory/resources
   * Issue the creation of a new resource; the outcome is reported on the attempt
   */
  createResource = asyncHandler(async (req: Request, res: Response) => {
    const { headers, body } = parseRequest(createResourceSchema, req);

    const attempt = await this.provisioningService.createResource(toCallContext(headers), {
      name: body.name,
      ownerId: body.owner_id,
      initParams: fromInitParamsDto(body.init_params),
    });

    res
      .status(202)
      .location(`/v1/factory/provisioning/${attempt.id}`)
      .json(createSuccessResponse(toAttemptResponse(attempt), 'Resource creation issued'));
  });

  /**
   * GET /v1/factory/resources/:name
   * Whether a name has been provisioned
   */
  getProvisionedName = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getProvisionedNameSchema, req);

    const provisioned = await this.provisioningService.isProvisioned(params.name);

    res.status(200).json(
      createSuccessResponse({
        name: params.name,
        resource_account_id: subAccountId(params.name, this.provisioningService.factoryAccountId),
        provisioned,
      })
    );
  });

  /**
   * GET /v1/factory/provisioning/:attemptId
   * Status of a provisioning attempt
   */
  getAttempt = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getAttemptSchema, req);

    const attempt = await this.provisioningService.getAttempt(params.attemptId);

    res.status(200).json(createSuccessResponse(toAttemptResponse(attempt)));
  });

  /**
   * GET /v1/factory/owner
   */
  getOwner = asyncHandler(async (_req: Request, res: Response) => {
    const owner = await this.provisioningService.getOwner();

    res.status(200).json(createSuccessResponse({ owner_id: owner }));
  });

  /**
   * PUT /v1/factory/owner
   * Hand the factory over to a new owner
   */
  setOwner = asyncHandler(async (req: Request, res: Response) => {
    const { headers, body } = parseRequest(setOwnerSchema, req);

    const owner = await this.provisioningService.setOwner(toCallContext(headers), body.owner_id);

    res.status(200).json(createSuccessResponse({ owner_id: owner }, 'Factory owner updated'));
  });
}
