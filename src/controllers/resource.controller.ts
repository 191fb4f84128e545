import { Request, Response } from 'express';
import { ResourceService } from '../services/resource.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest, toCallContext } from '../utils/request';
import { fromInitParamsDto, toResourceResponse } from '../utils/serializers';
import { getResourceSchema, initializeResourceSchema } from '../validators/resource.validator';

/**
 * Resource Controller
 *
 * HTTP request handlers for resource endpoints
 */
export class ResourceController {
  constructor(private resourceService: ResourceService) {}

  /**
   * POST /v1/resources/:accountId/initialize
   * Run the one-time initializer of a deployed resource
   */
  initializeResource = asyncHandler(async (req: Request, res: Response) => {
    const { params, headers, body } = parseRequest(initializeResourceSchema, req);

    const resource = await this.resourceService.initializeAs(
      toCallContext(headers),
      params.accountId,
      fromInitParamsDto(body)
    );

    res.status(200).json(createSuccessResponse(toResourceResponse(resource)));
  });

  /**
   * GET /v1/resources/:accountId
   * Get resource metadata
   */
  getResource = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getResourceSchema, req);

    const resource = await this.resourceService.getResource(params.accountId);

    res.status(200).json(createSuccessResponse(toResourceResponse(resource)));
  });
}
