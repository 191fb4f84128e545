import { Router } from 'express';
import { createResourceRoutes } from './v1/resources.routes';
import { createFactoryRoutes } from './v1/factory.routes';
import { createAccountRoutes } from './v1/accounts.routes';
import { ResourceController } from '../controllers/resource.controller';
import { BookingController } from '../controllers/booking.controller';
import { FactoryController } from '../controllers/factory.controller';
import { AccountController } from '../controllers/account.controller';
import { Container } from '../container';
import { HealthCheckResponse } from '../types/api.types';

/**
 * API Routes Aggregator
 */
export function createRoutes(container: Container): Router {
  const router = Router();

  const resourceController = new ResourceController(container.resourceService);
  const bookingController = new BookingController(container.bookingService);
  const factoryController = new FactoryController(container.provisioningService);
  const accountController = new AccountController(container.accountService, container.allowAccountFunding);

  // v1 routes
  router.use('/v1/resources', createResourceRoutes(resourceController, bookingController));
  router.use('/v1/factory', createFactoryRoutes(factoryController));
  router.use('/v1/accounts', createAccountRoutes(accountController));

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      storage: container.storage,
      uptime: process.uptime(),
    };
    res.status(200).json(body);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Slot Booking API',
      factory: container.provisioningService.factoryAccountId,
    });
  });

  return router;
}
