import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { Container } from './container';
import { swaggerSpec } from './swagger/swagger.config';
import { env } from './config/environment';
import { logger } from './config/logger';

const SWAGGER_UI_CDN = 'https://unpkg.com/swagger-ui-dist@5.11.0';

// Swagger UI served from the CDN, pointed at our generated document
const docsPage = (title: string, specUrl: string): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${title}</title>
  <link rel="stylesheet" href="${SWAGGER_UI_CDN}/swagger-ui.css">
  <style>body { margin: 0; } .swagger-ui .topbar { display: none; }</style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="${SWAGGER_UI_CDN}/swagger-ui-bundle.js"></script>
  <script src="${SWAGGER_UI_CDN}/swagger-ui-standalone-preset.js"></script>
  <script>
    window.onload = () => SwaggerUIBundle({
      url: '${specUrl}',
      dom_id: '#swagger-ui',
      deepLinking: true,
      presets: [SwaggerUIBundle.presets.apis, SwaggerUIStandalonePreset],
      layout: 'StandaloneLayout',
      displayRequestDuration: true,
      tryItOutEnabled: true,
    });
  </script>
</body>
</html>`;

function corsOrigin(): string | string[] {
  if (env.ALLOWED_ORIGINS === '*') return '*';
  return env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim());
}

/**
 * Creates and configures the Express application
 */
export function createApp(container: Container): Application {
  const app = express();

  // CSP off so the CDN-hosted Swagger UI loads
  app.use(helmet({ contentSecurityPolicy: false }));

  // Callers identify themselves and attach funds through headers
  app.use(cors({
    origin: corsOrigin(),
    allowedHeaders: ['Content-Type', 'X-Account-Id', 'X-Attached-Deposit'],
    exposedHeaders: ['Location'],
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/docs', (_req, res) => {
    res.send(docsPage('Slot Booking API Docs', '/openapi.json'));
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  app.use('/', createRoutes(container));

  app.use(notFoundHandler);
  // must be last
  app.use(errorHandler);

  logger.info('Express application configured successfully', { storage: container.storage });

  return app;
}
