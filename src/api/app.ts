import express from 'express';
import { DEFAULT_KNOWN_CURRENCIES } from '../domain/types.js';
import { setupOpenAPI } from './openapi/index.js';
import { createInvoiceRouter } from './routes/invoices.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler, errorResponse } from './middleware/error-handler.js';
import { ENDPOINTS, SERVICE_NAME, SERVICE_VERSION } from './service.js';

export { SERVICE_NAME, SERVICE_VERSION } from './service.js';

export interface AppOptions {
  knownCurrencies?: readonly string[];
  maxPdfSizeBytes?: number;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();

  app.use(express.json({ limit: '50mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.use(createInvoiceRouter({
    knownCurrencies: options.knownCurrencies ?? DEFAULT_KNOWN_CURRENCIES,
    maxPdfSizeBytes: options.maxPdfSizeBytes,
  }));

  app.use((req, res) => {
    res.status(404).json(errorResponse(
      'NOT_FOUND',
      `No route for ${req.method} ${req.path}`,
      `Available endpoints: ${Object.values(ENDPOINTS).join(', ')}`,
    ));
  });

  app.use(errorHandler);

  return app;
}
