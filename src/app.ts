import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 *
 * JSON body parsing happens per route (see accounts.routes.ts) so the
 * content-type guard on POST /accounts runs before any body is read.
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// req.protocol and req.ip honour X-Forwarded-* (the Location header depends on it)
app.set('trust proxy', true);

app.use(helmet());

// No browser clients in production
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

app.use(metricsMiddleware);

app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isJsonObject(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'Account REST API Service',
    version: '1.0',
  });
});

app.use('/', apiRoutes);

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
