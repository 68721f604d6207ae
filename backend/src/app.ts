import Fastify, { FastifyInstance } from 'fastify';
import { AppError } from './common/errors.js';
import type { CatalogAccessor } from './modules/catalog/index.js';
import {
  registerReductionScanRoutes,
  ReductionScanService,
  type ReportingSink,
  type ScanOptions,
} from './modules/reduction-scan/index.js';

export interface AppDeps {
  catalog: CatalogAccessor;
  sink: ReportingSink;
  scanOptions?: Partial<ScanOptions>;
  logLevel?: string;
  nodeEnv?: string;
}

/**
 * Build Fastify Application
 *
 * Catalog and sink come from the caller: server.ts wires mongo / csv,
 * tests pass in-memory ones.
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? 'info',
    },
  });

  const scanService = new ReductionScanService(deps.catalog, deps.sink, deps.scanOptions);

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation / body parse errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR',
      message: deps.nodeEnv === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    catalog: deps.catalog.name,
    sink: deps.sink.name,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerReductionScanRoutes(fastify, { catalog: deps.catalog, scanService });
  });

  return app;
}
