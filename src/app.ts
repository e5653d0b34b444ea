import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import multipart from '@fastify/multipart';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import underPressure from '@fastify/under-pressure';
import { config } from './config';
import { registerSwagger } from './plugins/swagger';
import { registerSecurity } from './plugins/security';
import { createServices, type AppDependencies } from './services/container';
import { createGlobalErrorHandler } from './utils/global-error-handler';
import { registerTemplateRoutes } from './modules/templates/routes/templates.routes';
import { registerProposalRoutes } from './modules/proposals/routes/proposals.routes';
import { registerProposalValueRoutes } from './modules/proposals/routes/proposal-values.routes';
import { registerContractRoutes } from './modules/contracts/routes/contracts.routes';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  isProduction?: boolean;
  corsOrigin?: string | boolean;
  enableSwagger?: boolean;
}

export function buildApp(deps: AppDependencies, options: BuildAppOptions = {}): FastifyInstance {
  const isProduction = options.isProduction ?? config.isProduction;

  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  // Core plugins
  app.register(cors, { origin: options.corsOrigin ?? config.corsOrigin });
  app.register(helmet);
  app.register(multipart, { limits: { fileSize: 10 * 1024 * 1024 } });
  app.register(underPressure, { maxEventLoopDelay: 1000, maxHeapUsedBytes: 200 * 1024 * 1024 });

  // Docs & security
  registerSwagger(app, { isProduction, enabled: options.enableSwagger ?? config.enableSwagger });
  registerSecurity(app, { isProduction });

  app.setErrorHandler(createGlobalErrorHandler({ isProduction }));

  const services = createServices(deps, app.log);

  // Routes (prefix global /api/v1)
  app.register(async (api: FastifyInstance) => {
    await registerTemplateRoutes(api, services);
    await registerProposalRoutes(api, services);
    await registerProposalValueRoutes(api, services);
    await registerContractRoutes(api, services);
  }, { prefix: '/api/v1' });

  app.get('/health', {
    schema: {
      tags: ['system'],
      summary: 'Service health',
      response: {
        200: {
          type: 'object',
          properties: { status: { type: 'string' } },
        }
      }
    }
  }, async () => ({ status: 'ok' }));

  app.get('/health/db', {
    schema: {
      tags: ['system'],
      summary: 'Database health',
      response: {
        200: {
          type: 'object',
          properties: { connected: { type: 'boolean' } },
        }
      }
    }
  }, async () => ({ connected: deps.verifyDb ? await deps.verifyDb() : false }));

  return app;
}
