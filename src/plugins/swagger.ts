import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

/**
 * Register Swagger Documentation
 *
 * Enabled outside production. In production it is registered only when
 * ENABLE_SWAGGER=true, and the UI then answers localhost only.
 */
export function registerSwagger(app: FastifyInstance, options: { isProduction: boolean; enabled: boolean }) {
  const { isProduction } = options;

  if (isProduction && !options.enabled) {
    app.log.info('Swagger documentation DISABLED in production');
    return;
  }

  app.register(swagger, {
    mode: 'dynamic',
    openapi: {
      info: {
        title: 'Proposal Service API',
        description: 'Templates, proposals, values and contracts',
        version: '1.0.0'
      },
      servers: [
        { url: '/', description: 'Current server' }
      ],
      tags: [
        { name: 'system', description: 'System health and monitoring' },
        { name: 'templates', description: 'Template catalog: categories, variables, elements' },
        { name: 'proposals', description: 'Proposals, structure reads and template sync' },
        { name: 'values', description: 'Variable and element values of a proposal' },
        { name: 'contracts', description: 'Contract versions and signatures' }
      ]
    },
    hideUntagged: false
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
      filter: true
    },
    uiHooks: {
      onRequest: async (request, reply) => {
        if (isProduction) {
          const allowedIPs = ['127.0.0.1', '::1'];
          if (!allowedIPs.includes(request.ip)) {
            app.log.warn({ ip: request.ip }, 'Unauthorized Swagger access attempt');
            return reply.status(403).send({
              success: false,
              error: 'FORBIDDEN',
              message: 'API documentation is not publicly accessible in production'
            });
          }
        }
      }
    }
  });

  app.log.info('Swagger documentation enabled at /docs');
}
