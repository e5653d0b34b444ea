import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Security Plugin
 *
 * - Request correlation header
 * - Response security headers on top of helmet's
 * - Rejection of path traversal and script injection in URLs
 */
export function registerSecurity(app: FastifyInstance, options: { isProduction: boolean }) {
  const { isProduction } = options;

  // ============================================================================
  // SECURITY HEADERS
  // ============================================================================
  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header('X-Request-Id', req.id);

    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    reply.header('Permissions-Policy', 'geolocation=(), microphone=(), camera=()');

    if (isProduction) {
      reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  });

  // ============================================================================
  // SUSPICIOUS ACTIVITY DETECTION
  // ============================================================================
  const suspiciousPatterns = [
    /(\.\.|\/etc\/|\/proc\/|\/sys\/)/i,  // Path traversal
    /(union.*select|javascript:|onerror=)/i,
    /(<script|<iframe|<object)/i,
  ];

  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    const urlAndQuery = decodeURIComponentSafe(req.url);

    for (const pattern of suspiciousPatterns) {
      if (pattern.test(urlAndQuery)) {
        req.log.warn({
          ip: req.ip,
          url: req.url,
          pattern: pattern.source,
          userAgent: req.headers['user-agent']
        }, 'SECURITY ALERT: Suspicious request pattern detected');

        return reply.status(400).send({
          success: false,
          error: 'VALIDATION_ERROR',
          message: 'Invalid request format',
          reference: req.id
        });
      }
    }
  });

  app.log.info('Security plugin registered');
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
