import type { FastifyInstance } from 'fastify';
import { errorMessage } from './errors.js';

/**
 * Single place where handler failures become responses: log once with the
 * request URL, then answer 500 with the error text unless the handler already
 * replied. Handlers that want another status send it themselves.
 */
export function registerErrorTranslator(app: FastifyInstance) {
  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err, url: req.url }, 'request failed');
    if (reply.sent) return;

    return reply.status(500).type('text/plain; charset=utf-8').send(errorMessage(err));
  });
}
