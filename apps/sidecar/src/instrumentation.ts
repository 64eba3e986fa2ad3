import type { FastifyBaseLogger, FastifyInstance } from 'fastify';

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Operation name used to tag latency samples. */
    op?: string;
  }
}

export type LatencySample = {
  metric: 'api-latency';
  op: string;
  userAgent: string;
  durationMs: number;
};

export interface LatencyObserver {
  observe(sample: LatencySample): void;
}

export function loggingLatencyObserver(log: FastifyBaseLogger): LatencyObserver {
  return {
    observe: (sample) => log.debug(sample, 'api latency'),
  };
}

/**
 * Times every routed request from dispatch to response and reports it with the
 * route's `op` and the caller's user-agent. Requests that matched no route are
 * not timed.
 */
export function registerLatencyInstrumentation(app: FastifyInstance, observer?: LatencyObserver) {
  const sink = observer ?? loggingLatencyObserver(app.log);

  app.addHook('onResponse', async (req, reply) => {
    const op = req.routeOptions.config.op;
    if (!op) return;

    try {
      sink.observe({
        metric: 'api-latency',
        op,
        userAgent: req.headers['user-agent'] ?? '',
        durationMs: reply.elapsedTime,
      });
    } catch (err) {
      req.log.warn({ err, op }, 'latency observer failed');
    }
  });
}
