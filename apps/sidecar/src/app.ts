import fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { parseBindAddr } from './config.js';
import { registerErrorTranslator } from './errorHandler.js';
import { errorMessage, StartupError } from './errors.js';
import { registerLatencyInstrumentation, type LatencyObserver } from './instrumentation.js';
import type { Reader } from './reader/types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerRowRoutes } from './routes/rows.js';

// Read and write deadline for every connection.
export const SERVER_TIMEOUT_MS = 5_000;

export type SidecarConfig = {
  bindAddr: string;
  reader: Reader;
  /** Ceiling on rows per scan response; 0 or unset means unbounded. */
  maxRows?: number;
};

export type BuildAppOptions = {
  logger?: FastifyServerOptions['logger'];
  latencyObserver?: LatencyObserver;
};

export type Sidecar = {
  app: FastifyInstance;
  start(): Promise<string>;
  close(): Promise<void>;
};

export async function buildApp(config: Omit<SidecarConfig, 'bindAddr'>, opts: BuildAppOptions = {}) {
  const app = fastify({
    logger: opts.logger ?? true,
    connectionTimeout: SERVER_TIMEOUT_MS,
    requestTimeout: SERVER_TIMEOUT_MS,
  });

  // Handlers decode bodies themselves, so malformed JSON surfaces as a handler
  // failure instead of the framework's 400.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  registerErrorTranslator(app);
  registerLatencyInstrumentation(app, opts.latencyObserver);

  await registerRowRoutes(app, { reader: config.reader, maxRows: config.maxRows ?? 0 });
  await registerHealthRoutes(app, { reader: config.reader });

  return app;
}

export async function createSidecar(config: SidecarConfig, opts: BuildAppOptions = {}): Promise<Sidecar> {
  const { host, port } = parseBindAddr(config.bindAddr);
  const app = await buildApp(config, opts);

  return {
    app,
    async start() {
      try {
        return await app.listen({ host, port });
      } catch (e) {
        throw new StartupError(`listen and serve: ${errorMessage(e)}`, { cause: e });
      }
    },
    close: () => app.close(),
  };
}
