import 'dotenv/config';
import { createSidecar } from './app.js';
import { loadConfig, parseArgs, USAGE } from './config.js';
import { createPgPool, pgSqlSource } from './reader/pg.js';
import { createSqlReader } from './reader/sql.js';

const cli = parseArgs(process.argv.slice(2));
if (cli.help) {
  // eslint-disable-next-line no-console
  console.log(USAGE);
  process.exit(0);
}

const settings = loadConfig(process.env, cli);

const pool = createPgPool(settings.databaseUrl);
const reader = createSqlReader(pgSqlSource(pool), { scanBatchSize: settings.scanBatchSize });

const sidecar = await createSidecar(
  { bindAddr: settings.bindAddr, reader, maxRows: settings.maxRows },
  { logger: { level: settings.logLevel } },
);
const { app } = sidecar;

async function shutdown(signal: NodeJS.Signals) {
  app.log.info({ signal }, 'shutting down');
  await sidecar.close();
  await pool.end();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  });
}

try {
  const address = await sidecar.start();
  app.log.info({ address, maxRows: settings.maxRows || 'unbounded' }, 'sidecar listening');
} catch (err) {
  app.log.error({ err }, 'sidecar failed to start');
  await pool.end().catch((closeErr: unknown) => app.log.warn({ err: closeErr }, 'pool close failed'));
  process.exit(1);
}
