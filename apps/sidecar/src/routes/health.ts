import type { FastifyInstance, FastifyReply } from 'fastify';
import type { Reader } from '../reader/types.js';
import { callReader, readContext } from './context.js';

export type HealthRoutesOptions = {
  reader: Reader;
};

function ledgerLatencyPayload(latencyMs: number) {
  return {
    value: latencyMs / 1000,
    unit: 'seconds' as const,
  };
}

async function healthcheck(reader: Reader, reply: FastifyReply) {
  await callReader(() => reader.ledgerLatency(readContext(reply)), 'healthcheck');
  return reply.status(200).send();
}

export async function registerHealthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
  const { reader } = opts;

  app.get('/get-ledger-latency', { config: { op: 'get-ledger-latency' } }, async (_req, reply) => {
    const latencyMs = await callReader(() => reader.ledgerLatency(readContext(reply)), 'get ledger latency');
    return reply.status(200).send(ledgerLatencyPayload(latencyMs));
  });

  app.get('/healthcheck', { config: { op: 'healthcheck' } }, async (_req, reply) => healthcheck(reader, reply));

  // Same checks as /healthcheck for now; kept as its own route so the two can diverge.
  app.get('/ping', { config: { op: 'ping' } }, async (_req, reply) => healthcheck(reader, reply));
}
