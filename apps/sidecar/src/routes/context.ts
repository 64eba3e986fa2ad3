import type { FastifyReply } from 'fastify';
import { wrapReaderError } from '../errors.js';
import type { ReadContext } from '../reader/types.js';

export type TableParams = {
  family: string;
  table: string;
};

/** Read context whose signal aborts if the client goes away before the response is finished. */
export function readContext(reply: FastifyReply): ReadContext {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort(new Error('client disconnected'));
  });
  return { signal: controller.signal };
}

export async function callReader<T>(fn: () => Promise<T>, context: string | null = null): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    throw wrapReaderError(context, e);
  }
}
