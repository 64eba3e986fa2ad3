import { z } from 'zod';
import { DecodeError, errorMessage } from './errors.js';
import type { JsonValue, KeyArg, Row } from './reader/types.js';

/**
 * One primary-key segment. A non-empty binary payload always wins over a scalar
 * value sent alongside it, so the precedence is settled once at decode time.
 */
export type KeySegment =
  | { kind: 'scalar'; value: JsonValue }
  | { kind: 'binary'; bytes: Uint8Array };

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([literalSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Line breaks inside the payload are ignored.
const base64Schema = z
  .string()
  .transform((v) => v.replace(/[\r\n]/g, ''))
  .pipe(z.string().regex(BASE64_RE, 'expected standard base64'))
  .transform((v) => Buffer.from(v, 'base64'));

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Field names match case-insensitively, preferring an exact (lowercase) match.
function fieldOf(obj: Record<string, unknown>, name: string): unknown {
  if (name in obj) return obj[name];
  const match = Object.keys(obj).find((k) => k.toLowerCase() === name);
  return match === undefined ? undefined : obj[match];
}

function foldFields(names: readonly string[]) {
  return (input: unknown): unknown => {
    if (input === null) return {};
    if (!isPlainObject(input)) return input;
    return Object.fromEntries(names.map((name) => [name, fieldOf(input, name)]));
  };
}

const keySegmentSchema = z
  .preprocess(
    foldFields(['value', 'binary']),
    z.object({
      value: jsonValueSchema.optional(),
      binary: base64Schema.nullish(),
    }),
  )
  .transform(
    (wire): KeySegment =>
      wire.binary && wire.binary.length > 0
        ? { kind: 'binary', bytes: wire.binary }
        : { kind: 'scalar', value: wire.value ?? null },
  );

const readRequestSchema = z
  .preprocess(foldFields(['key']), z.object({ key: z.array(keySegmentSchema).nullish() }))
  .transform((req) => req.key ?? []);

function describeIssues(error: z.ZodError): string {
  const [first] = error.issues;
  if (!first) return 'invalid request body';
  const path = first.path.length > 0 ? `${first.path.join('.')}: ` : '';
  return `${path}${first.message}`;
}

/** Decodes a raw JSON request body into its ordered key segments. */
export function decodeReadRequest(raw: unknown): KeySegment[] {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  if (typeof text !== 'string' || text.trim() === '') {
    throw new DecodeError('decode body: empty request body');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new DecodeError(`decode body: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = readRequestSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(`decode body: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function resolveKey(segment: KeySegment): KeyArg {
  switch (segment.kind) {
    case 'binary':
      return segment.bytes;
    case 'scalar':
      return segment.value;
  }
}

export function toPositionalArgs(segments: readonly KeySegment[]): KeyArg[] {
  return segments.map(resolveKey);
}

function toWireValue(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
  }
  if (typeof value === 'bigint') return value.toString();
  return value;
}

/** Shapes one reader row for a JSON response: bytes as base64, bigints as decimal strings. */
export function toWireRow(row: Row): Row {
  const out: Row = {};
  for (const [column, value] of Object.entries(row)) {
    out[column] = toWireValue(value);
  }
  return out;
}
