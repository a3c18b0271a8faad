export type FrameShape = 'object' | 'array';

export type FramePayload<S extends FrameShape> = S extends 'object' ? Record<string, unknown> : unknown[];

export type EmptyFrameReason = 'no-delimiter' | 'invalid-json' | 'shape-mismatch';

/**
 * Outcome of pulling a JSON payload out of a raw channel frame.
 *
 * Malformed or status-only frames are an `empty` result, never an exception:
 * callers treat them as "no data".
 */
export type FrameResult<S extends FrameShape> =
  | { readonly kind: 'parsed'; readonly value: FramePayload<S> }
  | { readonly kind: 'empty'; readonly reason: EmptyFrameReason };

const DELIMITERS: Record<FrameShape, readonly [string, string]> = {
  object: ['{', '}'],
  array: ['[', ']'],
};

export function toText(payload: unknown): string {
  if (typeof payload === 'string') {
    return payload;
  }

  if (Buffer.isBuffer(payload)) {
    return payload.toString('utf8');
  }

  if (payload instanceof ArrayBuffer) {
    return Buffer.from(payload).toString('utf8');
  }

  if (Array.isArray(payload) && payload.every((chunk) => Buffer.isBuffer(chunk))) {
    return Buffer.concat(payload).toString('utf8');
  }

  if (payload == null) {
    return '';
  }

  return String(payload);
}

export function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value) as unknown;
  } catch {
    return undefined;
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const matchesShape = <S extends FrameShape>(shape: S, value: unknown): value is FramePayload<S> =>
  shape === 'object' ? isRecord(value) : Array.isArray(value);

export function extractFrame<S extends FrameShape>(raw: string, shape: S): FrameResult<S> {
  const [open, close] = DELIMITERS[shape];
  const start = raw.indexOf(open);
  const end = raw.lastIndexOf(close);
  if (start === -1 || end === -1 || end < start) {
    return { kind: 'empty', reason: 'no-delimiter' };
  }

  const parsed = safeJsonParse(raw.slice(start, end + 1));
  if (parsed === undefined) {
    return { kind: 'empty', reason: 'invalid-json' };
  }
  if (!matchesShape(shape, parsed)) {
    return { kind: 'empty', reason: 'shape-mismatch' };
  }

  return { kind: 'parsed', value: parsed };
}

export function framePayload(result: FrameResult<'object'>, shape: 'object'): Record<string, unknown>;
export function framePayload(result: FrameResult<'array'>, shape: 'array'): unknown[];
export function framePayload(
  result: FrameResult<'object'> | FrameResult<'array'>,
  shape: FrameShape,
): Record<string, unknown> | unknown[] {
  if (result.kind === 'parsed') {
    return result.value;
  }
  return shape === 'object' ? {} : [];
}
