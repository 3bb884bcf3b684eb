/**
 * Wire codec for the request/response envelopes.
 *
 * Guest side: `decodeRequest` turns raw request bytes into a
 * {@link WireRequest} or a structured error, and `encodeResponse` turns a
 * {@link Response} into UTF-8 JSON. Host side: `encodeRequest` and
 * `decodeResponse`, used by the host bridge and tests.
 *
 * Absent optional fields are omitted from the encoded JSON, never written
 * as `null`.
 */

import type { ErrorPayload } from '../types/errors.js';
import { ErrorCode } from '../types/errors.js';
import type { JsonValue, Request, Response, WireRequest } from '../types/protocol.js';
import { schemaValidator } from './schema-validator.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** Request as parsed, before `null` payloads are mapped to absent. */
interface ParsedRequest {
  node: string;
  function: string;
  config?: JsonValue;
  input?: JsonValue;
}

const REQUEST_SCHEMA = {
  type: 'object',
  required: ['node', 'function'],
  properties: {
    node: { type: 'string' },
    function: { type: 'string' },
  },
};

const RESPONSE_SCHEMA = {
  type: 'object',
  required: ['success'],
  properties: {
    success: { type: 'boolean' },
    error: { type: 'string' },
    next: { type: 'string' },
  },
  if: { properties: { success: { const: true } } },
  then: { not: { required: ['error'] } },
  else: { required: ['error'], not: { anyOf: [{ required: ['output'] }, { required: ['next'] }] } },
};

const validateRequest = schemaValidator.compile<ParsedRequest>(REQUEST_SCHEMA);
const validateResponse = schemaValidator.compile<Response>(RESPONSE_SCHEMA);

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export type DecodeRequestResult =
  | { ok: true; request: WireRequest }
  | { ok: false; error: ErrorPayload };

export type DecodeResponseResult = { ok: true; response: Response } | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();

function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function malformed(detail: string): { ok: false; error: ErrorPayload } {
  return {
    ok: false,
    error: { code: ErrorCode.MALFORMED_REQUEST, message: `Failed to parse request: ${detail}` },
  };
}

// ---------------------------------------------------------------------------
// Encodability
// ---------------------------------------------------------------------------

/**
 * True when `value` survives a JSON encode/decode cycle unchanged:
 * finite numbers, strings, booleans, null, arrays and plain objects of
 * those. Rejects undefined, functions, symbols, bigints, class
 * instances and cycles.
 */
export function isEncodable(value: unknown): value is JsonValue {
  return checkEncodable(value, new Set<object>());
}

function checkEncodable(value: unknown, ancestors: Set<object>): boolean {
  if (value === null) return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value !== 'object' || value === null) return false;

  if (ancestors.has(value)) return false;

  let children: unknown[];
  if (Array.isArray(value)) {
    children = [...value];
  } else {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return false;
    children = Object.values(value);
  }

  ancestors.add(value);
  const ok = children.every((child) => checkEncodable(child, ancestors));
  ancestors.delete(value);
  return ok;
}

// ---------------------------------------------------------------------------
// Guest side
// ---------------------------------------------------------------------------

/**
 * Decode raw request bytes.
 *
 * Order: UTF-8 validation, JSON parse, envelope shape. Extra top-level
 * fields are ignored. Request size is bounded by the module's memory
 * ceiling, not here.
 */
export function decodeRequest(bytes: Uint8Array): DecodeRequestResult {
  const text = decodeUtf8(bytes);
  if (text === undefined) {
    return {
      ok: false,
      error: { code: ErrorCode.INVALID_ENCODING, message: 'Invalid UTF-8 input' },
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return malformed(err instanceof Error ? err.message : String(err));
  }

  const checked = validateRequest(parsed);
  if (!checked.valid) {
    return malformed(checked.errors.join('; '));
  }

  const { node, function: fn, config, input } = checked.value;
  const request: WireRequest = { node, function: fn };
  if (config !== undefined && config !== null) request.config = config;
  if (input !== undefined && input !== null) request.input = input;

  return { ok: true, request };
}

/** Encode a response as UTF-8 JSON, omitting absent fields. */
export function encodeResponse(response: Response): Uint8Array {
  return encoder.encode(JSON.stringify(responseToJson(response)));
}

function responseToJson(response: Response): Record<string, JsonValue> {
  if (!response.success) {
    return { success: false, error: response.error };
  }
  const out: Record<string, JsonValue> = { success: true };
  if (response.output !== undefined) out['output'] = response.output;
  if (response.next !== undefined) out['next'] = response.next;
  return out;
}

// ---------------------------------------------------------------------------
// Host side
// ---------------------------------------------------------------------------

/** Encode a request as UTF-8 JSON, omitting absent payloads. */
export function encodeRequest(request: Request): Uint8Array {
  const out: Record<string, JsonValue> = { node: request.node, function: request.function };
  if (request.config !== undefined) out['config'] = request.config;
  if (request.input !== undefined) out['input'] = request.input;
  return encoder.encode(JSON.stringify(out));
}

/** Decode response bytes written by a guest. */
export function decodeResponse(bytes: Uint8Array): DecodeResponseResult {
  const text = decodeUtf8(bytes);
  if (text === undefined) {
    return { ok: false, error: 'Response is not valid UTF-8' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      error: `Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const checked = validateResponse(parsed);
  if (!checked.valid) {
    return { ok: false, error: `Response has an invalid shape: ${checked.errors.join('; ')}` };
  }
  return { ok: true, response: checked.value };
}
