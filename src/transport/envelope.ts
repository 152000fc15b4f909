/**
 * JSON framing for boundary signals carried over a socket
 *
 * { "v": 1, "type": "signal", "sourceClass": "...", "signal": "...",
 *   "payload": {...}, "targetDomain": "client", "messageId": 12 }
 */

import type { Domain, Payload } from '../nodes/types';
import type { BoundaryEnvelope } from './loopback';

const VERSION = 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDomain(value: unknown): value is Domain {
  return value === 'server' || value === 'client' || value === 'shared';
}

export function encodeEnvelope(envelope: BoundaryEnvelope): string {
  return JSON.stringify({ v: VERSION, type: 'signal', ...envelope });
}

/**
 * Text of a ws message, whatever shape it arrived in
 */
export function frameText(data: unknown): string | undefined {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Array.isArray(data) && data.every(chunk => Buffer.isBuffer(chunk))) {
    return Buffer.concat(data).toString('utf8');
  }
  return undefined;
}

/**
 * Parse one frame; undefined for anything that is not a v1 signal
 */
export function decodeEnvelope(text: string): BoundaryEnvelope | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || parsed.v !== VERSION || parsed.type !== 'signal') {
    return undefined;
  }

  const { sourceClass, signal, payload, targetDomain, messageId } = parsed;
  if (
    typeof sourceClass !== 'string' ||
    typeof signal !== 'string' ||
    !isDomain(targetDomain) ||
    typeof messageId !== 'number'
  ) {
    return undefined;
  }
  const body: Payload = isRecord(payload) ? payload : {};
  return { sourceClass, signal, payload: body, targetDomain, messageId };
}
