/**
 * Server-sent event framing for relayed streams.
 *
 * @packageDocumentation
 */

import type { ProxyError } from '../errors.js';

/** Terminal frame after a naturally completed stream. */
export const DONE_FRAME = 'data: [DONE]\n\n';

export const SSE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
});

export function formatDataFrame(payload: string): string {
  return `data: ${payload}\n\n`;
}

/**
 * Frame sent in place of `[DONE]` when the upstream fails mid-stream.
 */
export function formatErrorFrame(error: ProxyError): string {
  return formatDataFrame(JSON.stringify({ error: error.toDetail() }));
}
