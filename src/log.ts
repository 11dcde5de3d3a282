/**
 * Structured logging — one JSON object per line on stdout.
 */

export type LogFields = Record<string, unknown>;

/** Write a single `{ event, ...fields }` line. */
export function logEvent(event: string, fields: LogFields = {}): void {
  console.log(JSON.stringify({ event, ...fields }));
}
