/**
 * Structured console logging: one JSON object per line.
 *
 * Shape: { level, event, ts, ...fields }. An `error` field holding a thrown
 * value is flattened to its message so log lines stay serializable.
 */

export type LogLevel = 'info' | 'warn' | 'error';

/** Extra context attached to a log line (ids, counts, handles). */
export type LogFields = Record<string, unknown>;

function write(level: LogLevel, event: string, fields: LogFields): void {
  const entry: LogFields = { level, event, ts: new Date().toISOString() };

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    entry[key] = value instanceof Error ? value.message : value;
  }

  const line = JSON.stringify(entry);

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(event: string, fields: LogFields = {}): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields: LogFields = {}): void {
  write('warn', event, fields);
}

export function logError(event: string, fields: LogFields = {}): void {
  write('error', event, fields);
}
