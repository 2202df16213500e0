// packages/docket-cli/src/output.ts
export const SCHEMA_VERSION = 'v1';

export interface SuccessEnvelope<T> {
  schema_version: typeof SCHEMA_VERSION;
  ok: true;
  data: T;
}

export interface ErrorEnvelope {
  schema_version: typeof SCHEMA_VERSION;
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    suggestions?: string[];
  };
}

export function createSuccessEnvelope<T>(data: T): SuccessEnvelope<T> {
  return {
    schema_version: SCHEMA_VERSION,
    ok: true,
    data,
  };
}

export function createErrorEnvelope(code: string, message: string, details?: unknown, suggestions?: string[]): ErrorEnvelope {
  return {
    schema_version: SCHEMA_VERSION,
    ok: false,
    error: {
      code,
      message,
      ...(details !== undefined ? { details } : {}),
      ...(suggestions && suggestions.length > 0 ? { suggestions } : {}),
    },
  };
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(createSuccessEnvelope(data)));
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function printTable(rows: Record<string, unknown>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log('No results');
    return;
  }
  const cols = columns ?? Object.keys(rows[0]);
  console.log(cols.join('\t'));
  for (const row of rows) {
    console.log(cols.map(c => formatCell(row[c])).join('\t'));
  }
}

/** Merge, purge and micro-session notices go to stderr. */
export function printNotices(notices: string[]): void {
  for (const notice of notices) {
    console.error(`Warning: ${notice}`);
  }
}

export function formatTimestamp(ts: number | null): string {
  if (ts === null) return '';
  return new Date(ts * 1000).toISOString().replace('.000Z', 'Z');
}

export function formatDuration(secs: number): string {
  const h = Math.floor(secs / 3600);
  const m = Math.floor((secs % 3600) / 60);
  const s = secs % 60;
  if (h > 0) return `${h}h ${String(m).padStart(2, '0')}m`;
  if (m > 0) return `${m}m ${String(s).padStart(2, '0')}s`;
  return `${s}s`;
}
