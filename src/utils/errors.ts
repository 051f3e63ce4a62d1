// src/utils/errors.ts
import { jsonStringifySafeBigint } from './json.js';

const REDACT_PATTERNS = [
  /(secret|token|proof)=([A-Za-z0-9._-]+)/gi,
];

export function redact(s: string): string {
  let out = s;
  for (const re of REDACT_PATTERNS) out = out.replace(re, (_m, k: string) => `${k}=***`);
  return out;
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      ...(code ? { code } : {}),
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

export function describeError(err: unknown): string {
  const info = normalizeError(err);
  return redact(jsonStringifySafeBigint({ name: info.name, message: info.message }));
}
