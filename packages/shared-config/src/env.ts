import dotenv from 'dotenv';
import path from 'path';

// Load .env from root (works with CommonJS output)
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

/**
 * Read a numeric environment variable, falling back when unset or not a finite number
 */
export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function envInt(name: string, fallback: number): number {
  return Math.trunc(envNumber(name, fallback));
}

export function envList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
