/**
 * 環境変数の読み取りヘルパー
 */

export function readIntEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer (got "${raw}")`);
  }
  return value;
}

export function readNumberEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return value;
}

export function readOptionalEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}
