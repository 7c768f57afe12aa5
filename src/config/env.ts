export type Env = Record<string, string | undefined>;

export function parseEnvString(env: Env, key: string, defaultValue = ""): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

export function parseEnvList(env: Env, key: string): string[] {
  return (env[key] || "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}

export function parseEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true";
}

export function parseEnvInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function parseEnvFloat(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}
