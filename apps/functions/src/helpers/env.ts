export function requireEnv(name: string, defaultValue?: string): string {
  const value = process.env[name]?.trim();
  if (value) return value;
  if (defaultValue !== undefined) return defaultValue;
  throw new Error(`Missing required environment variable: ${name}`);
}
