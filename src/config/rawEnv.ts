export function getEnv(name: string, fallback?: string): string | undefined {
  const value = process.env[name];
  if (value == null || value.trim() === "") {
    return fallback;
  }
  return value.trim();
}
