/**
 * Environment variable helpers
 */

export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === '' ? undefined : value;
}
