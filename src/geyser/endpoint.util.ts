export const DEFAULT_SECURE_PORT = 443;

/** Append the secure port to a `host` without one; `host:port` is returned unchanged. */
export function resolveEndpoint(endpoint: string): string {
  const trimmed = endpoint.trim();
  if (trimmed.includes(':')) return trimmed;
  return `${trimmed}:${DEFAULT_SECURE_PORT}`;
}
