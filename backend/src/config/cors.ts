import { config, isDevelopment } from './app.js';

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }
  try {
    const url = new URL(trimmed);
    const port = url.port ? `:${url.port}` : '';
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

function isLoopbackOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    return ['localhost', '127.0.0.1', '[::1]'].includes(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

export interface OriginPolicy {
  allowed: string[];
  isAllowed(origin?: string | null): boolean;
}

/**
 * Origins come from a comma-separated list. Requests without an Origin header
 * (curl, server-to-server) pass; loopback origins pass in development.
 */
export function createOriginPolicy(list: string = config.CORS_ORIGIN, allowLoopback: boolean = isDevelopment): OriginPolicy {
  const allowed = new Set(
    list
      .split(',')
      .map((origin) => normalizeOrigin(origin))
      .filter(Boolean)
  );

  return {
    allowed: Array.from(allowed),
    isAllowed(origin?: string | null): boolean {
      if (!origin) {
        return true;
      }
      if (allowed.has(normalizeOrigin(origin))) {
        return true;
      }
      return allowLoopback && isLoopbackOrigin(origin);
    }
  };
}
