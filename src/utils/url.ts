// URL helpers for the fetch tool
// Syntax checks only; nothing here touches the network.

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1']);
const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

function isLoopbackPrefix(value: string): boolean {
  const lower = value.toLowerCase();
  for (const host of LOOPBACK_HOSTS) {
    if (lower === host || lower.startsWith(`${host}:`) || lower.startsWith(`${host}/`)) {
      return true;
    }
  }
  return false;
}

/**
 * Bare loopback addresses get an `http://` scheme and `https://` loopback
 * URLs are downgraded, since local services rarely terminate TLS.
 * Anything else is returned trimmed but otherwise untouched.
 */
export function normalizeUrl(raw: string): string {
  const value = raw.trim();

  if (isLoopbackPrefix(value)) {
    return `http://${value}`;
  }

  const parsed = tryParseUrl(value);
  if (parsed && parsed.protocol === 'https:' && LOOPBACK_HOSTS.has(parsed.hostname)) {
    parsed.protocol = 'http:';
    return parsed.toString();
  }

  return value;
}

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export function validateUrl(value: string): boolean {
  const parsed = tryParseUrl(value);
  if (!parsed) return false;
  return ALLOWED_PROTOCOLS.has(parsed.protocol) && parsed.hostname.length > 0;
}

export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}
