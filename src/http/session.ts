import { createHash, randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Session id for a request: `X-Session-ID` when sent, otherwise stable per
 * credential (`token-` + 16 hex chars of its SHA-256), otherwise random.
 */
export function deriveSessionId(headers: IncomingHttpHeaders): string {
  const explicit = firstHeader(headers['x-session-id']);
  if (explicit) {
    return explicit;
  }

  let tokenSource: string | undefined;
  const authorization = firstHeader(headers.authorization);
  if (authorization) {
    const parts = authorization.split(/\s+/);
    tokenSource = parts.length === 2 ? parts[1] : authorization;
  }
  if (!tokenSource) {
    tokenSource = firstHeader(headers['x-access-token']);
  }

  if (tokenSource) {
    const digest = createHash('sha256').update(tokenSource, 'utf8').digest('hex');
    return `token-${digest.slice(0, 16)}`;
  }

  return randomUUID();
}
