/**
 * Bearer-token authentication for the MCP endpoint.
 *
 * Produces the caller's verified scope set from a static token map, the
 * single access token or an HS256 JWT.
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { NextFunction, Request, Response } from 'express';
import { jwtVerify } from 'jose';
import { ADMIN_SCOPE } from '../constants.js';
import { AuthenticationError, ErrorCode, Errors } from '../errors/index.js';
import type { GatewaySettings } from '../config/settings.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';

export interface Credential {
  scheme: string;
  token: string;
}

export interface AuthContext {
  credential: Credential;
  scopes: Set<string>;
}

function headerValues(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * First `Bearer` credential across every Authorization value (each may hold a
 * comma-separated list), else the `X-Access-Token` header.
 */
export function extractCredential(headers: IncomingHttpHeaders): Credential | undefined {
  for (const headerValue of headerValues(headers.authorization)) {
    for (const candidate of headerValue.split(',')) {
      const trimmed = candidate.trim();
      if (!trimmed) continue;

      const separator = trimmed.indexOf(' ');
      if (separator === -1) continue;

      const scheme = trimmed.slice(0, separator);
      const token = trimmed.slice(separator + 1).trim();
      if (scheme.toLowerCase() === 'bearer' && token) {
        return { scheme, token };
      }
    }
  }

  const fallback = headerValues(headers['x-access-token'])[0]?.trim();
  if (fallback) {
    logger.debug('Using X-Access-Token fallback header for authentication');
    return { scheme: 'X-Access-Token', token: fallback };
  }

  return undefined;
}

function compareSecret(expected: string, provided: string): boolean {
  if (!expected) return false;
  const expectedBuffer = Buffer.from(expected, 'utf8');
  const providedBuffer = Buffer.from(provided, 'utf8');
  if (expectedBuffer.length !== providedBuffer.length) {
    return false;
  }
  return timingSafeEqual(expectedBuffer, providedBuffer);
}

export class Authenticator {
  private readonly jwtKey?: Uint8Array;

  constructor(private readonly settings: Pick<GatewaySettings, 'accessToken' | 'tokenScopes' | 'jwt'>) {
    if (settings.jwt) {
      this.jwtKey = new TextEncoder().encode(settings.jwt.secret);
    }
  }

  /**
   * Resolve the scope set for a token, or reject it.
   */
  async verify(token: string): Promise<Set<string>> {
    const tokenScopes = this.settings.tokenScopes;
    if (tokenScopes && Object.hasOwn(tokenScopes, token)) {
      return new Set(tokenScopes[token]);
    }

    if (compareSecret(this.settings.accessToken, token)) {
      return new Set([ADMIN_SCOPE]);
    }

    if (this.jwtKey && this.settings.jwt) {
      try {
        const { payload } = await jwtVerify(token, this.jwtKey, {
          algorithms: ['HS256'],
          issuer: this.settings.jwt.issuer,
          audience: this.settings.jwt.audience
        });
        const scopes = (typeof payload.scope === 'string' ? payload.scope : '').split(/\s+/).filter(Boolean);
        if (scopes.length > 0) {
          return new Set(scopes);
        }
        logger.warn('Authentication failed: token carries no scopes', { subject: payload.sub });
      } catch (error) {
        logger.debug('JWT verification failed', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    logger.warn('Authentication failed: invalid token provided');
    throw Errors.invalidCredential();
  }

  async authenticate(headers: IncomingHttpHeaders): Promise<AuthContext> {
    const credential = extractCredential(headers);
    if (!credential) {
      throw Errors.missingCredential();
    }
    const scopes = await this.verify(credential.token);
    return { credential, scopes };
  }
}

const authContexts = new WeakMap<Request, AuthContext>();

/**
 * Verified caller of a request that passed the auth middleware.
 */
export function getAuthContext(req: Request): AuthContext | undefined {
  return authContexts.get(req);
}

export function createAuthMiddleware(authenticator: Authenticator) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      authContexts.set(req, await authenticator.authenticate(req.headers));
      next();
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        next(error);
        return;
      }
      metrics.increment(MetricNames.AUTH_FAILURES);
      if (error.code === ErrorCode.MISSING_CREDENTIAL) {
        res.set('WWW-Authenticate', 'Bearer');
      }
      res.status(error.httpStatus).json({ detail: error.message });
    }
  };
}
