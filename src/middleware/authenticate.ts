import type { Logger } from 'pino';
import type { IdentityCache } from '../cache/types.js';
import {
  AUTH_TOKEN_HEADER,
  IDENTITY_STATUS_HEADER,
  getHeader,
  projectIdentityHeaders,
  sanitizeIdentityHeaders,
  setHeader,
  type MutableHeaders,
} from '../identity/headers.js';
import { tokenFingerprint } from '../identity/fingerprint.js';
import type { IdentityRecord, ValidationResult } from '../identity/types.js';

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface TokenValidator {
  validate(token: string, signal?: AbortSignal): Promise<ValidationResult>;
}

/**
 * The part of an inbound request the middleware reads and rewrites.
 * `signal` aborts the identity call when the caller goes away.
 */
export interface AuthRequest {
  headers: MutableHeaders;
  signal?: AbortSignal;
}

export type AuthOutcome =
  | { status: 'confirmed'; source: 'cache' | 'authority' }
  | { status: 'invalid'; reason: 'no_token' | 'validation_failed' };

export interface IdentityMiddlewareOptions {
  validator: TokenValidator;
  logger: Logger;
  /** `null` or omitted disables caching */
  cache?: IdentityCache | null;
  cacheTtlMs?: number;
}

/**
 * Asserts identity headers on a request and then hands it on. It never
 * rejects a request: a missing or unconfirmed token only leaves
 * `X-Identity-Status: Invalid` for the downstream handler to act on.
 */
export class IdentityMiddleware {
  private readonly validator: TokenValidator;
  private readonly cache: IdentityCache | null;
  private readonly cacheTtlMs: number;
  private readonly logger: Logger;

  constructor(options: IdentityMiddlewareOptions) {
    this.validator = options.validator;
    this.cache = options.cache ?? null;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.logger = options.logger;
  }

  /**
   * Authenticate `request`, then invoke `next` exactly once whatever happened.
   */
  async handle<T>(request: AuthRequest, next: () => T | Promise<T>): Promise<T> {
    try {
      const outcome = await this.authenticate(request);
      this.logger.debug({ outcome }, 'Identity assertion complete');
    } catch (err) {
      this.logger.error({ err }, 'Identity assertion failed, continuing unauthenticated');
      sanitizeIdentityHeaders(request.headers);
      setHeader(request.headers, IDENTITY_STATUS_HEADER, 'Invalid');
    }
    return next();
  }

  async authenticate(request: AuthRequest): Promise<AuthOutcome> {
    const { headers } = request;

    sanitizeIdentityHeaders(headers);
    setHeader(headers, IDENTITY_STATUS_HEADER, 'Invalid');

    const token = getHeader(headers, AUTH_TOKEN_HEADER);
    if (!token) {
      return { status: 'invalid', reason: 'no_token' };
    }

    const tokenHash = tokenFingerprint(token);
    let identity = await this.lookup(token, tokenHash);
    let source: 'cache' | 'authority' = 'cache';

    if (!identity) {
      const result = await this.validator.validate(token, request.signal);
      if (!result.ok) {
        this.logger.warn(
          { tokenHash, kind: result.error.kind, error: result.error.message, err: result.error },
          'Failed to validate token'
        );
        return { status: 'invalid', reason: 'validation_failed' };
      }
      identity = result.identity;
      source = 'authority';
    }

    await this.store(token, identity, tokenHash);

    setHeader(headers, IDENTITY_STATUS_HEADER, 'Confirmed');
    for (const [name, value] of Object.entries(projectIdentityHeaders(identity))) {
      setHeader(headers, name, value);
    }

    return { status: 'confirmed', source };
  }

  private async lookup(token: string, tokenHash: string): Promise<IdentityRecord | undefined> {
    if (!this.cache) return undefined;

    try {
      const identity = await this.cache.get(token);
      if (identity) {
        this.logger.debug({ tokenHash }, 'Token identity served from cache');
      }
      return identity;
    } catch (err) {
      this.logger.error({ err, tokenHash }, 'Failed to read identity cache');
      return undefined;
    }
  }

  // Every success rewrites the entry, so the TTL restarts from now
  private async store(token: string, identity: IdentityRecord, tokenHash: string): Promise<void> {
    if (!this.cache) return;

    try {
      await this.cache.set(token, identity, this.cacheTtlMs);
    } catch (err) {
      this.logger.error({ err, tokenHash }, 'Failed to store identity in cache');
    }
  }
}
