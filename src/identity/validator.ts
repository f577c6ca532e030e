import type { Logger } from 'pino';
import { AuthResponseSchema, toIdentityRecord, type AuthResponse } from './schema.js';
import { AuthorityError, DecodeError, ProtocolError, TransportError } from './errors.js';
import { tokenFingerprint } from './fingerprint.js';
import type { ValidationResult, ValidatorConfig } from './types.js';

export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_USER_AGENT = 'keystone-gate/1.0';

function statusLine(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

function describeTransportFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return `identity authority did not respond within ${timeoutMs}ms`;
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return 'identity request aborted by caller';
  }
  const reason = err instanceof Error ? err.message : String(err);
  return `identity authority unreachable: ${reason}`;
}

/**
 * Validates tokens against a Keystone v3 endpoint with a single
 * `GET /auth/tokens?nocatalog` call. The token authenticates the call and is
 * also the subject being introspected.
 */
export class IdentityValidator {
  private readonly tokensUrl: string;
  private readonly config: ValidatorConfig;
  private readonly logger: Logger;

  constructor(config: ValidatorConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.tokensUrl = `${config.endpoint.replace(/\/+$/, '')}/auth/tokens?nocatalog`;
  }

  async validate(token: string, signal?: AbortSignal): Promise<ValidationResult> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.tokensUrl, {
        method: 'GET',
        headers: {
          'X-Auth-Token': token,
          'X-Subject-Token': token,
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
        },
        signal: requestSignal,
      });
      body = await response.text();
    } catch (err) {
      return {
        ok: false,
        error: new TransportError(describeTransportFailure(err, this.config.timeoutMs), err),
      };
    }

    let decoded: AuthResponse;
    try {
      const json: unknown = JSON.parse(body);
      // A literal null body carries neither a token nor an error
      const parsed = AuthResponseSchema.safeParse(json === null ? {} : json);
      if (!parsed.success) {
        return {
          ok: false,
          error: new DecodeError(
            `unexpected identity response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
            parsed.error
          ),
        };
      }
      decoded = parsed.data;
    } catch (err) {
      return { ok: false, error: new DecodeError('identity response is not valid JSON', err) };
    }

    if (decoded.error) {
      return {
        ok: false,
        error: new AuthorityError(
          statusLine(response),
          decoded.error.message,
          decoded.error.code ?? undefined
        ),
      };
    }
    if (response.status !== 200) {
      return { ok: false, error: new AuthorityError(statusLine(response)) };
    }
    if (!decoded.token) {
      return { ok: false, error: new ProtocolError('response missing token context') };
    }

    const identity = toIdentityRecord(decoded.token);
    this.logger.debug(
      { tokenHash: tokenFingerprint(token), userId: identity.user.id, expiresAt: identity.expiresAt },
      'Token validated with identity authority'
    );
    return { ok: true, identity };
  }
}
