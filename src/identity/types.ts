import type { ValidationError } from './errors.js';

export interface DomainRef {
  id: string;
  name: string;
}

export interface IdentityUser {
  id: string;
  name: string;
  email: string;
  enabled: boolean;
  domainId: string;
  domainName: string;
}

export interface IdentityProject {
  id: string;
  name: string;
  enabled: boolean;
  domainId: string;
  domain?: DomainRef;
}

export interface IdentityRole {
  id: string;
  name: string;
}

/**
 * Normalized token context returned by the identity authority.
 *
 * `project`, `domain` and `roles` are only set when the authority sent them;
 * a present sub-record with empty fields is not the same as an absent one.
 */
export interface IdentityRecord {
  expiresAt: string;
  issuedAt: string;
  user: IdentityUser;
  project?: IdentityProject;
  domain?: DomainRef;
  roles?: IdentityRole[];
}

export interface ValidatorConfig {
  endpoint: string;
  timeoutMs: number;
  userAgent: string;
}

export type ValidationResult =
  | { ok: true; identity: IdentityRecord }
  | { ok: false; error: ValidationError };
