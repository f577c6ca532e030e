import type { IdentityRecord } from './types.js';

/**
 * Mutable header collection. Node's IncomingHttpHeaders fits this shape, with
 * lower-cased names.
 */
export type MutableHeaders = Record<string, string | string[] | undefined>;

export const AUTH_TOKEN_HEADER = 'X-Auth-Token';
export const IDENTITY_STATUS_HEADER = 'X-Identity-Status';

export type IdentityStatus = 'Confirmed' | 'Invalid';

/**
 * Identity assertions the middleware owns. Anything a caller sends under one
 * of these names is dropped before a trust decision is made.
 */
export const IDENTITY_HEADER_DENY_LIST: readonly string[] = [
  'X-Identity-Status',
  'X-Service-Identity-Status',

  'X-Domain-Id',
  'X-Service-Domain-Id',

  'X-Domain-Name',
  'X-Service-Domain-Name',

  'X-Project-Id',
  'X-Service-Project-Id',

  'X-Project-Name',
  'X-Service-Project-Name',

  'X-Project-Domain-Id',
  'X-Service-Project-Domain-Id',

  'X-Project-Domain-Name',
  'X-Service-Project-Domain-Name',

  'X-User-Id',
  'X-Service-User-Id',

  'X-User-Name',
  'X-Service-User-Name',

  'X-User-Domain-Id',
  'X-Service-User-Domain-Id',

  'X-User-Domain-Name',
  'X-Service-User-Domain-Name',

  'X-Roles',
  'X-Service-Roles',

  'X-Service-Catalog',

  // deprecated
  'X-Tenant-Id',
  'X-Tenant',
  'X-User',
  'X-Role',
];

const DENIED = new Set(IDENTITY_HEADER_DENY_LIST.map((name) => name.toLowerCase()));

export function sanitizeIdentityHeaders(headers: MutableHeaders): void {
  for (const name of Object.keys(headers)) {
    if (DENIED.has(name.toLowerCase())) {
      delete headers[name];
    }
  }
}

/**
 * Case-insensitive lookup; the first value wins when the header is repeated.
 */
export function getHeader(headers: MutableHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Replace every casing of `name` with a single lower-cased entry.
 */
export function setHeader(headers: MutableHeaders, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key !== lower && key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
  headers[lower] = value;
}

export function projectIdentityHeaders(identity: IdentityRecord): Record<string, string> {
  const headers: Record<string, string> = {
    'X-User-Id': identity.user.id,
    'X-User-Domain-Id': identity.user.domainId,
    'X-User-Domain-Name': identity.user.domainName,
  };

  const { project, domain, roles } = identity;

  if (project) {
    headers['X-Project-Name'] = project.name;
    headers['X-Project-Id'] = project.id;
    headers['X-Project-Domain-Name'] = project.domain?.name ?? '';
    headers['X-Project-Domain-Id'] = project.domainId;
  }

  if (domain) {
    headers['X-Domain-Id'] = domain.id;
    headers['X-Domain-Name'] = domain.name;
  }

  // An empty list still asserts "no roles"; only an absent list omits the header
  if (roles) {
    headers['X-Roles'] = roles.map((role) => role.name).join(',');
  }

  return headers;
}
