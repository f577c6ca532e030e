import { describe, it, expect } from 'vitest';
import {
  IDENTITY_HEADER_DENY_LIST,
  getHeader,
  projectIdentityHeaders,
  sanitizeIdentityHeaders,
  setHeader,
  type MutableHeaders,
} from '../src/identity/headers.js';
import { makeIdentity } from './helpers.js';

describe('sanitizeIdentityHeaders', () => {
  it('should remove every deny-listed header regardless of case', () => {
    const headers: MutableHeaders = {};
    for (const name of IDENTITY_HEADER_DENY_LIST) {
      headers[name] = 'forged';
      headers[name.toLowerCase()] = 'forged';
    }

    sanitizeIdentityHeaders(headers);

    expect(headers).toEqual({});
  });

  it('should keep unrelated headers and the credential header', () => {
    const headers: MutableHeaders = {
      'x-auth-token': 'test-token',
      'content-type': 'application/json',
      'x-user-id': 'forged-user',
      'x-roles': 'admin',
      'x-service-catalog': '[]',
      'x-tenant': 'forged-tenant',
    };

    sanitizeIdentityHeaders(headers);

    expect(headers).toEqual({
      'x-auth-token': 'test-token',
      'content-type': 'application/json',
    });
  });

  it('should be idempotent', () => {
    const headers: MutableHeaders = { accept: '*/*', 'x-identity-status': 'Confirmed' };

    sanitizeIdentityHeaders(headers);
    sanitizeIdentityHeaders(headers);

    expect(headers).toEqual({ accept: '*/*' });
  });

  it('should cover the service-identity and deprecated variants', () => {
    expect(IDENTITY_HEADER_DENY_LIST).toContain('X-Service-Identity-Status');
    expect(IDENTITY_HEADER_DENY_LIST).toContain('X-Service-Roles');
    expect(IDENTITY_HEADER_DENY_LIST).toContain('X-Tenant-Id');
    expect(IDENTITY_HEADER_DENY_LIST).toContain('X-Role');
    expect(IDENTITY_HEADER_DENY_LIST).not.toContain('X-Auth-Token');
  });
});

describe('getHeader / setHeader', () => {
  it('should read headers case-insensitively', () => {
    expect(getHeader({ 'X-Auth-Token': 'abc' }, 'x-auth-token')).toBe('abc');
    expect(getHeader({ 'x-auth-token': 'abc' }, 'X-Auth-Token')).toBe('abc');
  });

  it('should take the first value of a repeated header', () => {
    expect(getHeader({ 'x-auth-token': ['first', 'second'] }, 'X-Auth-Token')).toBe('first');
  });

  it('should return undefined for missing headers', () => {
    expect(getHeader({ accept: 'text/plain' }, 'X-Auth-Token')).toBeUndefined();
  });

  it('should replace every casing with one lower-cased entry', () => {
    const headers: MutableHeaders = { 'X-Identity-Status': 'Confirmed', other: 'kept' };

    setHeader(headers, 'X-Identity-Status', 'Invalid');

    expect(headers).toEqual({ other: 'kept', 'x-identity-status': 'Invalid' });
  });
});

describe('projectIdentityHeaders', () => {
  it('should emit only user headers for an unscoped token', () => {
    expect(projectIdentityHeaders(makeIdentity())).toEqual({
      'X-User-Id': 'u1',
      'X-User-Domain-Id': 'd1',
      'X-User-Domain-Name': 'Default',
    });
  });

  it('should emit project headers for a project-scoped token', () => {
    const headers = projectIdentityHeaders(
      makeIdentity({
        project: {
          id: 'p1',
          name: 'demo',
          enabled: true,
          domainId: 'pd1',
          domain: { id: 'pd1', name: 'Projects' },
        },
      })
    );

    expect(headers).toEqual({
      'X-User-Id': 'u1',
      'X-User-Domain-Id': 'd1',
      'X-User-Domain-Name': 'Default',
      'X-Project-Name': 'demo',
      'X-Project-Id': 'p1',
      'X-Project-Domain-Name': 'Projects',
      'X-Project-Domain-Id': 'pd1',
    });
  });

  it('should emit an empty project domain name when the project has no domain record', () => {
    const headers = projectIdentityHeaders(
      makeIdentity({ project: { id: 'p1', name: 'demo', enabled: true, domainId: 'pd1' } })
    );

    expect(headers['X-Project-Domain-Name']).toBe('');
    expect(headers['X-Project-Domain-Id']).toBe('pd1');
  });

  it('should emit domain headers for a domain-scoped token', () => {
    const headers = projectIdentityHeaders(makeIdentity({ domain: { id: 'd9', name: 'Ops' } }));

    expect(headers['X-Domain-Id']).toBe('d9');
    expect(headers['X-Domain-Name']).toBe('Ops');
    expect(headers).not.toHaveProperty('X-Project-Id');
  });

  it('should join role names in order', () => {
    const headers = projectIdentityHeaders(
      makeIdentity({
        roles: [
          { id: 'r2', name: 'member' },
          { id: 'r1', name: 'admin' },
          { id: 'r3', name: 'reader' },
        ],
      })
    );

    expect(headers['X-Roles']).toBe('member,admin,reader');
  });

  it('should emit an empty X-Roles for a present but empty role list', () => {
    expect(projectIdentityHeaders(makeIdentity({ roles: [] }))['X-Roles']).toBe('');
  });

  it('should omit X-Roles when roles are absent', () => {
    expect(projectIdentityHeaders(makeIdentity())).not.toHaveProperty('X-Roles');
  });

  it('should pass empty strings through for present sub-records', () => {
    const headers = projectIdentityHeaders(makeIdentity({ domain: { id: '', name: '' } }));

    expect(headers['X-Domain-Id']).toBe('');
    expect(headers['X-Domain-Name']).toBe('');
  });

  it('should be deterministic', () => {
    const identity = makeIdentity({ roles: [{ id: 'r1', name: 'admin' }] });

    expect(projectIdentityHeaders(identity)).toEqual(projectIdentityHeaders(identity));
  });
});
