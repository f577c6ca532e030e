import { z } from 'zod';
import type { IdentityRecord, DomainRef } from './types.js';

// Keystone v3 token body. Missing or null scalar fields decode to zero values; a
// wrong type is a decode failure. Sub-records stay nullable so that presence survives.

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const flag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

const DomainSchema = z.object({
  id: text,
  name: text,
  enabled: flag,
});

const UserSchema = z.object({
  id: text,
  name: text,
  email: text,
  enabled: flag,
  domain_id: z.string().nullish(),
  domain: DomainSchema.nullish(),
});

const ProjectSchema = z.object({
  id: text,
  name: text,
  enabled: flag,
  domain_id: z.string().nullish(),
  domain: DomainSchema.nullish(),
});

const RoleSchema = z.object({
  id: text,
  name: text,
});

export const TokenSchema = z.object({
  expires_at: text,
  issued_at: text,
  user: UserSchema.nullish(),
  project: ProjectSchema.nullish(),
  domain: DomainSchema.nullish(),
  roles: z.array(RoleSchema).nullish(),
});

export const AuthorityErrorSchema = z.object({
  code: z.number().int().nullish(),
  message: text,
  title: text,
});

export const AuthResponseSchema = z.object({
  token: TokenSchema.nullish(),
  error: AuthorityErrorSchema.nullish(),
});

export type TokenBody = z.infer<typeof TokenSchema>;
export type AuthResponse = z.infer<typeof AuthResponseSchema>;

function toDomainRef(domain: { id: string; name: string }): DomainRef {
  return { id: domain.id, name: domain.name };
}

/**
 * Map the authority's snake_case token body onto an IdentityRecord.
 * `domain_id` falls back to the nested `domain.id` when the authority omits it.
 */
export function toIdentityRecord(token: TokenBody): IdentityRecord {
  const user = token.user;
  const identity: IdentityRecord = {
    expiresAt: token.expires_at,
    issuedAt: token.issued_at,
    user: {
      id: user?.id ?? '',
      name: user?.name ?? '',
      email: user?.email ?? '',
      enabled: user?.enabled ?? false,
      domainId: user?.domain_id ?? user?.domain?.id ?? '',
      domainName: user?.domain?.name ?? '',
    },
  };

  if (token.project) {
    const project = token.project;
    identity.project = {
      id: project.id,
      name: project.name,
      enabled: project.enabled,
      domainId: project.domain_id ?? project.domain?.id ?? '',
    };
    if (project.domain) {
      identity.project.domain = toDomainRef(project.domain);
    }
  }

  if (token.domain) {
    identity.domain = toDomainRef(token.domain);
  }

  if (token.roles) {
    identity.roles = token.roles.map((role) => ({ id: role.id, name: role.name }));
  }

  return identity;
}

const DomainRefSchema = z.object({ id: z.string(), name: z.string() });

/** Shape of an IdentityRecord persisted by a cache. */
export const IdentityRecordSchema = z.object({
  expiresAt: z.string(),
  issuedAt: z.string(),
  user: z.object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
    enabled: z.boolean(),
    domainId: z.string(),
    domainName: z.string(),
  }),
  project: z
    .object({
      id: z.string(),
      name: z.string(),
      enabled: z.boolean(),
      domainId: z.string(),
      domain: DomainRefSchema.optional(),
    })
    .optional(),
  domain: DomainRefSchema.optional(),
  roles: z.array(z.object({ id: z.string(), name: z.string() })).optional(),
});
