import { createHash } from 'crypto';

export function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Short, non-reversible token identifier for log correlation. */
export function tokenFingerprint(token: string): string {
  return sha256(token).substring(0, 8);
}
