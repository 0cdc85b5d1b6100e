import { monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

export type IdFactory = () => string;

export function generateUlid(): string {
  return ulid();
}

/**
 * Independent monotonic generator. Ids from one factory are strictly
 * increasing even when minted within the same millisecond.
 */
export function createIdFactory(): IdFactory {
  const next = monotonicFactory();
  return () => next();
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}
