import { generateUlid } from '@tallyplan/shared';

/** Identifies the caller of one operation; passed explicitly to every command and query. */
export interface RequestContext {
  userId: string;
  requestId: string;
}

export function createRequestContext(userId: string, requestId: string = generateUlid()): RequestContext {
  return { userId, requestId };
}
