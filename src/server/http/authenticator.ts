import type { IncomingMessage } from 'node:http';

export const USER_ID_HEADER = 'x-pos-user-id';

/** Resolves the calling user id, or null for an anonymous request. */
export interface RequestAuthenticator {
  authenticate(req: IncomingMessage): string | null;
}

/**
 * Trusts a user id set by the gateway in front of this service.
 */
export function createHeaderAuthenticator(header: string = USER_ID_HEADER): RequestAuthenticator {
  const name = header.toLowerCase();
  return {
    authenticate(req) {
      const value = req.headers[name];
      const first = Array.isArray(value) ? value[0] : value;
      const userId = String(first ?? '').trim();
      return userId || null;
    },
  };
}
