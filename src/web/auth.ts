/**
 * Bearer token check for HTTP routes and WebSocket upgrades.
 */

import type { IncomingMessage } from 'http';
import { timingSafeEqual } from 'crypto';
import type { ApiToken } from '../types.js';

export interface Caller {
  ownerId: string;
}

export interface Authenticator {
  authenticate(token: string): Caller | null;
}

/**
 * Tokens listed in config, each mapped to an owner.
 */
export class StaticTokenAuthenticator implements Authenticator {
  private tokens: ApiToken[];

  constructor(tokens: ApiToken[]) {
    this.tokens = tokens;
  }

  authenticate(token: string): Caller | null {
    if (!token) return null;
    const presented = Buffer.from(token, 'utf8');
    for (const entry of this.tokens) {
      const expected = Buffer.from(entry.token, 'utf8');
      if (expected.length === presented.length && timingSafeEqual(expected, presented)) {
        return { ownerId: entry.owner };
      }
    }
    return null;
  }
}

/**
 * Token from "Authorization: Bearer <token>", or the `token` query parameter
 * for browsers that cannot set headers on a WebSocket.
 */
export function extractToken(req: Pick<IncomingMessage, 'headers' | 'url'>): string {
  const header = req.headers.authorization;
  if (header && header.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim();
  }
  const url = new URL(req.url || '/', 'http://localhost');
  return url.searchParams.get('token') ?? '';
}
