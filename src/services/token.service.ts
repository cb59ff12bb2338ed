/**
 * Token Codec
 *
 * A session token is a JWT: HEADER.PAYLOAD.SIGNATURE
 *
 * PAYLOAD: { sub: user id, iat: issued at, exp: expiry } (seconds)
 * SIGNATURE: HMAC-SHA256 over header and payload with our secret key.
 *
 * Tokens are stateless. Validity is the signature plus the time window,
 * nothing is stored server-side. Rotating the secret invalidates every
 * token issued before.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { ExpiredTokenError, InvalidTokenError } from '../utils/errors';
import { parsePositiveInt } from '../utils/validation.utils';

const ALGORITHM = 'HS256';

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenCodecOptions {
  secret: string;
  expiresInSeconds: number;
}

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class TokenCodec {
  private readonly secret: string;
  private readonly expiresInSeconds: number;

  constructor(options: TokenCodecOptions) {
    if (!options.secret) {
      throw new Error('TokenCodec requires a signing secret');
    }
    this.secret = options.secret;
    this.expiresInSeconds = options.expiresInSeconds;
  }

  issue(subjectId: number, now: Date = new Date()): IssuedToken {
    const issuedAt = toSeconds(now);
    const expiresAt = issuedAt + this.expiresInSeconds;

    const token = jwt.sign({ sub: String(subjectId), iat: issuedAt, exp: expiresAt }, this.secret, {
      algorithm: ALGORITHM,
    });

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  /**
   * @returns the subject (user id)
   * @throws InvalidTokenError malformed token, bad signature, unexpected claims
   * @throws ExpiredTokenError signature is fine but `now` is past `exp`
   */
  decode(token: string, now: Date = new Date()): number {
    let payload: string | JwtPayload;
    try {
      // jsonwebtoken checks the signature before it looks at exp
      payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toSeconds(now),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredTokenError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new InvalidTokenError();
      }
      throw error;
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number') {
      throw new InvalidTokenError();
    }
    const subjectId = parsePositiveInt(payload.sub);
    if (subjectId === null) {
      throw new InvalidTokenError();
    }
    return subjectId;
  }
}
