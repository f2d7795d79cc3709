/**
 * WOPI Token Service
 *
 * Generates and validates WOPI access tokens for file operations.
 * A token names the file and the user it was issued for, whether the
 * user may edit it, and the file version seen when it was opened.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

export interface AccessTokenClaims {
    ruid: string;
    rgid: string;
    filename: string;
    canedit: boolean;
    // File modification time when the token was issued
    mtime: number;
}

export interface AccessTokenPayload extends AccessTokenClaims {
    exp: number;
    iat?: number;
}

const payloadSchema = z.object({
    ruid: z.string(),
    rgid: z.string(),
    filename: z.string(),
    canedit: z.boolean(),
    mtime: z.number(),
    exp: z.number(),
    iat: z.number().optional(),
});

export class AccessTokenError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AccessTokenError';
    }
}

/**
 * Generate an access token valid for validitySeconds
 */
export function generateAccessToken(
    claims: AccessTokenClaims,
    secret: string,
    validitySeconds: number
): { token: string; exp: number } {
    const exp = Math.floor(Date.now() / 1000) + validitySeconds;

    const token = jwt.sign(
        {
            ruid: claims.ruid,
            rgid: claims.rgid,
            filename: claims.filename,
            canedit: claims.canedit,
            mtime: claims.mtime,
            exp,
        },
        secret,
        { algorithm: 'HS256' }
    );

    return { token, exp };
}

/**
 * Verify and decode an access token
 * @throws AccessTokenError if the token is invalid, incomplete or expired
 */
export function verifyAccessToken(token: string, secret: string): AccessTokenPayload {
    let decoded: string | JwtPayload;
    try {
        decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
    } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
            throw new AccessTokenError('Access token expired');
        }
        // jsonwebtoken can throw SyntaxError when the payload isn't valid JSON
        throw new AccessTokenError('Invalid access token');
    }

    const result = payloadSchema.safeParse(decoded);
    if (!result.success) {
        const missing = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
        throw new AccessTokenError(`Invalid access token, missing ${missing} field`);
    }
    return result.data;
}

/**
 * The uid:gid user id a token acts for
 */
export function tokenUserId(payload: AccessTokenClaims): string {
    return `${payload.ruid}:${payload.rgid}`;
}

/**
 * Extract token from request (query param or header)
 */
export function extractTokenFromRequest(req: { query?: Record<string, unknown>; headers?: Record<string, unknown> }): string | null {
    // WOPI protocol: access_token query parameter
    const queryToken = req.query?.access_token;
    if (typeof queryToken === 'string' && queryToken.length > 0) {
        return queryToken;
    }

    // Alternative: Authorization header (Bearer token)
    const authHeader = req.headers?.authorization;
    if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
        return authHeader.substring(7);
    }

    return null;
}
