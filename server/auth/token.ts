import jwt from 'jsonwebtoken';

export type TokenCheck =
    | { ok: true; subject: string }
    | { ok: false; reason: 'missing_token' | 'missing_subject' | 'token_expired' | 'invalid_token'; closeReason: string };

export interface TokenVerifier {
    verify(token: string): TokenCheck;
}

const DEFAULT_SESSION_TTL_SECONDS = 12 * 60 * 60;

/**
 * Checks the session token carried in the socket path.  Tokens are HS256
 * JWTs whose `sub` names the dashboard user.  Failures carry the close
 * reason the socket is shut with (code 1008).
 */
export function createTokenVerifier(secret: string): TokenVerifier {
    return {
        verify(token: string): TokenCheck {
            if (!token) {
                return { ok: false, reason: 'missing_token', closeReason: 'Invalid token' };
            }
            try {
                const payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
                if (typeof payload === 'string' || !payload.sub) {
                    return { ok: false, reason: 'missing_subject', closeReason: 'Invalid authentication credentials' };
                }
                return { ok: true, subject: payload.sub };
            } catch (error) {
                if (error instanceof jwt.TokenExpiredError) {
                    return { ok: false, reason: 'token_expired', closeReason: 'Token has expired' };
                }
                return { ok: false, reason: 'invalid_token', closeReason: 'Invalid token' };
            }
        },
    };
}

export function signSessionToken(subject: string, secret: string, ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS): string {
    return jwt.sign({ sub: subject }, secret, { algorithm: 'HS256', expiresIn: ttlSeconds });
}
