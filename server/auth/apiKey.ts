import { timingSafeEqual } from 'crypto';
import { IncomingMessage } from 'http';
import { NextFunction, Request, RequestHandler, Response } from 'express';

function safeEquals(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    if (left.length !== right.length) {
        return false;
    }
    return timingSafeEqual(left, right);
}

export function getApiKeyFromAuthorization(headers: IncomingMessage['headers']): string {
    const authRaw = headers.authorization;
    const auth = Array.isArray(authRaw) ? String(authRaw[0] || '') : String(authRaw || '');
    const [scheme, token] = auth.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && token) {
        return token.trim();
    }
    return '';
}

export function isApiKeyValid(apiKey: string, secret: string): boolean {
    if (!apiKey || !secret) {
        return false;
    }
    return safeEquals(apiKey, secret);
}

/** Guards the publish endpoints with `Authorization: Bearer <API_KEY_SECRET>`. */
export function createApiKeyMiddleware(secret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = getApiKeyFromAuthorization(req.headers);
        if (!isApiKeyValid(apiKey, secret)) {
            res.status(401).json({
                ok: false,
                error: 'unauthorized',
                message: 'Provide a valid bearer token in the Authorization header.',
            });
            return;
        }
        next();
    };
}
