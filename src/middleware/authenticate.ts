// src/middleware/authenticate.ts

import { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Actor, Role } from '../models/Actor';

const TokenClaimsSchema = z.object({
    sub: z.string().min(1),
    role: z.nativeEnum(Role)
});

/**
 * Bearer token authentication
 *
 * Verifies the JWT with the shared secret and exposes { userId: sub, role }
 * as req.actor. Handlers downstream trust req.actor.
 */
export function authenticate(jwtSecret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const header = req.headers.authorization;
        if (!header?.startsWith('Bearer ')) {
            res.status(401).json({ error: 'Authentication required' });
            return;
        }

        let decoded: unknown;
        try {
            decoded = jwt.verify(header.slice('Bearer '.length), jwtSecret);
        } catch {
            res.status(401).json({ error: 'Invalid or expired token' });
            return;
        }

        const claims = TokenClaimsSchema.safeParse(decoded);
        if (!claims.success) {
            res.status(401).json({ error: 'Invalid token claims' });
            return;
        }

        req.actor = { userId: claims.data.sub, role: claims.data.role };
        next();
    };
}

/**
 * Restrict a route to some roles. Mount after authenticate().
 */
export function requireRoles(...roles: Role[]): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!req.actor || !roles.includes(req.actor.role)) {
            res.status(403).json({ error: 'Insufficient permissions' });
            return;
        }
        next();
    };
}

/**
 * The authenticated caller. Only valid behind authenticate().
 */
export function actorOf(req: Request): Actor {
    if (!req.actor) {
        throw new Error('Request reached a protected route without authentication');
    }
    return req.actor;
}
