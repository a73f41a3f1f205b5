// src/types/express.d.ts

import { Actor } from '../models/Actor';

declare global {
    namespace Express {
        interface Request {
            actor?: Actor;
        }
    }
}

export {};
