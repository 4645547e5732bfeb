// src/types/express.ts
import type { UserRecord } from "./domain";

/** The authenticated user attached by `requireAuth`. Never carries the hash. */
export type AuthUser = UserRecord;

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export {};
