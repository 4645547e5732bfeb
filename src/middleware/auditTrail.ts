// src/middleware/auditTrail.ts
import type { Request, RequestHandler, Response } from "express";
import type { AuditRecorder } from "../lib/auditLogger";
import type { AuditAction } from "../types/domain";
import type { AuthUser } from "../types/express";

const METHOD_ACTIONS: Readonly<Record<string, AuditAction>> = {
  POST: "create",
  PUT: "update",
  PATCH: "update",
  DELETE: "delete",
};

const REDACTED = "[redacted]";
const SECRET_KEY = /password|token|secret/i;

export interface AuditTrailOptions {
  recorder: AuditRecorder;
  excludedPaths: readonly string[];
}

/**
 * Copy of the parsed JSON body for the log. Anything that is not a plain
 * object (no body, a string, an array) becomes `{}`; secrets are masked.
 */
export const snapshotBody = (body: unknown): Record<string, unknown> => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return {};
  try {
    const copy: unknown = JSON.parse(JSON.stringify(body));
    if (typeof copy !== "object" || copy === null) return {};
    return Object.fromEntries(
      Object.entries(copy).map(([key, value]) => [key, SECRET_KEY.test(key) ? REDACTED : value])
    );
  } catch (err) {
    console.warn("Audit trail: request body not serialisable:", err);
    return {};
  }
};

export const isExcludedPath = (path: string, excluded: readonly string[]): boolean =>
  excluded.some((prefix) => path === prefix || path.startsWith(prefix.endsWith("/") ? prefix : `${prefix}/`));

/**
 * A response that never finished was cut off by the client before the
 * handler answered; its status code is still the default and means nothing.
 */
export const responseOutcome = (
  res: Pick<Response, "statusCode" | "writableFinished">
): { success: boolean; errorMessage: string } => {
  if (!res.writableFinished) return { success: false, errorMessage: "Client closed request" };
  const success = res.statusCode >= 200 && res.statusCode < 400;
  return { success, errorMessage: success ? "" : `Status code: ${res.statusCode}` };
};

const authenticatedUser = (req: Request): AuthUser | undefined => req.user;

/**
 * Records every mutating request once the response has gone out. Mount it
 * before the routers: `requireAuth` runs later in the chain, and by the time
 * the response finishes `req.user` is known. The response itself is never
 * touched, and a failure in here is logged, not rethrown.
 */
export function auditTrail({ recorder, excludedPaths }: AuditTrailOptions): RequestHandler {
  return (req, res, next) => {
    const action = METHOD_ACTIONS[req.method];
    const path = req.path;
    if (!action || isExcludedPath(path, excludedPaths)) return next();

    const requestData = snapshotBody(req.body);
    let settled = false;

    const onDone = (response: Response) => {
      if (settled) return;
      settled = true;
      try {
        const user = authenticatedUser(req);
        if (!user) return;

        void recorder.recordRequest(req, {
          actor: user.id,
          action,
          description: `${req.method} ${path}`,
          ...responseOutcome(response),
          extra: { ...(response.writableFinished && { statusCode: response.statusCode }), requestData },
        });
      } catch (err) {
        console.error("Audit trail error:", err);
      }
    };

    res.once("finish", () => onDone(res));
    res.once("close", () => onDone(res));
    next();
  };
}
