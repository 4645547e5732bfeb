// src/lib/auditLogger.ts
import type { Request } from "express";
import type { Clock } from "./clock";
import type { EntityRefRegistry } from "./entityRefs";
import type { AuditLogRepository } from "../repositories/types";
import type { AuthUser } from "../types/express";
import type { AuditAction, EntityRef, RequestMetadata } from "../types/domain";

const MAX_HEADER_LENGTH = 500;

export interface AuditEntry {
  actor?: string | null;
  action: AuditAction;
  description: string;
  target?: EntityRef | null;
  metadata?: RequestMetadata | null;
  success?: boolean;
  errorMessage?: string;
  extra?: Record<string, unknown>;
}

export const clientIp = (req: Request): string | null => {
  const forwarded = req.headers["x-forwarded-for"];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (first) return first.split(",")[0].trim();
  return req.socket?.remoteAddress ?? req.ip ?? null;
};

export const requestMetadata = (req: Request): RequestMetadata => ({
  ipAddress: clientIp(req),
  userAgent: (req.get("user-agent") ?? "").slice(0, MAX_HEADER_LENGTH),
  method: req.method,
  path: (req.originalUrl.split("?")[0] || req.path).slice(0, MAX_HEADER_LENGTH),
});

const currentUser = (req: Request): AuthUser | undefined => req.user;

/**
 * Appends audit entries. Recording is best effort: the business operation
 * has already happened by the time we get here, so a failed insert is
 * logged and reported as `null`, never thrown.
 */
export class AuditRecorder {
  constructor(
    private readonly store: AuditLogRepository,
    private readonly clock: Clock,
    private readonly refs: EntityRefRegistry
  ) {}

  async record(entry: AuditEntry): Promise<string | null> {
    try {
      const target = this.knownTarget(entry.target);
      const meta = entry.metadata;
      const success = entry.success ?? true;

      return await this.store.insert({
        user: entry.actor ?? null,
        action: entry.action,
        description: entry.description,
        targetType: target?.type ?? null,
        targetId: target?.id ?? null,
        ipAddress: meta?.ipAddress ?? null,
        userAgent: meta?.userAgent ?? "",
        requestMethod: meta?.method ?? "",
        requestPath: meta?.path ?? "",
        extraData: entry.extra ?? {},
        success,
        errorMessage: success ? "" : entry.errorMessage ?? "",
        timestamp: this.clock.now(),
      });
    } catch (err) {
      console.error("Audit log failed:", err);
      return null;
    }
  }

  // An unregistered tag loses the target, not the row
  private knownTarget(target: EntityRef | null | undefined): EntityRef | null {
    if (!target) return null;
    if (!this.refs.has(target.type)) {
      console.warn(`Audit log: unknown entity type "${target.type}", recording without target`);
      return null;
    }
    return target;
  }

  /** Same as `record`, with actor and transport metadata taken from `req`. */
  recordRequest(req: Request, entry: Omit<AuditEntry, "metadata">): Promise<string | null> {
    return this.record({
      ...entry,
      actor: entry.actor === undefined ? currentUser(req)?.id ?? null : entry.actor,
      metadata: requestMetadata(req),
    });
  }
}
