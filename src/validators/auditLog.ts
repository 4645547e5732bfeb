// src/validators/auditLog.ts
import { AUDIT_ACTIONS } from "../types/domain";
import type { AuditLogFilter, AuditLogQuery } from "../repositories/types";
import { FieldReader } from "./fields";

const MAX_PAGE_SIZE = 100;

const readFilter = (f: FieldReader): AuditLogFilter & { sort: "asc" | "desc" } => ({
  user: f.optString("actorId"),
  action: f.optOneOf("action", AUDIT_ACTIONS),
  targetType: f.optString("targetType"),
  targetId: f.optString("targetId"),
  from: f.optDate("fromDate") ?? undefined,
  to: f.optDate("toDate") ?? undefined,
  sort: f.optOneOf("sort", ["asc", "desc"] as const) ?? "desc",
});

export const parseAuditLogQuery = (raw: unknown): AuditLogQuery => {
  const f = new FieldReader(raw);
  const query: AuditLogQuery = {
    ...readFilter(f),
    page: Math.floor(f.optNumber("page", { min: 1 }) ?? 1),
    limit: Math.floor(f.optNumber("limit", { min: 1, max: MAX_PAGE_SIZE }) ?? 10),
  };
  f.assertValid();
  return query;
};

export const parseAuditLogExport = (raw: unknown): AuditLogFilter & { sort: "asc" | "desc" } => {
  const f = new FieldReader(raw);
  const filter = readFilter(f);
  f.assertValid();
  return filter;
};
