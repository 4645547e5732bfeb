// src/repositories/auditLogRepository.ts
import mongoose, { type FilterQuery, type HydratedDocument } from "mongoose";
import AuditLog, { type IAuditLog } from "../models/AuditLog";
import type { AuditLogRecord, NewAuditLog } from "../types/domain";
import type { AuditLogFilter, AuditLogQuery, AuditLogRepository } from "./types";

const toAuditLog = (doc: HydratedDocument<IAuditLog>): AuditLogRecord => ({
  id: doc._id.toString(),
  user: doc.user ? doc.user.toString() : null,
  action: doc.action,
  description: doc.description,
  targetType: doc.targetType ?? null,
  targetId: doc.targetId ?? null,
  ipAddress: doc.ipAddress ?? null,
  userAgent: doc.userAgent,
  requestMethod: doc.requestMethod,
  requestPath: doc.requestPath,
  extraData: doc.extraData ?? {},
  success: doc.success,
  errorMessage: doc.errorMessage,
  timestamp: doc.timestamp,
});

// null when the filter can match nothing, e.g. an actor id that is not an ObjectId
export const buildFilter = (filter: AuditLogFilter): FilterQuery<IAuditLog> | null => {
  const query: FilterQuery<IAuditLog> = {};
  if (filter.user) {
    if (!mongoose.Types.ObjectId.isValid(filter.user)) return null;
    query.user = filter.user;
  }
  if (filter.action) query.action = filter.action;
  if (filter.targetType) query.targetType = filter.targetType;
  if (filter.targetId) query.targetId = filter.targetId;
  if (filter.from || filter.to) {
    query.timestamp = {
      ...(filter.from && { $gte: filter.from }),
      ...(filter.to && { $lte: filter.to }),
    };
  }
  return query;
};

export class MongoAuditLogRepository implements AuditLogRepository {
  async insert(entry: NewAuditLog) {
    const doc = await AuditLog.create(entry);
    return doc._id.toString();
  }

  async query({ page, limit, sort, ...filter }: AuditLogQuery) {
    const where = buildFilter(filter);
    if (!where) return { data: [], total: 0 };
    const [docs, total] = await Promise.all([
      AuditLog.find(where)
        .sort({ timestamp: sort === "asc" ? 1 : -1 })
        .skip((page - 1) * limit)
        .limit(limit),
      AuditLog.countDocuments(where),
    ]);
    return { data: docs.map(toAuditLog), total };
  }

  async findAll(filter: AuditLogFilter, sort: "asc" | "desc") {
    const where = buildFilter(filter);
    if (!where) return [];
    const docs = await AuditLog.find(where).sort({ timestamp: sort === "asc" ? 1 : -1 });
    return docs.map(toAuditLog);
  }
}
