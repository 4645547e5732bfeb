// src/models/AuditLog.ts
import mongoose, { Schema, Document } from "mongoose";
import { AUDIT_ACTIONS, type AuditAction } from "../types/domain";

export interface IAuditLog extends Document {
  user: mongoose.Types.ObjectId | null;
  action: AuditAction;
  description: string;
  targetType: string | null;
  targetId: string | null;
  ipAddress: string | null;
  userAgent: string;
  requestMethod: string;
  requestPath: string;
  extraData: Record<string, unknown>;
  success: boolean;
  errorMessage: string;
  timestamp: Date;
}

const AuditLogSchema = new Schema<IAuditLog>({
  // No cascade: the entry outlives the user it names
  user: { type: Schema.Types.ObjectId, ref: "User", default: null },
  action: { type: String, enum: AUDIT_ACTIONS, required: true, index: true },
  description: { type: String, required: true },
  targetType: { type: String, default: null },
  targetId: { type: String, default: null },
  ipAddress: { type: String, default: null },
  userAgent: { type: String, default: "" },
  requestMethod: { type: String, default: "" },
  requestPath: { type: String, default: "" },
  extraData: { type: Schema.Types.Mixed, default: {} },
  success: { type: Boolean, default: true },
  errorMessage: { type: String, default: "" },
  timestamp: { type: Date, default: Date.now, immutable: true, index: true },
});

AuditLogSchema.index({ user: 1, action: 1, timestamp: -1 });
AuditLogSchema.index({ action: 1, timestamp: -1 });
AuditLogSchema.index({ targetType: 1, targetId: 1 });

export default mongoose.model<IAuditLog>("AuditLog", AuditLogSchema);
