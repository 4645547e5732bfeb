// src/routes/auditLogs.ts
import { Router } from "express";
import { Workbook } from "exceljs";
import { asyncHandler } from "../middleware/asyncHandler";
import type { AuditLogRepository } from "../repositories/types";
import type { AuditLogRecord } from "../types/domain";
import { parseAuditLogExport, parseAuditLogQuery } from "../validators/auditLog";
import type { RouteDeps } from "./types";

const CSV_COLUMNS: [header: string, value: (log: AuditLogRecord) => unknown][] = [
  ["Timestamp", (l) => l.timestamp.toISOString()],
  ["User", (l) => l.user ?? ""],
  ["Action", (l) => l.action],
  ["Description", (l) => l.description],
  ["Target Type", (l) => l.targetType ?? ""],
  ["Target Id", (l) => l.targetId ?? ""],
  ["Method", (l) => l.requestMethod],
  ["Path", (l) => l.requestPath],
  ["IP", (l) => l.ipAddress ?? ""],
  ["Success", (l) => (l.success ? "yes" : "no")],
  ["Error", (l) => l.errorMessage],
  ["Extra", (l) => JSON.stringify(l.extraData)],
];

const csvCell = (value: unknown) => `"${String(value).replace(/"/g, '""')}"`;

export const toCsv = (logs: AuditLogRecord[]): string =>
  [
    CSV_COLUMNS.map(([header]) => csvCell(header)).join(","),
    ...logs.map((log) => CSV_COLUMNS.map(([, value]) => csvCell(value(log))).join(",")),
  ].join("\n") + "\n";

export function createAuditLogsRouter({ auth }: RouteDeps, auditLogs: AuditLogRepository) {
  const router = Router();

  router.use(auth.requireAuth, auth.requireCapability("read_audit_log"));

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = parseAuditLogQuery(req.query);
      const { data, total } = await auditLogs.query(query);

      res.json({
        data,
        total,
        page: query.page,
        pages: Math.ceil(total / query.limit),
      });
    })
  );

  // EXPORT audit logs (CSV)
  router.get(
    "/export/csv",
    asyncHandler(async (req, res) => {
      const { sort, ...filter } = parseAuditLogExport(req.query);
      const logs = await auditLogs.findAll(filter, sort);

      res.setHeader("Content-Type", "text/csv");
      res.setHeader("Content-Disposition", "attachment; filename=audit_logs.csv");
      res.send(toCsv(logs));
    })
  );

  // EXPORT audit logs (Excel)
  router.get(
    "/export/excel",
    asyncHandler(async (req, res) => {
      const { sort, ...filter } = parseAuditLogExport(req.query);
      const logs = await auditLogs.findAll(filter, sort);

      const workbook = new Workbook();
      const worksheet = workbook.addWorksheet("Audit Logs");
      worksheet.columns = CSV_COLUMNS.map(([header]) => ({
        header,
        key: header,
        width: header === "Description" || header === "Extra" ? 40 : 20,
      }));
      logs.forEach((log) => {
        worksheet.addRow(Object.fromEntries(CSV_COLUMNS.map(([header, value]) => [header, value(log)])));
      });

      res.setHeader(
        "Content-Type",
        "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
      );
      res.setHeader("Content-Disposition", "attachment; filename=audit_logs.xlsx");

      await workbook.xlsx.write(res);
      res.end();
    })
  );

  return router;
}
