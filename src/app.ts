// src/app.ts
import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import config from "./config/config";
import { systemClock, type Clock } from "./lib/clock";
import { errorHandler } from "./middleware/errorHandler";
import { auditTrail } from "./middleware/auditTrail";
import { createAuth } from "./middleware/auth";
import { createApiRateLimiter, sanitizeInput } from "./middleware/security";
import type { Repositories } from "./repositories/types";
import { createServices, type Services } from "./services";

// Routes
import { createAuthRouter } from "./routes/auth";
import { createUsersRouter } from "./routes/users";
import { createCoursesRouter } from "./routes/courses";
import { createAssignmentsRouter } from "./routes/assignments";
import { createSubmissionsRouter } from "./routes/submissions";
import { createAuditLogsRouter } from "./routes/auditLogs";

export interface AppSettings {
  frontendUrl: string;
  auditExcludedPaths: readonly string[];
  allowDraftGrading: boolean;
  bcryptRounds: number;
}

export interface AppOptions {
  repos: Repositories;
  clock?: Clock;
  settings?: Partial<AppSettings>;
}

export function createApp({ repos, clock = systemClock, settings = {} }: AppOptions) {
  const resolved: AppSettings = {
    frontendUrl: config.frontendUrl,
    auditExcludedPaths: config.auditExcludedPaths,
    allowDraftGrading: config.allowDraftGrading,
    bcryptRounds: config.bcryptRounds,
    ...settings,
  };

  const services: Services = createServices(repos, clock, resolved);
  const auth = createAuth({ users: repos.users, audit: services.audit });
  const deps = { services, auth };

  const app = express();

  // Security & parsing
  app.use(helmet());
  app.use(cors({ origin: resolved.frontendUrl, credentials: true }));
  app.use(cookieParser());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));
  app.use(sanitizeInput);
  app.use(createApiRateLimiter());

  // Must sit in front of every router it observes
  app.use(auditTrail({ recorder: services.audit, excludedPaths: resolved.auditExcludedPaths }));

  // Health check
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "OK",
      timestamp: clock.now().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/auth", createAuthRouter(deps));
  app.use("/users", createUsersRouter(deps));
  app.use("/courses", createCoursesRouter(deps));
  app.use("/assignments", createAssignmentsRouter(deps));
  app.use("/submissions", createSubmissionsRouter(deps));
  app.use("/audit-logs", createAuditLogsRouter(deps, repos.auditLogs));

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
