// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const splitList = (raw: string | undefined, fallback: string[]): string[] =>
  raw
    ? raw
        .split(",")
        .map((p) => p.trim())
        .filter(Boolean)
    : fallback;

const config = Object.freeze({
  port: Number(process.env.PORT) || 8000,
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/coursework",
  frontendUrl: process.env.FRONTEND_URL || "http://localhost:3000",
  jwtSecret: process.env.JWT_SECRET || "please-change-me",
  jwtTtlSeconds: Number(process.env.JWT_TTL_SECONDS) || 24 * 60 * 60,
  bcryptRounds: Number(process.env.BCRYPT_ROUNDS) || 12,
  nodeEnv: process.env.NODE_ENV || "development",
  // Prefixes the audit trail never records (docs, static assets, probes)
  auditExcludedPaths: splitList(process.env.AUDIT_EXCLUDED_PATHS, [
    "/health",
    "/docs",
    "/static",
    "/media",
  ]),
  // When true a lecturer may grade a draft that was never submitted
  allowDraftGrading: process.env.GRADING_ALLOW_DRAFT === "true",
});

export type AppConfig = typeof config;

export default config;
