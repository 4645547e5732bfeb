// src/middleware/security.ts
import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import type { NextFunction, Request, Response } from "express";

export const createLoginRateLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 5, // 5 attempts per IP
    message: {
      success: false,
      message: "Too many attempts. Access locked for 15m.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const createApiRateLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, message: "Too many requests from this IP. Please try again later." },
  });

// Strips `$`-prefixed keys so bodies like { email: { $gt: "" } } can't reach a query
export const sanitizeInput = (req: Request, _res: Response, next: NextFunction) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  // Query values are cleaned key by key; the object itself stays
  Object.keys(req.query).forEach((key) => {
    req.query[key] = sanitize(req.query[key]);
  });

  next();
};
