// src/routes/types.ts
import type { AuthMiddleware } from "../middleware/auth";
import type { Services } from "../services";

export interface RouteDeps {
  services: Services;
  auth: AuthMiddleware;
}
