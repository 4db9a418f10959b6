/**
 * HTTP application: middleware stack, routes and the final error handler.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes, type RouteDependencies } from "./routes";
import { handleRouteError } from "./utils/errorHandler";

export async function createApp(deps: RouteDependencies): Promise<{ app: express.Express; server: Server }> {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));
  app.use(addSecurityHeaders);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        console.log(`[Routes] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  const server = await registerRoutes(app, deps);

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Errors passed to next() by middleware (auth, validation, rate limit, body parsing)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "Routes");
  });

  return { app, server };
}
