import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import { registerRoutes } from "./routes";
import type { AppConfig } from "./src/config";
import {
  ConfigurationError,
  FolderNotFoundError,
  InvalidFolderError,
  PipelineError,
  errorMessage,
} from "./src/errors";
import { createLogger, log } from "./src/logger";
import { ProcessingService } from "./src/orchestrator/processingService";

const logger = createLogger("Process");

function statusFor(err: unknown): number {
  if (err instanceof FolderNotFoundError) return 404;
  if (err instanceof InvalidFolderError) return 422;
  if (err instanceof ConfigurationError) return 503;
  return 500;
}

export function createApp(service: ProcessingService): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  registerRoutes(app, service);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    if (status === 500) {
      logger.error(`Unhandled request error: ${errorMessage(err)}`, err);
    }

    res.status(status).json({
      error: status === 500 ? "Internal Server Error" : err instanceof PipelineError ? err.name : "Error",
      code: err instanceof PipelineError ? err.code : "INTERNAL_ERROR",
      message: errorMessage(err),
      ...(err instanceof InvalidFolderError ? { reasons: err.reasons } : {}),
    });
  });

  return app;
}

/**
 * Starts the API server and installs signal handlers that close it.
 * Resolves once the server is listening.
 */
export function startServer(config: AppConfig, service = new ProcessingService(config)): Promise<Server> {
  const app = createApp(service);
  const httpServer = createServer(app);

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    httpServer.close((err) => {
      if (err) {
        logger.error(`Error during shutdown: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.once("SIGINT", () => gracefulShutdown("SIGINT"));

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      log(`serving on ${config.server.host}:${config.server.port}`);
      resolve(httpServer);
    });
  });
}
