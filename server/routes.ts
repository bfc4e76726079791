import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ZodError } from "zod";
import {
  BatchProcessRequestZ,
  ConfigUpdateZ,
  ProcessRequestZ,
} from "@shared/schema";
import { apiKeyFor, applyConfigUpdate, publicConfig } from "./src/config";
import { FolderNotFoundError } from "./src/errors";
import type { ProcessingService } from "./src/orchestrator/processingService";

// Standard 400 error response helper
function badRequest(res: Response, code: string, message: string, details?: unknown) {
  return res.status(400).json({
    error: "Bad Request",
    code,
    message,
    details: details ?? null,
  });
}

function validationFailed(res: Response, error: ZodError) {
  return badRequest(
    res,
    "VALIDATION_ERROR",
    "Request body failed validation",
    error.issues.map(issue => ({ path: issue.path.join("."), message: issue.message }))
  );
}

// Express 4 does not forward rejected promises to the error handler
function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

async function listOutputFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(e => e.isFile()).map(e => e.name).sort();
  } catch {
    return [];
  }
}

export function registerRoutes(app: Express, service: ProcessingService): Express {

  // ═════════════════════════════════════════════════════════════════════════
  // HEALTH
  // ═════════════════════════════════════════════════════════════════════════

  app.get("/api/health", (_req, res) => {
    const config = service.getConfig();
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      provider: config.ai.provider,
      providerConfigured: apiKeyFor(config.ai) !== null,
      uptime: process.uptime(),
    });
  });

  // ═════════════════════════════════════════════════════════════════════════
  // FOLDERS
  // ═════════════════════════════════════════════════════════════════════════

  app.get("/api/folders", asyncHandler(async (_req, res) => {
    const folders = await service.listFolders();
    res.json({
      folders,
      total: folders.length,
      readyCount: folders.filter(f => f.ready).length,
    });
  }));

  app.get("/api/folders/:name", asyncHandler(async (req, res) => {
    const folder = await service.getFolder(req.params.name);
    res.json({
      ...folder,
      lastResult: service.results.get(folder.name) ?? null,
    });
  }));

  // ═════════════════════════════════════════════════════════════════════════
  // PROCESSING
  // ═════════════════════════════════════════════════════════════════════════

  app.post("/api/process", asyncHandler(async (req, res) => {
    const parsed = ProcessRequestZ.safeParse(req.body);
    if (!parsed.success) return validationFailed(res, parsed.error);

    const { folderName, options } = parsed.data;
    const result = await service.processFolder(folderName, options ?? {});
    res.json(result);
  }));

  app.post("/api/process/batch", asyncHandler(async (req, res) => {
    const parsed = BatchProcessRequestZ.safeParse(req.body ?? {});
    if (!parsed.success) return validationFailed(res, parsed.error);

    const { folderNames, parallel, maxWorkers, options } = parsed.data;
    try {
      const batch = await service.processAll({ ...options, folderNames, parallel, maxWorkers });
      res.json(batch);
    } catch (error) {
      if (error instanceof FolderNotFoundError) {
        return badRequest(res, error.code, `Unknown folders: ${error.folder}`);
      }
      throw error;
    }
  }));

  // ═════════════════════════════════════════════════════════════════════════
  // RESULTS
  // ═════════════════════════════════════════════════════════════════════════

  app.get("/api/results", (_req, res) => {
    const results = service.results.list();
    res.json({
      results: results.map(r => ({
        folder: r.folder,
        status: r.status,
        summary: r.summary,
        completedAt: r.completedAt,
      })),
      total: results.length,
    });
  });

  app.get("/api/results/:name", asyncHandler(async (req, res) => {
    const result = service.results.get(req.params.name);
    if (!result) {
      return res.status(404).json({ error: "Not Found", message: `No result for folder '${req.params.name}'` });
    }
    const outputDir = path.join(service.getConfig().outputDir, result.folder);
    res.json({ result, files: await listOutputFiles(outputDir) });
  }));

  app.get("/api/results/:name/download/:filename", asyncHandler(async (req, res) => {
    const { name, filename } = req.params;
    const notFound = () => res.status(404).json({ error: "Not Found", message: `File '${filename}' not found` });

    // Plain file names only, inside the folder's own output directory
    if (name !== path.basename(name) || filename !== path.basename(filename) || !filename.toLowerCase().endsWith(".pdf")) {
      return notFound();
    }

    const filePath = path.join(service.getConfig().outputDir, name, filename);
    const stat = await fs.stat(filePath).catch(() => null);
    if (!stat?.isFile()) return notFound();

    res.type("application/pdf");
    res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
    res.send(await fs.readFile(filePath));
  }));

  // ═════════════════════════════════════════════════════════════════════════
  // CONFIG
  // ═════════════════════════════════════════════════════════════════════════

  app.get("/api/config", (_req, res) => {
    res.json(publicConfig(service.getConfig()));
  });

  app.put("/api/config", (req, res) => {
    const parsed = ConfigUpdateZ.safeParse(req.body);
    if (!parsed.success) return validationFailed(res, parsed.error);

    service.setConfig(applyConfigUpdate(service.getConfig(), parsed.data));
    res.json(publicConfig(service.getConfig()));
  });

  return app;
}
