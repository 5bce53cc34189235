import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express";
import type { AppConfig } from "./config";
import { log } from "./log";
import { createSopRouter } from "./src/sopRoutes";

function httpStatusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return 500;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

const requestLogger: RequestHandler = (req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > 160) {
        logLine = logLine.slice(0, 159) + "…";
      }
      log(logLine);
    }
  });

  next();
};

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status = httpStatusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  // body-parser marks unparseable JSON bodies; keep them apart from schema violations (422)
  if (isBodyParseError(err)) {
    res.status(400).json({ message: `Malformed JSON payload: ${message}` });
    return;
  }
  if (status >= 500) {
    console.error("[SOP API] Unhandled error:", err);
    res.status(status).json({ message: "Internal Server Error" });
    return;
  }
  res.status(status).json({ message });
};

export function createApp(config: AppConfig): Express {
  const app = express();

  // strict: false so a top-level scalar reaches the validator instead of failing as unparseable
  app.use(express.json({ limit: config.jsonLimit, strict: false }));
  app.use(requestLogger);

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/sop", createSopRouter({ escapeCells: config.render.escapeCells }));

  app.use(errorHandler);

  return app;
}
