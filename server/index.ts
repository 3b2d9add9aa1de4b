import "dotenv/config";
import express, { ErrorRequestHandler, Express } from "express";
import type { Server } from "http";
import { v4 as uuidv4 } from "uuid";
import { loadConfig } from "./config";
import { handleAnalyze, handleScan } from "./routes/rca";
import { ScanScheduler } from "./services/lifecycle";
import { getWorkloadScanner } from "./services/scanner";

/**
 * Create and configure Express server
 */
export function createServer(): Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, res, next) => {
    const requestId = uuidv4();
    res.setHeader("x-request-id", requestId);
    res.locals.requestId = requestId;
    console.log(`[${requestId}] ${req.method} ${req.path}`);
    next();
  });

  // ============ API Routes ============

  app.get("/api/ping", (_req, res) => {
    res.json({ message: "pong" });
  });

  app.get("/api/rca/analyze", handleAnalyze);
  app.post("/api/rca/scan", handleScan);

  // ============ Error Handler ============

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : "unknown";
    console.error(`[${requestId}] Server error:`, err);
    res.status(500).json({
      error: err instanceof Error ? err.message : "Internal server error",
      code: "INTERNAL_SERVER_ERROR",
      requestId,
    });
  };
  app.use(errorHandler);

  return app;
}

export interface RunningServer {
  server: Server;
  scheduler: ScanScheduler;
}

/**
 * Start the HTTP server and, when an interval is configured, the periodic
 * workload scan.
 */
export function startServer(port = loadConfig().port): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const config = loadConfig();
    const app = createServer();
    const scheduler = new ScanScheduler({
      intervalMs: config.scan.intervalMs,
      initialDelayMs: config.scan.initialDelayMs,
      runScan: () => getWorkloadScanner().scan(config.scan.label),
    });

    const server = app.listen(port, () => {
      console.log(`\n✓ Server running on http://localhost:${port}`);
      console.log(`\n📋 Available endpoints:`);
      console.log(`  GET    /api/ping                    - Health check`);
      console.log(`  GET    /api/rca/analyze?pod=&namespace=&format=json|text`);
      console.log(`  POST   /api/rca/scan                - Analyze every labelled pod\n`);

      scheduler.start();
      resolve({ server, scheduler });
    });

    server.on("error", reject);
  });
}
