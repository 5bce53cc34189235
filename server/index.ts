import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./log";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

try {
  const config = loadConfig();
  const app = createApp(config);
  const httpServer = createServer(app);

  const gracefulShutdown = (signal: string) => {
    log(`Received ${signal}, shutting down gracefully...`, "process");
    httpServer.close((err) => {
      if (err) {
        console.error("[Process] Error during shutdown:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));

  httpServer.listen(config.port, config.host, () => {
    log(`serving on port ${config.port}`);
  });
} catch (error) {
  console.error("Failed to start server:", error);
  if (error instanceof Error) {
    console.error("Error message:", error.message);
  }
  process.exit(1);
}
