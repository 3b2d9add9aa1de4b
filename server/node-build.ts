import { loadConfig } from "./config";
import { startServer } from "./index";

const port = loadConfig().port;

startServer(port)
  .then(({ server, scheduler }) => {
    const shutdown = (signal: string) => {
      console.log(`🛑 Received ${signal}, shutting down gracefully`);
      scheduler.stop();
      server.close(() => {
        console.log("Server closed");
        process.exit(0);
      });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  })
  .catch((error: unknown) => {
    if (error instanceof Error && "code" in error && error.code === "EADDRINUSE") {
      console.error(
        `Port ${port} is already in use. Stop the existing process or run with a different port (example: PORT=4100).`,
      );
    } else {
      console.error("Failed to start server:", error);
    }
    process.exit(1);
  });
