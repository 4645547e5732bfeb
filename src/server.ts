// src/server.ts
import mongoose from "mongoose";
import { createApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { createMongoRepositories } from "./repositories";

const startServer = async () => {
  await connectDB();

  const app = createApp({ repos: createMongoRepositories() });

  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Frontend: ${config.frontendUrl}`);
    console.log(`Environment: ${config.nodeEnv}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      mongoose.connection
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("Error closing MongoDB connection:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

startServer().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
