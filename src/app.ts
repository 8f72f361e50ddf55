// src/app.ts
import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { createMarksRouter } from "./routes/marks";
import type { MarksSessionStore } from "./services/sessionStore";

export interface AppOptions {
  store: MarksSessionStore;
  passThreshold?: number;
  maxUploadBytes?: number;
  sessionTtlHours?: number;
}

export function createApp({
  store,
  passThreshold = config.passThreshold,
  maxUploadBytes = config.maxUploadBytes,
  sessionTtlHours = config.sessionTtlHours,
}: AppOptions) {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());
  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:5173"],
      credentials: true,
    })
  );

  app.use(cookieParser());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  // Health check
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use("/marks", createMarksRouter({ store, passThreshold, maxUploadBytes, sessionTtlHours }));

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
