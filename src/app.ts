// src/app.ts
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { createYearsRouter } from "./routes/years";
import type { YearService } from "./services/yearService";

export function createApp(service: YearService): Express {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());

  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:3000"],
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));

  // Rate limiting on writes (per IP)
  const writeLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 1000,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method === "GET",
    message: { message: "Too many requests from this IP. Please try again later." },
  });
  app.use("/years", writeLimiter);

  // Health check
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "OK",
      store: service.records.driver,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/years", createYearsRouter(service));

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
