import cors from "cors";
import express, { type Express } from "express";
import rateLimit from "express-rate-limit";
import type { HealthResponse } from "@readright/shared";
import type { AppConfig } from "./config.js";
import { errorHandler, notFound } from "./middleware/errorHandler.js";
import { requestId } from "./middleware/requestId.js";
import { mountArticleRoutes } from "./routes/articles.js";
import type { Services } from "./services.js";

export function createApp(config: AppConfig, services: Services): Express {
  const app = express();

  app.use(requestId);
  app.use(
    cors({
      origin(origin, callback) {
        callback(null, !origin || config.allowedOrigins.includes(origin));
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "x-request-id"]
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 30,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: { kind: "RateLimitError", message: "Too many requests. Try again shortly." } }
    })
  );

  const api = express.Router();
  mountArticleRoutes(api, services);

  app.get("/health", (_req, res) => {
    const body: HealthResponse = { ok: true, provider: services.provider.name };
    res.json(body);
  });
  app.use("/api", api);
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
