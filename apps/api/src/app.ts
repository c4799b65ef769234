import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import cookieParser from "cookie-parser";

import { env } from "./lib/env";
import { getLogger } from "./lib/logger";
import { authMiddleware, loadSession } from "./middleware/auth";
import { apiNotFound, errorHandler } from "./middleware/errors";
import { authRouter } from "./routes/auth";
import { categoriesRouter } from "./routes/categories";
import { tasksRouter } from "./routes/tasks";
import { statsRouter } from "./routes/stats";
import { pagesRouter } from "./routes/pages";

const httpLog = getLogger("http");

export function createApp() {
  const app = express();

  app.use(
    helmet({
      crossOriginEmbedderPolicy: false,
      contentSecurityPolicy: false
    })
  );

  if (env.CORS_ORIGIN) {
    app.use(cors({ origin: env.CORS_ORIGIN.split(",").map((s) => s.trim()), credentials: true }));
  }

  app.use(cookieParser(env.SESSION_SECRET));
  app.use(morgan("tiny", { stream: { write: (line: string) => httpLog.info(line.trim()) } }));
  app.use(loadSession);

  // protected: the session is checked before the body is parsed
  app.use(["/api/categories", "/api/tasks", "/api/stats"], authMiddleware);

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.get("/health", (_, res) => res.json({ ok: true }));

  app.use("/api", authRouter);
  app.use("/api/categories", categoriesRouter);
  app.use("/api/tasks", tasksRouter);
  app.use("/api/stats", statsRouter);
  app.use("/api", apiNotFound);

  app.use(pagesRouter);
  app.use(errorHandler);

  return app;
}
