/**
 * Express 애플리케이션 구성
 * (server.ts에서 listen, 테스트에서는 supertest로 직접 사용)
 */

import express, { Express } from "express";
import { createV2Router } from "@/routes/v2";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { ProductService } from "@/services/ProductService";
import { APP_METADATA } from "@/config/constants";

export function createApp(productService: ProductService): Express {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
    });
  });

  app.use("/api/v2", createV2Router(productService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
