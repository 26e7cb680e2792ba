/**
 * Product Inventory 서버
 * API v2
 */

import "dotenv/config";
import { createApp } from "@/app";
import { createProductService } from "@/services/ProductServiceFactory";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";
import { SERVICE_NAMES, APP_METADATA } from "@/config/constants";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

const PORT = Number(process.env.PORT) || 3000;
const BASE_URL = process.env.BASE_URL || `http://localhost:${PORT}`;

const app = createApp(createProductService());

const server = app.listen(PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
    port: PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
  });

  logger.info(
    {
      baseUrl: BASE_URL,
      endpoints: {
        health: `${BASE_URL}/health`,
        products: "/api/v2/products",
        export: "GET /api/v2/products/export?ids=",
      },
    },
    "API v2 엔드포인트 등록 완료",
  );
});

function shutdown(signal: string): void {
  logger.warn({ signal }, "종료 신호 수신, 서버 종료 중...");

  server.close(() => {
    logImportant(logger, "서버 종료 완료", {});
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
