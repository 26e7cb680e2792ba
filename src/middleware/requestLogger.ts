/**
 * Request Logger 미들웨어
 *
 * 기능:
 * - Request ID 생성 및 추적 (x-request-id 헤더, 없으면 UUID 생성)
 * - 응답 시간 측정
 * - Health check 요청은 로그 제외
 */

import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

const REQUEST_ID_HEADER = "x-request-id";

const SKIP_LOG_PATHS = ["/health"];

/**
 * 요청의 Request ID (requestLogger 이후에는 항상 존재)
 */
export function getRequestId(req: Request): string {
  const header = req.headers[REQUEST_ID_HEADER];
  if (typeof header === "string" && header.length > 0) {
    return header;
  }
  return Array.isArray(header) && header.length > 0 ? header[0] : "unknown";
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (typeof req.headers[REQUEST_ID_HEADER] !== "string") {
    req.headers[REQUEST_ID_HEADER] = uuidv4();
  }

  const requestId = getRequestId(req);
  res.setHeader(REQUEST_ID_HEADER, requestId);

  if (SKIP_LOG_PATHS.includes(req.path)) {
    next();
    return;
  }

  const startTime = Date.now();
  const log = createRequestLogger(requestId, req.method, req.path);

  log.info({ query: req.query, ip: req.ip }, "요청 수신");

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const payload = { statusCode: res.statusCode, duration_ms: duration };

    if (res.statusCode >= 500) {
      log.error(payload, "요청 처리 실패");
    } else if (res.statusCode >= 400) {
      log.warn(payload, "요청 거부");
    } else {
      log.info(payload, "요청 완료");
    }
  });

  next();
}
