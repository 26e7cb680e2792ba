/**
 * 에러 핸들러 미들웨어
 * Express 전역 에러 처리
 *
 * - ProductError → 타입별 HTTP 상태 코드
 * - ZodError → 400
 * - 그 외 → 500
 */

import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { ProductError } from "@/core/interfaces/ProductErrorType";
import { logger } from "@/config/logger";

/**
 * 전역 에러 핸들러
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ProductError) {
    logger.warn(
      { ...err.toLogObject(), method: req.method, path: req.path },
      "상품 규칙 위반",
    );

    res.status(ProductError.httpStatusOf(err.type)).json({
      success: false,
      error: {
        code: err.type,
        message: err.message,
        details: err.details,
      },
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: {
        code: "INVALID_REQUEST",
        message: "Validation failed",
        details: err.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    });
    return;
  }

  logger.error(
    {
      error: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      method: req.method,
      path: req.path,
    },
    "처리되지 않은 오류",
  );

  res.status(500).json({
    success: false,
    error: {
      code: "UNKNOWN_ERROR",
      message: err.message,
      ...(process.env.NODE_ENV === "development" && {
        stack: err.stack,
      }),
    },
  });
}

/**
 * 404 핸들러
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn(
    {
      method: req.method,
      path: req.path,
    },
    "경로를 찾을 수 없음",
  );

  res.status(404).json({
    success: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.path}`,
    },
  });
}
