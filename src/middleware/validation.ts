/**
 * 요청 검증 미들웨어
 *
 * SOLID 원칙:
 * - SRP: 요청 파라미터 검증만 담당
 */

import { Request, Response, NextFunction } from "express";
import { validate as isUuid } from "uuid";

/**
 * ident 파라미터 검증 (UUID)
 */
export function validateIdentParam(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { ident } = req.params;

  if (!ident || !isUuid(ident)) {
    res.status(400).json({
      success: false,
      error: {
        code: "INVALID_REQUEST",
        message: "ident must be a valid UUID",
      },
    });
    return;
  }

  next();
}

/**
 * export 쿼리 파라미터 검증 (?ids=a,b,c)
 */
export function validateExportQuery(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { ids } = req.query;

  if (typeof ids !== "string" || parseIdList(ids).length === 0) {
    res.status(400).json({
      success: false,
      error: {
        code: "INVALID_REQUEST",
        message: "ids query parameter is required",
      },
    });
    return;
  }

  next();
}

/**
 * 콤마 구분 ident 목록 파싱 (공백/빈 항목 제거)
 */
export function parseIdList(value: string): string[] {
  return value
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}
