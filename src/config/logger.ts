/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 콘솔 출력:
 * - 기본: JSON 포맷 (stdout)
 * - LOG_PRETTY=true: 색상 포맷 (stderr)
 *
 * 파일 출력 (LOG_DIR 설정 시에만):
 * - LOG_DIR/YYYY-MM-DD/{SERVICE_NAME}.log
 * - LOG_DIR/YYYY-MM-DD/error.log (에러 통합)
 * - 일일 로테이션, 90일 보관
 */

import pino from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone } from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * 날짜 디렉터리명 생성 (YYYY-MM-DD)
 */
function getDateDir(): string {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateDir();
      const fullDir = path.join(logDir, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정(00:00) 기준 정렬
      initialRotation: true,
      immutable: true,
      path: logDir,
      maxFiles: 90, // 90일 보관
      maxSize: "100M",
    },
  );
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "product_inventory",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

const LOG_LEVELS = {
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * 개발 환경용 콘솔 포맷터 (색상 + 구조화)
 */
function formatConsolePretty(logObj: Record<string, unknown>, level: number): void {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : "INFO";

  console.error(`[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m`);

  Object.keys(logObj)
    .filter((field) => field !== "msg")
    .forEach((field) => {
      const value = logObj[field];
      const rendered =
        typeof value === "object"
          ? JSON.stringify(value, null, 2)
              .split("\n")
              .map((l) => "  " + l)
              .join("\n")
          : String(value);
      console.error(`  ${field}: ${rendered}`);
    });
}

/**
 * 콘솔 출력 Hook
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
const prettyConsoleHooks: pino.LoggerOptions["hooks"] = {
  logMethod(inputArgs, method, level) {
    method.apply(this, inputArgs);

    const [first, second] = inputArgs;
    const logObj: Record<string, unknown> = {};

    if (typeof first === "string") {
      logObj.msg = first;
    } else if (typeof first === "object" && first !== null) {
      Object.assign(logObj, first);
      if (typeof second === "string") {
        logObj.msg = second;
      }
    }

    formatConsolePretty(logObj, level);
  },
};

const streams: pino.StreamEntry[] = [];

if (!LOG_PRETTY) {
  streams.push({ level: "trace", stream: process.stdout });
}

if (LOG_DIR) {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }
  streams.push({
    level: "trace",
    stream: createRotatingStream(LOG_DIR, SERVICE_NAME),
  });
  streams.push({
    level: "error",
    stream: createRotatingStream(LOG_DIR, "error"),
  });
}

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(
  LOG_PRETTY ? { ...baseConfig, hooks: prettyConsoleHooks } : baseConfig,
  pino.multistream(streams),
);

export { logger };

export type Logger = pino.Logger;
