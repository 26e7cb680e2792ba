/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Request ID, Service, Component 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 * @returns Request 컨텍스트가 포함된 자식 로거
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 서비스(프로세스) 전용 로거 생성
 * @param serviceName - 서비스 이름 (예: "server", "scheduler")
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * 컴포넌트 전용 로거 생성
 * @param component - 컴포넌트 이름 (예: "ProductService")
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * 중요 정보 로깅
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
