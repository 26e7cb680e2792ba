/**
 * 타임스탬프 유틸리티
 *
 * SOLID 원칙:
 * - SRP: 타임스탬프/날짜 문자열 생성만 담당
 */

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+01:00)
 *
 * @returns ISO 8601 형식의 타임스탬프 문자열
 */
export function getTimestampWithTimezone(): string {
  const now = new Date();
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  const hours = String(now.getHours()).padStart(2, "0");
  const minutes = String(now.getMinutes()).padStart(2, "0");
  const seconds = String(now.getSeconds()).padStart(2, "0");
  const milliseconds = String(now.getMilliseconds()).padStart(3, "0");

  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${milliseconds}${offsetSign}${String(offsetHours).padStart(2, "0")}:${String(offsetMinutes).padStart(2, "0")}`;
}

/**
 * dd.MM.yyyy 형식의 날짜 문자열 반환 (UTC 날짜 기준)
 * @returns 예: 15.01.2023
 */
export function formatDottedDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${day}.${month}.${year}`;
}
