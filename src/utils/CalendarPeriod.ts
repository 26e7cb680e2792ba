/**
 * 달력 기간 계산 유틸리티
 *
 * 두 날짜(UTC 날짜 부분) 사이의 기간을 "전체 개월 수 + 남은 일 수"로 계산
 * - 종료일의 일(day)이 시작일보다 앞서면 개월 수를 하나 줄이고,
 *   시작일에 그 개월 수를 더한 날짜부터 남은 일 수를 센다
 * - 월 더하기 시 일(day)은 해당 월의 마지막 날로 보정 (1/31 + 1개월 = 2/28)
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

/**
 * 기간 계산 결과
 */
export interface CalendarPeriod {
  totalMonths: number;
  days: number;
}

function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

function lengthOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toEpochDay(date: CalendarDate): number {
  return Math.floor(Date.UTC(date.year, date.month - 1, date.day) / MS_PER_DAY);
}

function plusMonths(date: CalendarDate, months: number): CalendarDate {
  const monthIndex = date.year * 12 + (date.month - 1) + months;
  const year = Math.floor(monthIndex / 12);
  const month = monthIndex - year * 12 + 1;
  return {
    year,
    month,
    day: Math.min(date.day, lengthOfMonth(year, month)),
  };
}

/**
 * 시작일부터 종료일까지의 달력 기간
 * 종료일이 시작일보다 앞서면 음수 값이 반환될 수 있음
 */
export function periodBetween(startDate: Date, endDate: Date): CalendarPeriod {
  const start = toCalendarDate(startDate);
  const end = toCalendarDate(endDate);

  let totalMonths = end.year * 12 + end.month - (start.year * 12 + start.month);
  let days = end.day - start.day;

  if (totalMonths > 0 && days < 0) {
    totalMonths--;
    days = toEpochDay(end) - toEpochDay(plusMonths(start, totalMonths));
  } else if (totalMonths < 0 && days > 0) {
    totalMonths++;
    days -= lengthOfMonth(end.year, end.month);
  }

  return { totalMonths, days };
}

/**
 * 기간을 "<N>M<D>D" 형식으로 렌더링
 * 0 이하인 구간은 생략 (둘 다 생략되면 빈 문자열)
 */
export function formatPeriod(period: CalendarPeriod): string {
  const months = period.totalMonths > 0 ? `${period.totalMonths}M` : "";
  const days = period.days > 0 ? `${period.days}D` : "";
  return months + days;
}
