/**
 * CalendarPeriod 유틸리티 테스트
 */

import { describe, it, expect } from "@jest/globals";
import { formatPeriod, periodBetween } from "@/utils/CalendarPeriod";

const utc = (value: string): Date => new Date(`${value}T00:00:00.000Z`);

describe("periodBetween", () => {
  it("개월 + 일", () => {
    expect(periodBetween(utc("2023-01-15"), utc("2023-04-20"))).toEqual({
      totalMonths: 3,
      days: 5,
    });
  });

  it("월말 시작일은 월 길이에 맞춰 보정", () => {
    expect(periodBetween(utc("2023-01-31"), utc("2023-03-01"))).toEqual({
      totalMonths: 1,
      days: 1,
    });
  });

  it("같은 달 안의 기간", () => {
    expect(periodBetween(utc("2023-01-10"), utc("2023-01-25"))).toEqual({
      totalMonths: 0,
      days: 15,
    });
  });

  it("연도 경계", () => {
    expect(periodBetween(utc("2022-11-20"), utc("2023-02-10"))).toEqual({
      totalMonths: 2,
      days: 21,
    });
  });

  it("시각은 무시하고 UTC 날짜만 사용", () => {
    expect(
      periodBetween(
        new Date("2023-01-15T23:59:00.000Z"),
        new Date("2023-02-15T00:01:00.000Z"),
      ),
    ).toEqual({ totalMonths: 1, days: 0 });
  });
});

describe("formatPeriod", () => {
  it.each([
    ["2023-01-15", "2023-04-20", "3M5D"],
    ["2023-01-31", "2023-03-01", "1M1D"],
    ["2023-01-10", "2023-01-25", "15D"],
    ["2023-01-15", "2023-03-15", "2M"],
    ["2023-01-15", "2023-01-15", ""],
    ["2023-04-20", "2023-01-15", ""],
  ])("%s ~ %s → '%s'", (start, end, expected) => {
    expect(formatPeriod(periodBetween(utc(start), utc(end)))).toBe(expected);
  });
});
