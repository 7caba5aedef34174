// backend/services/schooldata/test/dates.spec.ts
import { describe, it, expect } from "vitest";
import {
  addDays,
  coalesceRuns,
  eachDate,
  fromCompact,
  intersect,
  isIsoDate,
  spanOf,
  spanDays,
  todayIn,
  toCompact,
  zonedParts,
} from "../src/utils/dates";

describe("dates", () => {
  it("accepts only real calendar dates", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-3-01")).toBe(false);
  });

  it("adds days across month and year boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts inclusive spans and enumerates dates", () => {
    expect(spanDays({ start: "2024-03-01", end: "2024-03-01" })).toBe(1);
    expect(spanDays({ start: "2024-03-01", end: "2024-03-31" })).toBe(31);
    expect(eachDate({ start: "2024-03-30", end: "2024-04-01" })).toEqual([
      "2024-03-30",
      "2024-03-31",
      "2024-04-01",
    ]);
  });

  it("converts compact provider dates", () => {
    expect(fromCompact("20240301")).toBe("2024-03-01");
    expect(fromCompact("20240230")).toBeNull();
    expect(fromCompact("2024-03-01")).toBeNull();
    expect(toCompact("2024-03-01")).toBe("20240301");
  });

  it("resolves today in the configured zone", () => {
    // 2024-03-01T16:30Z is 2024-03-02 01:30 in Seoul
    const at = new Date("2024-03-01T16:30:00Z");
    expect(todayIn("Asia/Seoul", at)).toBe("2024-03-02");
    expect(todayIn("UTC", at)).toBe("2024-03-01");
    expect(zonedParts(at, "Asia/Seoul")).toEqual({ date: "2024-03-02", hour: 1, minute: 30 });
  });

  it("coalesces dates into contiguous runs capped by span", () => {
    expect(
      coalesceRuns(["2024-03-05", "2024-03-01", "2024-03-02", "2024-03-03", "2024-03-02"], 31)
    ).toEqual([
      { start: "2024-03-01", end: "2024-03-03" },
      { start: "2024-03-05", end: "2024-03-05" },
    ]);
    expect(coalesceRuns(["2024-03-01", "2024-03-02", "2024-03-03"], 2)).toEqual([
      { start: "2024-03-01", end: "2024-03-02" },
      { start: "2024-03-03", end: "2024-03-03" },
    ]);
    expect(coalesceRuns([], 31)).toEqual([]);
  });

  it("spans and intersects ranges", () => {
    expect(spanOf(["2024-03-05", "2024-03-01", "2024-03-03"])).toEqual({ start: "2024-03-01", end: "2024-03-05" });
    expect(spanOf([])).toBeNull();
    expect(intersect({ start: "2024-03-01", end: "2024-03-05" }, { start: "2024-03-04", end: "2024-03-09" })).toEqual({
      start: "2024-03-04",
      end: "2024-03-05",
    });
    expect(intersect({ start: "2024-03-01", end: "2024-03-02" }, { start: "2024-03-03", end: "2024-03-04" })).toBeNull();
  });
});
