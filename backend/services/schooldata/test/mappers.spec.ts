// backend/services/schooldata/test/mappers.spec.ts
import { describe, it, expect } from "vitest";
import { NormalizationError } from "../src/errors";
import { parseCalories, parseDish } from "../src/mappers/meal.mapper";
import { normalize } from "../src/mappers/normalizer";

const opts = { highlightKeywords: ["치킨", "피자"] };

describe("meal", () => {
  it("strips allergy codes and marks highlighted dishes", () => {
    expect(parseDish("제육볶음(5.10.13.)", [])).toEqual({ name: "제육볶음", allergies: [5, 10, 13] });
    expect(parseDish("치킨너겟(1.2.5.)", opts.highlightKeywords)).toEqual({
      name: "⭐치킨너겟",
      allergies: [1, 2, 5],
    });
    expect(parseDish("쌀밥", [])).toEqual({ name: "쌀밥", allergies: [] });
    expect(parseDish("  ", [])).toBeNull();
  });

  it("ignores codes outside 1..18", () => {
    expect(parseDish("우유(2.19.)", [])).toEqual({ name: "우유", allergies: [2] });
  });

  it("reads calories", () => {
    expect(parseCalories("812.3 Kcal")).toBe(812.3);
    expect(parseCalories("")).toBeNull();
    expect(parseCalories(undefined)).toBeNull();
  });

  it("normalizes a lunch row", () => {
    const cell = normalize(
      "meal",
      {
        dataType: "meal",
        date: "2024-03-04",
        rows: [
          {
            MLSV_YMD: "20240304",
            DDISH_NM: "쌀밥<br/>배추김치(9.13.)<br/>피자(1.2.6.)",
            CAL_INFO: "756.2 Kcal",
          },
        ],
      },
      opts
    );
    expect(cell).toEqual({
      key: { dataType: "meal", date: "2024-03-04", grade: null, classNo: null },
      value: {
        kind: "present",
        value: {
          menus: [
            { name: "쌀밥", allergies: [] },
            { name: "배추김치", allergies: [9, 13] },
            { name: "⭐피자", allergies: [1, 2, 6] },
          ],
          calories: 756.2,
        },
      },
    });
  });

  it("maps an empty dish list to noData", () => {
    const cell = normalize(
      "meal",
      { dataType: "meal", date: "2024-03-04", rows: [{ MLSV_YMD: "20240304", DDISH_NM: "" }] },
      opts
    );
    expect(cell.value).toEqual({ kind: "absent", reason: "noData" });
  });

  it("rejects rows it does not recognize", () => {
    expect(() =>
      normalize("meal", { dataType: "meal", date: "2024-03-04", rows: [{ DDISH_NM: "쌀밥" }] }, opts)
    ).toThrow(NormalizationError);
  });
});

describe("schedule", () => {
  it("collects events with grade flags and a summary", () => {
    const cell = normalize(
      "schedule",
      {
        dataType: "schedule",
        date: "2024-03-04",
        rows: [
          { AA_YMD: "20240304", EVENT_NM: "입학식", ONE_GRADE_EVENT_YN: "Y", TW_GRADE_EVENT_YN: "N" },
          { AA_YMD: "20240304", EVENT_NM: "학부모총회", ONE_GRADE_EVENT_YN: "Y", TW_GRADE_EVENT_YN: "Y" },
        ],
      },
      opts
    );
    expect(cell.value).toEqual({
      kind: "present",
      value: {
        entries: [
          { name: "입학식", grades: [1] },
          { name: "학부모총회", grades: [1, 2] },
        ],
        summary: "입학식(1학년)\n학부모총회(1학년, 2학년)",
      },
    });
  });

  it("treats a Saturday-off-only day as a holiday", () => {
    const cell = normalize(
      "schedule",
      { dataType: "schedule", date: "2024-03-09", rows: [{ AA_YMD: "20240309", EVENT_NM: "토요휴업일" }] },
      opts
    );
    expect(cell.value).toEqual({ kind: "absent", reason: "holiday" });
  });
});

describe("timetable", () => {
  it("orders subjects by period and keys by section", () => {
    const cell = normalize(
      "timetable",
      {
        dataType: "timetable",
        date: "2024-03-04",
        grade: 1,
        classNo: 2,
        rows: [
          { ALL_TI_YMD: "20240304", PERIO: "3", ITRT_CNTNT: "수학" },
          { ALL_TI_YMD: "20240304", PERIO: "1", ITRT_CNTNT: "국어" },
          { ALL_TI_YMD: "20240304", PERIO: "10", ITRT_CNTNT: "체육" },
          { ALL_TI_YMD: "20240304", PERIO: "2", ITRT_CNTNT: " " },
        ],
      },
      opts
    );
    expect(cell).toEqual({
      key: { dataType: "timetable", date: "2024-03-04", grade: 1, classNo: 2 },
      value: { kind: "present", value: { periods: ["국어", "수학", "체육"] } },
    });
  });

  it("fails a record without a section", () => {
    expect(() =>
      normalize("timetable", { dataType: "timetable", date: "2024-03-04", rows: [] }, opts)
    ).toThrow("timetable record without grade/class");
  });
});

describe("weather", () => {
  const item = (fcstTime: string, category: string, fcstValue: string) => ({
    baseDate: "20240303",
    baseTime: "2300",
    category,
    fcstDate: "20240304",
    fcstTime,
    fcstValue,
    nx: 60,
    ny: 127,
  });

  it("summarizes the 09:00 slot with daily min/max", () => {
    const cell = normalize(
      "weather",
      {
        dataType: "weather",
        date: "2024-03-04",
        rows: [
          item("0600", "TMN", "-1.0"),
          item("0600", "TMP", "0"),
          item("0900", "TMP", "3"),
          item("0900", "SKY", "3"),
          item("0900", "PTY", "0"),
          item("0900", "POP", "20"),
          item("0900", "REH", "55"),
          item("1500", "TMX", "9.0"),
        ],
      },
      opts
    );
    expect(cell.value).toEqual({
      kind: "present",
      value: {
        forecastAt: "2024-03-04T00:00:00.000Z",
        firstHour: 9,
        temperatureC: 3,
        minC: -1,
        maxC: 9,
        sky: "mostlyCloudy",
        precipitation: "none",
        precipProbability: 20,
        humidity: 55,
      },
    });
  });

  it("falls back to the earliest slot and unknown codes", () => {
    const cell = normalize(
      "weather",
      {
        dataType: "weather",
        date: "2024-03-04",
        rows: [item("1800", "TMP", "7"), item("1200", "TMP", "10"), item("1200", "SKY", "9")],
      },
      opts
    );
    expect(cell.value).toEqual({
      kind: "present",
      value: {
        forecastAt: "2024-03-04T03:00:00.000Z",
        firstHour: 12,
        temperatureC: 10,
        minC: null,
        maxC: null,
        sky: "unknown",
        precipitation: "unknown",
        precipProbability: null,
        humidity: null,
      },
    });
  });
});

describe("water temperature", () => {
  it("averages numeric samples and keeps the latest time", () => {
    const cell = normalize(
      "waterTemperature",
      {
        dataType: "waterTemperature",
        date: "2024-03-04",
        rows: [
          { YMD: "20240304", HR: "13:00", WATT: "6.1" },
          { YMD: "20240304", HR: "14:00", WATT: "6.4" },
          { YMD: "20240304", HR: "15:00", WATT: "점검중" },
        ],
      },
      opts
    );
    expect(cell.value).toEqual({
      kind: "present",
      value: { measuredAt: "2024-03-04T06:00:00.000Z", temperatureC: 6.25, samples: 2 },
    });
  });

  it("maps a day without numeric samples to noData", () => {
    const cell = normalize(
      "waterTemperature",
      { dataType: "waterTemperature", date: "2024-03-04", rows: [{ YMD: "20240304", HR: "13:00", WATT: "" }] },
      opts
    );
    expect(cell.value).toEqual({ kind: "absent", reason: "noData" });
  });
});

describe("normalize", () => {
  it("refuses a record of another type", () => {
    expect(() => normalize("meal", { dataType: "schedule", date: "2024-03-04", rows: [] }, opts)).toThrow(
      "record of type schedule handed to meal normalizer"
    );
  });
});
