// backend/services/schooldata/src/mappers/meal.mapper.ts
import { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import { absent, present, type CellValue, type MealPayload } from "../contracts/cache.contract";
import { parseRows, toNumberOrNull } from "./rows";

const zMealRow = z
  .object({
    MLSV_YMD: z.string(),
    DDISH_NM: z.string().optional(),
    CAL_INFO: z.string().optional(),
  })
  .passthrough();

type MenuItem = MealPayload["menus"][number];

const ALLERGY = /([0-9]+)\./g;
const TRAILING_NOISE = /[ #&*+,\-.=@_]+$/;
export const HIGHLIGHT_MARK = "⭐";

/**
 * One dish line → name + allergy codes (1..18).
 * "제육볶음(5.10.13.)" → { name: "제육볶음", allergies: [5, 10, 13] }
 */
export function parseDish(line: string, highlightKeywords: readonly string[]): MenuItem | null {
  const allergies = [...line.matchAll(ALLERGY)]
    .map((m) => Number(m[1]))
    .filter((n) => n >= 1 && n <= 18);

  const name = line.replace(ALLERGY, "").replace(/\(\)/g, "").trim().replace(TRAILING_NOISE, "");
  if (!name) return null;

  const highlighted = highlightKeywords.some((k) => name.includes(k));
  return { name: highlighted ? `${HIGHLIGHT_MARK}${name}` : name, allergies };
}

/** "812.3 Kcal" → 812.3 */
export function parseCalories(v: string | undefined): number | null {
  if (!v) return null;
  return toNumberOrNull(v.replace(/kcal/i, ""));
}

export function mealToCell(
  raw: RawRecord,
  highlightKeywords: readonly string[]
): CellValue<MealPayload> {
  const rows = parseRows(raw, zMealRow);

  const menus: MenuItem[] = [];
  let calories: number | null = null;
  for (const row of rows) {
    const lines = (row.DDISH_NM ?? "").split(/<br\s*\/?>|\n/i);
    for (const line of lines) {
      const dish = parseDish(line, highlightKeywords);
      if (dish) menus.push(dish);
    }
    if (calories === null) calories = parseCalories(row.CAL_INFO);
  }

  if (!menus.length) return absent("noData");
  return present({ menus, calories });
}
