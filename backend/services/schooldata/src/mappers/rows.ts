// backend/services/schooldata/src/mappers/rows.ts
import type { z } from "zod";
import type { RawRecord } from "../connectors/connector.types";
import { NormalizationError } from "../errors";

/** Validate every row of a record; an unrecognized row fails the whole cell. */
export function parseRows<T>(raw: RawRecord, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return raw.rows.map((row, i) => {
    const r = schema.safeParse(row);
    if (!r.success) {
      const issue = r.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(row)"}: ${issue.message}` : "invalid row";
      throw new NormalizationError(raw.dataType, raw.date, `row ${i} not recognized (${where})`);
    }
    return r.data;
  });
}

/** Finite number or null; tolerates numeric strings with surrounding text like units. */
export function toNumberOrNull(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v !== "string") return null;
  const s = v.trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}
