// backend/services/schooldata/src/controllers/days/handlers/schemas.ts
import { z } from "zod";
import { isIsoDate } from "../../../utils/dates";

const zIsoDate = z.string().refine(isIsoDate, { message: "expected YYYY-MM-DD" });
const zPositiveInt = z.coerce.number().int().min(1);

/**
 * GET /days query.
 * - `date` alone selects one day; otherwise `from`/`to` (each optional).
 * - `grade` and `class` select one timetable section and come as a pair.
 */
export const zDaysQuery = z
  .object({
    date: zIsoDate.optional(),
    from: zIsoDate.optional(),
    to: zIsoDate.optional(),
    grade: zPositiveInt.optional(),
    class: zPositiveInt.optional(),
  })
  .strict()
  .refine((q) => !(q.date && (q.from || q.to)), {
    message: "use either date or from/to",
    path: ["date"],
  })
  .refine((q) => (q.grade === undefined) === (q.class === undefined), {
    message: "grade and class go together",
    path: ["class"],
  });

export type DaysQuery = z.infer<typeof zDaysQuery>;
