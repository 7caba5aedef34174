// backend/services/schooldata/src/sync/rangeValidation.ts
import { RangeValidationError } from "../errors";
import { isIsoDate, spanDays, type DateRange } from "../utils/dates";

export function assertOrderedRange(range: DateRange): void {
  if (!isIsoDate(range.start) || !isIsoDate(range.end)) {
    throw new RangeValidationError(`dates must be YYYY-MM-DD (got ${range.start}..${range.end})`);
  }
  if (range.start > range.end) {
    throw new RangeValidationError(`start ${range.start} is after end ${range.end}`);
  }
}

/** For externally requested ranges: ordered and at most maxDays long (inclusive). */
export function validateRequestedRange(range: DateRange, maxDays: number): void {
  assertOrderedRange(range);
  const span = spanDays(range);
  if (span > maxDays) {
    throw new RangeValidationError(`range spans ${span} days; at most ${maxDays} allowed`);
  }
}
