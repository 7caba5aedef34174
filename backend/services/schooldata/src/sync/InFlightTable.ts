// backend/services/schooldata/src/sync/InFlightTable.ts
import type { DataType } from "../contracts/dataType";
import type { DateRange, IsoDate } from "../utils/dates";
import type { OperationOutcome } from "./sync.types";

/** One connector call for one sub-range, shared by every caller that needs it. */
export type InFlightOperation = {
  id: number;
  dataType: DataType;
  range: DateRange;
  /** Never rejects; failures are reported in the outcome. */
  promise: Promise<OperationOutcome>;
};

/**
 * (dataType, date) → operation currently fetching it.
 * Only the sync engine touches this, and only under its planning mutex
 * (register) or from the operation's own completion (release).
 */
export class InFlightTable {
  private readonly byCell = new Map<string, InFlightOperation>();

  private static cell(dataType: DataType, date: IsoDate): string {
    return `${dataType}:${date}`;
  }

  find(dataType: DataType, date: IsoDate): InFlightOperation | undefined {
    return this.byCell.get(InFlightTable.cell(dataType, date));
  }

  register(op: InFlightOperation, dates: IsoDate[]): void {
    for (const date of dates) {
      const cell = InFlightTable.cell(op.dataType, date);
      const existing = this.byCell.get(cell);
      if (existing && existing !== op) {
        throw new Error(`cell ${cell} already in flight (op ${existing.id})`);
      }
      this.byCell.set(cell, op);
    }
  }

  release(op: InFlightOperation): void {
    for (const [cell, holder] of this.byCell) {
      if (holder === op) this.byCell.delete(cell);
    }
  }

  get size(): number {
    return this.byCell.size;
  }
}
