// backend/services/schooldata/test/helpers/fakeConnector.ts
import type { FetchResult, IConnector, RawRecord } from "../../src/connectors/connector.types";
import type { DataType } from "../../src/contracts/dataType";
import type { DateRange } from "../../src/utils/dates";

export type FetchCall = { dataType: DataType; range: DateRange };

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (v: T) => void;
  reject: (err: unknown) => void;
};

export function deferred<T = void>(): Deferred<T> {
  let resolve: (v: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets every queued microtask (and promise chains built from them) run. */
export async function flush(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * Scriptable connector. `respond` decides each call's records (or throws);
 * `coverage` what part of the range the answer covers (all of it unless set);
 * an optional gate holds every call until released.
 */
export class FakeConnector implements IConnector {
  readonly calls: FetchCall[] = [];
  gate: Promise<void> | null = null;
  coverage: (range: DateRange) => DateRange | null = (range) => range;

  constructor(
    readonly provider: string,
    readonly dataTypes: readonly DataType[],
    public respond: (dataType: DataType, range: DateRange, attempt: number) => RawRecord[] | Promise<RawRecord[]> = () => [],
    readonly maxSpanDays = 31
  ) {}

  async fetch(dataType: DataType, range: DateRange): Promise<FetchResult> {
    this.calls.push({ dataType, range: { ...range } });
    if (this.gate) await this.gate;
    const records = await this.respond(dataType, range, this.calls.length);
    return { records, covered: this.coverage(range) };
  }

  callsFor(dataType: DataType): FetchCall[] {
    return this.calls.filter((c) => c.dataType === dataType);
  }
}
