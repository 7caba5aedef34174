// backend/services/schooldata/src/connectors/connectorRegistry.ts
import { DATA_TYPES, type DataType } from "../contracts/dataType";
import type { IConnector } from "./connector.types";

/** Resolves the connector responsible for each data type. */
export class ConnectorRegistry {
  private readonly byType = new Map<DataType, IConnector>();

  constructor(connectors: readonly IConnector[]) {
    for (const c of connectors) {
      for (const t of c.dataTypes) {
        const existing = this.byType.get(t);
        if (existing) {
          throw new Error(`data type "${t}" claimed by both ${existing.provider} and ${c.provider}`);
        }
        this.byType.set(t, c);
      }
    }
  }

  forType(dataType: DataType): IConnector {
    const c = this.byType.get(dataType);
    if (!c) throw new Error(`no connector registered for data type "${dataType}"`);
    return c;
  }

  /** Data types with no connector; checked once at boot. */
  uncovered(): DataType[] {
    return DATA_TYPES.filter((t) => !this.byType.has(t));
  }
}
