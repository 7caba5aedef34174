// backend/services/shared/src/base/ServiceBase.ts
/**
 * Purpose:
 * - Root for runtime classes (connectors, repos, engines, workers).
 * - Provides a consistent bound logger across all services.
 *
 * Notes:
 * - service defaults from SVC_NAME to keep logs coherent per service.
 */

import { getLogger, type IBoundLogger } from "../logger/Logger";

type Dict = Record<string, unknown>;

export abstract class ServiceBase {
  protected readonly service: string;
  protected readonly log: IBoundLogger;
  private readonly baseLogContext: Dict;

  constructor(opts?: { service?: string; context?: Dict }) {
    this.service =
      (opts?.service || process.env.SVC_NAME || "unknown").trim() || "unknown";
    this.baseLogContext = {
      service: this.service,
      component: this.constructor.name,
      ...(opts?.context || {}),
    };
    this.log = getLogger().bind(this.baseLogContext);
  }

  protected bindLog(ctx: Dict): IBoundLogger {
    return this.log.bind(ctx);
  }
}
