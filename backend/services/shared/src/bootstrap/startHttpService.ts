// backend/services/shared/src/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { IBoundLogger } from "../logger/Logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** 0 binds an ephemeral port. */
  port: number;
  serviceName: string;
  logger: IBoundLogger;
  /** Runs after the server closes on SIGTERM/SIGINT (stop workers, close DB). */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(opts: StartHttpServiceOptions): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = isAddressInfo(addr) ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    void stop()
      .then(() => onShutdown?.())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err: logger.serializeError(err) }, "shutdown failed");
          process.exit(1);
        }
      );
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}

function isAddressInfo(v: string | AddressInfo | null): v is AddressInfo {
  return v !== null && typeof v === "object";
}
