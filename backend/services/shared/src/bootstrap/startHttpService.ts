// backend/services/shared/src/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 in tests for ephemeral port
  host: string;
  serviceName: string;
  logger: Logger;
  /** Runs after the server stopped accepting connections. */
  onStop?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, host, serviceName, logger, onStop } = opts;

  const server = app.listen(port, host, () => {
    const addr = server.address();
    const boundPort = isAddressInfo(addr) ? addr.port : port;
    logger.info({ service: serviceName, host, port: boundPort }, "service listening");
  });

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }).then(() => (onStop ? onStop() : undefined));

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      }
    );
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}

function isAddressInfo(addr: string | AddressInfo | null): addr is AddressInfo {
  return typeof addr === "object" && addr !== null;
}
