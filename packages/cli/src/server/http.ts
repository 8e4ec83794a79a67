/**
 * node:http server around the route handler, plus the session sweeper.
 */

import { createServer, type IncomingMessage, type Server } from "http";
import type { AddressInfo } from "net";
import type { Config } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { log } from "@/lib/log";
import type { RelayService } from "@/lib/service";
import { handleRequest, type RelayRequest } from "./routes";

/** Bodies larger than this are refused with 413. */
const MAX_BODY_BYTES = 10 * 1024 * 1024;

export type RunningServer = {
  server: Server;
  /** Base URL the server listens on */
  url: string;
  close(): Promise<void>;
};

export type StartServerOptions = {
  service: RelayService;
  config: Config;
  version: string;
};

class BodyTooLarge extends Error {}

function readBody(request: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    request.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLarge(`Request body exceeds ${MAX_BODY_BYTES} bytes`));
        request.destroy();
        return;
      }
      chunks.push(chunk);
    });
    request.once("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    request.once("error", reject);
  });
}

function headersOf(request: IncomingMessage): RelayRequest["headers"] {
  const headers: RelayRequest["headers"] = {};
  for (const [name, value] of Object.entries(request.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { service, config, version } = options;
  const logger = log.scope("http");

  const server = createServer((request, response) => {
    const send = (status: number, body: unknown) => {
      response.statusCode = status;
      response.setHeader("content-type", "application/json; charset=utf-8");
      response.end(JSON.stringify(body));
    };

    readBody(request)
      .then((body) =>
        handleRequest(
          {
            method: request.method ?? "GET",
            url: request.url ?? "/",
            headers: headersOf(request),
            body,
          },
          { service, config, version, logger }
        )
      )
      .then((result) => {
        logger.debug(`${request.method} ${request.url} -> ${result.status}`);
        send(result.status, result.body);
      })
      .catch((error: unknown) => {
        if (error instanceof BodyTooLarge) {
          send(413, { success: false, error: "PayloadTooLarge", message: error.message });
          return;
        }
        logger.error(`Request failed: ${getErrorMessage(error)}`);
        send(500, { success: false, error: "InternalError", message: "Internal server error" });
      });
  });

  const sweeper = setInterval(() => {
    service.sweep().catch((error: unknown) => {
      logger.warn(`Session sweep failed: ${getErrorMessage(error)}`);
    });
  }, config.sessions.sweepIntervalSeconds * 1000);
  sweeper.unref();

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : config.server.port;
  const url = `http://${displayHost(config.server.host)}:${port}`;

  return {
    server,
    url,
    async close() {
      clearInterval(sweeper);
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await service.close();
    },
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

function displayHost(host: string) {
  return host === "0.0.0.0" || host === "::" ? "localhost" : host;
}
