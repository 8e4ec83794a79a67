/**
 * CLI Serve Command
 *
 * Runs the relay HTTP service until the process is told to stop.
 */

import { useAppContext } from "@/lib/context";
import { log } from "@/lib/log";
import { RelayService } from "@/lib/service";
import { type RunningServer, startServer } from "@/server/http";

export type ServeOptions = {
  host?: string;
  port?: number;
  /** Reported by GET / */
  version: string;
};

export async function serve(options: ServeOptions): Promise<RunningServer> {
  const ctx = useAppContext();
  if (!ctx) {
    throw new Error("App context not initialized");
  }

  const config = structuredClone(ctx.config);
  if (options.host !== undefined) config.server.host = options.host;
  if (options.port !== undefined) config.server.port = options.port;

  if (!config.server.webhookSecret) {
    log.warn("No webhook secret configured; webhook deliveries will be refused");
  }

  const service = new RelayService({ config });
  const running = await startServer({
    service,
    config,
    version: options.version,
  });

  log.info(`Relay listening on ${running.url}`);
  return running;
}
