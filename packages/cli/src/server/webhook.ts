/**
 * Platform webhook receiver.
 *
 * Deliveries are signed with HMAC-SHA256 over the raw body
 * (`X-Hub-Signature-256: sha256=<hex>`). Without a configured secret every
 * delivery is refused.
 */

import { createHmac, timingSafeEqual } from "crypto";
import { z } from "zod";
import type { ScopedLogger } from "@/lib/log";

const SIGNATURE_PREFIX = "sha256=";

export function signPayload(secret: string, payload: string | Buffer): string {
  const digest = createHmac("sha256", secret).update(payload).digest("hex");
  return `${SIGNATURE_PREFIX}${digest}`;
}

export function verifySignature(
  secret: string | undefined,
  payload: string | Buffer,
  header: string | undefined
): boolean {
  if (!secret || !header) {
    return false;
  }
  const expected = Buffer.from(signPayload(secret, payload));
  const received = Buffer.from(header);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

const accountSchema = z.object({ login: z.string() }).passthrough();
const repositoryListSchema = z.array(z.object({ full_name: z.string() }).passthrough());

const installationEventSchema = z
  .object({
    action: z.string(),
    installation: z.object({ id: z.number(), account: accountSchema.optional() }),
    repositories: repositoryListSchema.optional(),
  })
  .passthrough();

const installationRepositoriesEventSchema = z
  .object({
    action: z.string(),
    installation: z.object({ id: z.number() }).passthrough(),
    repositories_added: repositoryListSchema.default([]),
    repositories_removed: repositoryListSchema.default([]),
  })
  .passthrough();

export type WebhookDelivery = {
  event: string | undefined;
  payload: unknown;
};

/**
 * Logs the installation events the service cares about and returns the
 * message sent back to the platform.
 */
export function describeDelivery(
  delivery: WebhookDelivery,
  logger: ScopedLogger
): string {
  const { event, payload } = delivery;
  logger.info(`Received webhook: ${event ?? "unknown"}`);

  if (event === "installation") {
    const parsed = installationEventSchema.safeParse(payload);
    if (parsed.success) {
      const { action, installation, repositories = [] } = parsed.data;
      const account = installation.account?.login ?? "unknown account";
      logger.info(
        `Installation ${installation.id} ${action} for ${account} (${repositories.length} repositories)`
      );
      return `Installation ${action}`;
    }
  }

  if (event === "installation_repositories") {
    const parsed = installationRepositoriesEventSchema.safeParse(payload);
    if (parsed.success) {
      const { installation, repositories_added, repositories_removed } = parsed.data;
      for (const repo of repositories_added) {
        logger.info(`Installation ${installation.id} added ${repo.full_name}`);
      }
      for (const repo of repositories_removed) {
        logger.info(`Installation ${installation.id} removed ${repo.full_name}`);
      }
      return "Installation repositories updated";
    }
  }

  return "Event processed";
}
