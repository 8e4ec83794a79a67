/**
 * Device Authorization Grant state machine (RFC 8628), one per session.
 *
 *   init ──start()──▶ pending ──poll()──▶ polling ──▶ pending
 *                                                 ├──▶ authenticated
 *                                                 ├──▶ denied   (terminal)
 *                                                 └──▶ expired  (terminal)
 *
 * The machine never polls faster than the provider allows and never issues
 * a token request once the device code has expired. Network access goes
 * through a {@link DeviceAuthorizationProvider}.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8628
 */

import { setTimeout as sleep } from "timers/promises";
import {
  DEFAULT_POLL_INTERVAL_SECONDS,
  SLOW_DOWN_INCREMENT_SECONDS,
} from "../constants";
import { type ErrorKind, RelayError } from "../errors";
import { CredentialStore } from "../session/credential-store";
import type { SessionStage } from "../session/types";

// =============================================================================
// Provider port
// =============================================================================

export type DeviceAuthorization = {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Lifetime of the device code in seconds */
  expiresIn: number;
  /** Minimum seconds between token requests */
  interval?: number;
};

export type TokenGrant = {
  accessToken: string;
  /** Seconds until the access token expires, if it does */
  expiresIn?: number;
  scope?: string;
};

export type ExchangeOutcome =
  | { type: "token"; token: TokenGrant }
  | { type: "pending" }
  | { type: "slow_down" }
  | { type: "denied" }
  | { type: "expired" }
  | { type: "failed"; kind: ErrorKind; message: string };

export type DeviceAuthorizationProvider = {
  /**
   * Requests device and user codes. Rejects with a RelayError of kind
   * ProviderUnavailable or InvalidClient.
   */
  requestDeviceCode(): Promise<DeviceAuthorization>;
  /** One token request. Resolves with the outcome, never rejects. */
  exchangeDeviceCode(deviceCode: string): Promise<ExchangeOutcome>;
};

// =============================================================================
// State machine
// =============================================================================

export type PollResult = {
  stage: SessionStage;
  /** Milliseconds until the next poll may hit the provider */
  retryAfterMs?: number;
  /** Set when this attempt failed or reached a failed terminal stage */
  error?: { kind: ErrorKind; message: string };
};

export type DeviceFlowOptions = {
  /** Where the credential lands once authorized */
  credentials?: CredentialStore;
  now?: () => number;
};

export type WaitOptions = {
  signal?: AbortSignal;
  /** Called after every attempt that did not finish the flow */
  onPending?: (result: PollResult) => void;
};

export class DeviceFlow {
  readonly credentials: CredentialStore;
  private readonly provider: DeviceAuthorizationProvider;
  private readonly now: () => number;

  private currentStage: SessionStage = "init";
  private grant: DeviceAuthorization | null = null;
  private intervalSeconds = DEFAULT_POLL_INTERVAL_SECONDS;
  private deadline = 0;
  private nextPollAt = 0;

  constructor(
    provider: DeviceAuthorizationProvider,
    options: DeviceFlowOptions = {}
  ) {
    this.provider = provider;
    this.credentials = options.credentials ?? new CredentialStore();
    this.now = options.now ?? Date.now;
  }

  get stage(): SessionStage {
    return this.currentStage;
  }

  /** The provider's answer to start(), or null before it. */
  get authorization(): DeviceAuthorization | null {
    return this.grant;
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  /** Epoch milliseconds after which the device code is dead. */
  get expiresAt(): number {
    return this.deadline;
  }

  /**
   * Requests device and user codes. Valid only once, from init.
   */
  async start(): Promise<DeviceAuthorization> {
    if (this.currentStage !== "init") {
      throw new Error(`Device flow already started (${this.currentStage})`);
    }

    const grant = await this.provider.requestDeviceCode();
    const startedAt = this.now();

    this.grant = grant;
    this.intervalSeconds = grant.interval ?? DEFAULT_POLL_INTERVAL_SECONDS;
    this.deadline = startedAt + grant.expiresIn * 1000;
    this.nextPollAt = startedAt + this.intervalSeconds * 1000;
    this.currentStage = "pending";
    return grant;
  }

  /**
   * One poll attempt. Issues at most one token request, and none when the
   * interval has not elapsed, the code has expired or the stage is final.
   */
  async poll(): Promise<PollResult> {
    const grant = this.grant;
    if (this.currentStage === "init" || !grant) {
      throw new Error("Device flow not started");
    }

    switch (this.currentStage) {
      case "authenticated":
        return { stage: "authenticated" };
      case "denied":
        return { stage: "denied", error: deniedError() };
      case "expired":
        return { stage: "expired", error: expiredError() };
      case "polling":
        return { stage: "polling", retryAfterMs: this.intervalSeconds * 1000 };
    }

    const now = this.now();
    if (now >= this.deadline) {
      this.currentStage = "expired";
      return { stage: "expired", error: expiredError() };
    }
    if (now < this.nextPollAt) {
      return { stage: "pending", retryAfterMs: this.nextPollAt - now };
    }

    this.currentStage = "polling";
    let outcome: ExchangeOutcome;
    try {
      outcome = await this.provider.exchangeDeviceCode(grant.deviceCode);
    } catch (error) {
      outcome = {
        type: "failed",
        kind: "ProviderUnavailable",
        message: error instanceof Error ? error.message : String(error),
      };
    }

    return this.apply(outcome, this.now());
  }

  /**
   * Polls until the flow reaches a final stage, sleeping for the provider's
   * interval between attempts.
   */
  async waitForCompletion(options: WaitOptions = {}): Promise<PollResult> {
    const { signal, onPending } = options;

    for (;;) {
      if (signal?.aborted) {
        throw new RelayError("Cancelled", "Authorization was cancelled.");
      }

      const result = await this.poll();
      if (result.stage !== "pending" && result.stage !== "polling") {
        return result;
      }
      onPending?.(result);

      try {
        await sleep(result.retryAfterMs ?? this.intervalSeconds * 1000, undefined, {
          signal,
        });
      } catch (error) {
        throw new RelayError("Cancelled", "Authorization was cancelled.", {
          cause: error,
        });
      }
    }
  }

  private apply(outcome: ExchangeOutcome, at: number): PollResult {
    switch (outcome.type) {
      case "token":
        this.credentials.set({
          token: outcome.token.accessToken,
          expiresAt:
            outcome.token.expiresIn === undefined
              ? undefined
              : at + outcome.token.expiresIn * 1000,
          scope: outcome.token.scope,
        });
        this.currentStage = "authenticated";
        return { stage: "authenticated" };

      case "slow_down":
        this.intervalSeconds += SLOW_DOWN_INCREMENT_SECONDS;
        return this.backOff(at);

      case "pending":
        return this.backOff(at);

      case "denied":
        this.currentStage = "denied";
        return { stage: "denied", error: deniedError() };

      case "expired":
        this.currentStage = "expired";
        return { stage: "expired", error: expiredError() };

      case "failed":
        return {
          ...this.backOff(at),
          error: { kind: outcome.kind, message: outcome.message },
        };
    }
  }

  private backOff(at: number): PollResult {
    this.currentStage = "pending";
    this.nextPollAt = at + this.intervalSeconds * 1000;
    return { stage: "pending", retryAfterMs: this.nextPollAt - at };
  }
}

function deniedError() {
  return {
    kind: "AuthorizationDenied" as const,
    message: "Authorization was denied.",
  };
}

function expiredError() {
  return {
    kind: "AuthorizationExpired" as const,
    message: "Device code expired. Please try again.",
  };
}
