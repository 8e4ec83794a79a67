import { describe, expect, it } from "vitest";
import { RelayError } from "../errors";
import {
  type DeviceAuthorization,
  type DeviceAuthorizationProvider,
  DeviceFlow,
  type ExchangeOutcome,
} from "./device-flow";

const AUTHORIZATION: DeviceAuthorization = {
  deviceCode: "test-device-code",
  userCode: "ABCD-1234",
  verificationUri: "https://github.com/login/device",
  expiresIn: 900,
  interval: 5,
};

function createProvider(outcomes: ExchangeOutcome[]) {
  const exchanged: string[] = [];
  const provider: DeviceAuthorizationProvider = {
    requestDeviceCode: async () => AUTHORIZATION,
    exchangeDeviceCode: async (deviceCode) => {
      exchanged.push(deviceCode);
      const outcome = outcomes.shift();
      if (!outcome) throw new Error("no scripted outcome");
      return outcome;
    },
  };
  return { provider, exchanged };
}

function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("DeviceFlow", () => {
  it("moves from init to pending on start", async () => {
    const { provider } = createProvider([]);
    const flow = new DeviceFlow(provider, { now: () => 1000 });

    expect(flow.stage).toBe("init");
    await flow.start();

    expect(flow.stage).toBe("pending");
    expect(flow.authorization).toEqual(AUTHORIZATION);
    expect(flow.interval).toBe(5);
    expect(flow.expiresAt).toBe(1000 + 900_000);
  });

  it("refuses a second start", async () => {
    const { provider } = createProvider([]);
    const flow = new DeviceFlow(provider);
    await flow.start();
    await expect(flow.start()).rejects.toThrow("Device flow already started");
  });

  it("refuses to poll before start", async () => {
    const { provider } = createProvider([]);
    const flow = new DeviceFlow(provider);
    await expect(flow.poll()).rejects.toThrow("Device flow not started");
  });

  it("does not hit the provider before the interval elapses", async () => {
    const clock = createClock();
    const { provider, exchanged } = createProvider([]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(2000);
    expect(await flow.poll()).toEqual({ stage: "pending", retryAfterMs: 3000 });
    expect(exchanged).toEqual([]);
  });

  it("stays pending on authorization_pending and then authenticates", async () => {
    const clock = createClock();
    const { provider, exchanged } = createProvider([
      { type: "pending" },
      { type: "token", token: { accessToken: "test-token", expiresIn: 60 } },
    ]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(5000);
    expect(await flow.poll()).toEqual({ stage: "pending", retryAfterMs: 5000 });

    clock.advance(5000);
    expect(await flow.poll()).toEqual({ stage: "authenticated" });
    expect(flow.stage).toBe("authenticated");
    expect(flow.credentials.get(clock.now())).toEqual({
      token: "test-token",
      expiresAt: 10_000 + 60_000,
      scope: undefined,
    });
    expect(exchanged).toEqual(["test-device-code", "test-device-code"]);
  });

  it("adds five seconds to the interval on slow_down", async () => {
    const clock = createClock();
    const { provider } = createProvider([{ type: "slow_down" }]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(5000);
    expect(await flow.poll()).toEqual({
      stage: "pending",
      retryAfterMs: 10_000,
    });
    expect(flow.interval).toBe(10);

    clock.advance(5000);
    expect(await flow.poll()).toEqual({ stage: "pending", retryAfterMs: 5000 });
  });

  it("becomes denied and stays there without further requests", async () => {
    const clock = createClock();
    const { provider, exchanged } = createProvider([{ type: "denied" }]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(5000);
    const denied = await flow.poll();
    expect(denied.stage).toBe("denied");
    expect(denied.error?.kind).toBe("AuthorizationDenied");

    clock.advance(5000);
    expect((await flow.poll()).stage).toBe("denied");
    expect(exchanged).toHaveLength(1);
  });

  it("becomes expired on expired_token", async () => {
    const clock = createClock();
    const { provider } = createProvider([{ type: "expired" }]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(5000);
    const result = await flow.poll();
    expect(result.stage).toBe("expired");
    expect(result.error?.kind).toBe("AuthorizationExpired");
  });

  it("expires past the deadline without a network call", async () => {
    const clock = createClock();
    const { provider, exchanged } = createProvider([{ type: "pending" }]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(900_000);
    const result = await flow.poll();
    expect(result).toEqual({
      stage: "expired",
      error: {
        kind: "AuthorizationExpired",
        message: "Device code expired. Please try again.",
      },
    });
    expect(exchanged).toEqual([]);
  });

  it("keeps pending and reports ProviderUnavailable when the provider throws", async () => {
    const clock = createClock();
    const { provider } = createProvider([]);
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();

    clock.advance(5000);
    const result = await flow.poll();
    expect(result).toEqual({
      stage: "pending",
      retryAfterMs: 5000,
      error: { kind: "ProviderUnavailable", message: "no scripted outcome" },
    });
    expect(flow.stage).toBe("pending");
  });

  it("issues one request for overlapping polls", async () => {
    const clock = createClock();
    let release: (outcome: ExchangeOutcome) => void = () => {};
    let calls = 0;
    const provider: DeviceAuthorizationProvider = {
      requestDeviceCode: async () => AUTHORIZATION,
      exchangeDeviceCode: () => {
        calls += 1;
        return new Promise((resolve) => {
          release = resolve;
        });
      },
    };
    const flow = new DeviceFlow(provider, { now: clock.now });
    await flow.start();
    clock.advance(5000);

    const first = flow.poll();
    expect(flow.stage).toBe("polling");
    expect((await flow.poll()).stage).toBe("polling");

    release({ type: "token", token: { accessToken: "test-token" } });
    expect((await first).stage).toBe("authenticated");
    expect(calls).toBe(1);
  });

  describe("waitForCompletion", () => {
    it("polls until the flow finishes", async () => {
      const outcomes: ExchangeOutcome[] = [
        { type: "pending" },
        { type: "token", token: { accessToken: "test-token" } },
      ];
      const provider: DeviceAuthorizationProvider = {
        requestDeviceCode: async () => ({ ...AUTHORIZATION, interval: 0 }),
        exchangeDeviceCode: async () => outcomes.shift() ?? { type: "pending" },
      };
      const flow = new DeviceFlow(provider);
      await flow.start();

      const pending: number[] = [];
      const result = await flow.waitForCompletion({
        onPending: (attempt) => pending.push(attempt.retryAfterMs ?? -1),
      });

      expect(result).toEqual({ stage: "authenticated" });
      expect(pending).toEqual([0]);
      expect(flow.credentials.get()?.token).toBe("test-token");
    });

    it("rejects with Cancelled when aborted", async () => {
      const { provider } = createProvider([]);
      const flow = new DeviceFlow(provider);
      await flow.start();

      const controller = new AbortController();
      const wait = flow.waitForCompletion({ signal: controller.signal });
      controller.abort();

      const error = await wait.catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(RelayError);
      if (error instanceof RelayError) {
        expect(error.kind).toBe("Cancelled");
      }
    });
  });
});
