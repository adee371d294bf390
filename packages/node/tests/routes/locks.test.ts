/**
 * Tests for lock routes.
 *
 * Covers: list, get, initiate, release, auth and error mapping.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestApp,
  jsonRequest,
  post,
  CONTROLLER,
  OTHER,
  OTHER_KEY,
  TOKEN,
  VAULT,
  DAY,
  T0,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

const MATURITY = T0 + 182 * DAY;

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

// =============================================================================
// GET /api/v1/locks
// =============================================================================

describe("GET /api/v1/locks", () => {
  it("returns an empty list when nothing is locked", async () => {
    const res = await t.app.request("/api/v1/locks");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [] });
  });

  it("lists active locks without authentication", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));

    const res = await t.app.request("/api/v1/locks");

    expect(await res.json()).toEqual({
      data: [{ asset: TOKEN, maturity: MATURITY, state: "locked", secondsRemaining: 182 * DAY }],
    });
  });
});

// =============================================================================
// POST /api/v1/locks/:asset
// =============================================================================

describe("POST /api/v1/locks/:asset", () => {
  it("locks the asset and returns 201 with the receipt", async () => {
    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { asset: TOKEN, amount: "1000", maturity: MATURITY },
    });
    expect(await t.ledger.balanceOf(TOKEN, VAULT)).toBe(1000n);
  });

  it("treats asset identifiers case-insensitively", async () => {
    const asset = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";
    t.ledger.mint(asset, CONTROLLER, 5n);

    const res = await t.app.request(post(`/api/v1/locks/${asset}`, { amount: "5" }));

    expect(res.status).toBe(201);
    expect(t.service.timelock.statusOf(`0x${asset.slice(2).toUpperCase()}`).state).toBe("locked");
  });

  it("returns 409 ALREADY_LOCKED for a second lock", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1" }));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ALREADY_LOCKED");
  });

  it("returns 401 without an API key", async () => {
    const res = await t.app.request(
      jsonRequest(`/api/v1/locks/${TOKEN}`, "POST", { amount: "1000" }),
    );

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Authentication required" },
    });
  });

  it("returns 401 for an unknown API key", async () => {
    const res = await t.app.request(
      post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }, "not-a-key"),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid API key");
  });

  it("returns 403 NOT_AUTHORIZED for a key that is not the controller", async () => {
    const res = await t.app.request(
      post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }, OTHER_KEY),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "NOT_AUTHORIZED", message: `Caller ${OTHER} is not the controller` },
    });
  });

  it("returns 400 ZERO_AMOUNT for a zero amount", async () => {
    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "0" }));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ZERO_AMOUNT");
  });

  it("returns 400 INVALID_ASSET for a malformed asset", async () => {
    const res = await t.app.request(post("/api/v1/locks/not-an-address", { amount: "10" }));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_ASSET");
  });

  it("returns 400 VALIDATION_ERROR for a numeric amount", async () => {
    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: 1000 }));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Request body validation failed");
    expect(body.error.details).toEqual({
      issues: [{ path: "amount", message: "Expected string, received number" }],
    });
  });

  it("returns 400 VALIDATION_ERROR for a malformed JSON body", async () => {
    const res = await t.app.request(
      new Request(`http://localhost/api/v1/locks/${TOKEN}`, {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Api-Key": "test-controller-key" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });

  it("returns 502 TRANSFER_PULL_FAILED with the adapter's explanation", async () => {
    t.ledger.failNext("pull", "rejected");

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: {
        code: "TRANSFER_PULL_FAILED",
        message: `Pull of 1000 ${TOKEN} failed: simulated rejected pull`,
        details: { transfer: { kind: "rejected", message: "simulated rejected pull" } },
      },
    });
    expect((await t.app.request(`/api/v1/locks/${TOKEN}`)).status).toBe(200);
    expect(t.service.listLocks()).toEqual([]);
  });

  it("serializes concurrent lock requests", async () => {
    const [first, second] = await Promise.all([
      t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" })),
      t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" })),
    ]);

    expect([first.status, second.status].sort()).toEqual([201, 409]);
    // The losing request never pulled.
    expect(await t.ledger.balanceOf(TOKEN, CONTROLLER)).toBe(9_000n);
  });
});

// =============================================================================
// GET /api/v1/locks/:asset
// =============================================================================

describe("GET /api/v1/locks/:asset", () => {
  it("reports an unlocked asset with its held balance", async () => {
    const res = await t.app.request(`/api/v1/locks/${TOKEN}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        asset: TOKEN,
        maturity: null,
        state: "unlocked",
        secondsRemaining: 0,
        heldBalance: "0",
      },
    });
  });

  it("reports remaining time and the held balance of a lock", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));
    t.clock.advance(100 * DAY);

    const res = await t.app.request(`/api/v1/locks/${TOKEN}`);

    expect(await res.json()).toEqual({
      data: {
        asset: TOKEN,
        maturity: MATURITY,
        state: "locked",
        secondsRemaining: 82 * DAY,
        heldBalance: "1000",
      },
    });
  });
});

// =============================================================================
// POST /api/v1/locks/:asset/release
// =============================================================================

describe("POST /api/v1/locks/:asset/release", () => {
  it("returns 409 NOT_VESTED when no lock exists", async () => {
    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}/release`));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_VESTED");
  });

  it("returns 409 STILL_LOCKED before maturity", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));
    t.clock.advance(100 * DAY);

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}/release`));

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: {
        code: "STILL_LOCKED",
        message: `Asset ${TOKEN} is locked until ${MATURITY} (${82 * DAY}s remaining)`,
      },
    });
  });

  it("releases the full held balance, including direct deposits", async () => {
    t.ledger.mint(TOKEN, OTHER, 250n);
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));
    t.clock.advance(10 * DAY);
    t.ledger.deposit(TOKEN, OTHER, 250n);
    t.clock.advance(173 * DAY);

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}/release`));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { asset: TOKEN, amount: "1250" } });
    expect(await t.ledger.balanceOf(TOKEN, CONTROLLER)).toBe(10_250n);

    const after = await t.app.request(`/api/v1/locks/${TOKEN}`);
    expect(await after.json()).toEqual({
      data: {
        asset: TOKEN,
        maturity: null,
        state: "unlocked",
        secondsRemaining: 0,
        heldBalance: "0",
      },
    });
  });

  it("returns 502 TRANSFER_PUSH_FAILED and leaves the asset unlocked", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));
    t.clock.advance(182 * DAY);
    t.ledger.failNext("push", "ambiguous");

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}/release`));

    expect(res.status).toBe(502);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("TRANSFER_PUSH_FAILED");
    expect(body.error.details).toEqual({
      transfer: { kind: "ambiguous", message: "simulated ambiguous push" },
    });
    expect(t.service.listLocks()).toEqual([]);
    expect(await t.ledger.balanceOf(TOKEN, VAULT)).toBe(1000n);
  });

  it("lets a nested release made during the push fail NOT_VESTED", async () => {
    await t.app.request(post(`/api/v1/locks/${TOKEN}`, { amount: "1000" }));
    t.clock.advance(182 * DAY);

    const nested: unknown[] = [];
    t.ledger.onTransfer(async (transfer) => {
      if (transfer.direction === "push") {
        await t.service.timelock.release(CONTROLLER, TOKEN).catch((err: unknown) => {
          nested.push(err);
        });
      }
    });

    const res = await t.app.request(post(`/api/v1/locks/${TOKEN}/release`));

    expect(res.status).toBe(200);
    expect(nested).toHaveLength(1);
    expect(nested[0]).toMatchObject({ code: "NOT_VESTED" });
    expect(await t.ledger.balanceOf(TOKEN, CONTROLLER)).toBe(10_000n);
  });
});
