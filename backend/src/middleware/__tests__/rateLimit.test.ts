// backend/src/middleware/__tests__/rateLimit.test.ts

import { describe, it, expect, vi } from "vitest";
import { createRateLimit } from "../rateLimit";

function makeReq(ip: string) {
  return { ip } as any;
}

function makeRes() {
  const res: any = { locals: {} };
  res.setHeader = vi.fn();
  res.status = vi.fn(() => res);
  res.json = vi.fn(() => res);
  return res;
}

describe("createRateLimit", () => {
  it("blocks a client past the window budget", () => {
    const now = 1_000;
    const limit = createRateLimit({ windowMs: 60_000, max: 2, now: () => now });
    const next = vi.fn();

    limit(makeReq("10.0.0.1"), makeRes(), next);
    limit(makeReq("10.0.0.1"), makeRes(), next);
    const res = makeRes();
    limit(makeReq("10.0.0.1"), res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(res.status).toHaveBeenCalledWith(429);
    expect(res.json).toHaveBeenCalledWith({
      error: "Too many requests. Please slow down and try again.",
      code: "RATE_LIMITED",
    });
    expect(res.setHeader).toHaveBeenCalledWith("x-rate-limit-remaining", "0");
    expect(res.setHeader).toHaveBeenCalledWith("x-rate-limit-reset", "60");
  });

  it("starts a new window once the old one expires", () => {
    let now = 0;
    const limit = createRateLimit({ windowMs: 1_000, max: 1, now: () => now });
    const next = vi.fn();

    limit(makeReq("10.0.0.1"), makeRes(), next);
    limit(makeReq("10.0.0.1"), makeRes(), next);
    now = 1_000;
    limit(makeReq("10.0.0.1"), makeRes(), next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it("keeps separate buckets per client and per limiter", () => {
    const a = createRateLimit({ max: 1, now: () => 0 });
    const b = createRateLimit({ max: 1, now: () => 0 });
    const next = vi.fn();

    a(makeReq("10.0.0.1"), makeRes(), next);
    a(makeReq("10.0.0.2"), makeRes(), next);
    b(makeReq("10.0.0.1"), makeRes(), next);

    expect(next).toHaveBeenCalledTimes(3);
  });
});
