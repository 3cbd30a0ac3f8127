import { FreshnessPolicy } from "../freshness-policy";

describe("FreshnessPolicy", () => {
  const policy = new FreshnessPolicy({ file: 1_000, index: 100 });

  it("should treat the exact duration as stale", () => {
    expect(policy.isFresh({ kind: "file", storedAt: 0 }, 999)).toBe(true);
    expect(policy.isFresh({ kind: "file", storedAt: 0 }, 1_000)).toBe(false);
  });

  it("should apply the duration for the entry's kind", () => {
    expect(policy.isFresh({ kind: "index", storedAt: 0 }, 150)).toBe(false);
    expect(policy.isFresh({ kind: "file", storedAt: 0 }, 150)).toBe(true);
  });

  it("should report expiry times", () => {
    expect(policy.expiresAt({ kind: "index", storedAt: 5_000 })).toBe(5_100);
  });

  it("should never consider anything fresh with a zero duration", () => {
    const disabled = new FreshnessPolicy({ file: 0, index: 0 });
    expect(disabled.isFresh({ kind: "file", storedAt: 10 }, 10)).toBe(false);
  });
});
