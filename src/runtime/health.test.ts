import { describe, expect, it } from "vitest";
import { HealthTracker } from "./health.js";

describe("HealthTracker", () => {
  it("flags a dependency after consecutive failures and clears on success", () => {
    const h = new HealthTracker(2, () => 1234);
    h.failure("oracle", "HTTP 503");
    expect(h.isDegraded("oracle")).toBe(false);
    h.failure("oracle", "HTTP 503");
    expect(h.isDegraded("oracle")).toBe(true);
    expect(h.snapshot().oracle).toEqual({
      degraded: true,
      consecutiveFailures: 2,
      totalFailures: 2,
      lastError: "HTTP 503",
      lastFailureAt: 1234,
    });

    h.success("oracle");
    expect(h.isDegraded("oracle")).toBe(false);
    expect(h.snapshot().oracle?.consecutiveFailures).toBe(0);
    expect(h.snapshot().oracle?.totalFailures).toBe(2);
  });

  it("reports only dependencies it has seen", () => {
    const h = new HealthTracker();
    h.success("prices");
    expect(Object.keys(h.snapshot())).toEqual(["prices"]);
    expect(h.isDegraded("classifier")).toBe(false);
  });
});
