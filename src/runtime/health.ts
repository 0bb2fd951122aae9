export const DEPENDENCIES = ["oracle", "classifier", "feed", "social", "prices", "notifier"] as const;
export type Dependency = (typeof DEPENDENCIES)[number];

export type DependencyHealth = {
  degraded: boolean;
  consecutiveFailures: number;
  totalFailures: number;
  lastError: string | null;
  lastFailureAt: number | null;
};

/** Consecutive-failure counters that surface sustained outages as flags. */
export class HealthTracker {
  private readonly state = new Map<Dependency, DependencyHealth>();

  constructor(
    private readonly degradedAfter = 3,
    private readonly now: () => number = Date.now
  ) {}

  private entry(dep: Dependency): DependencyHealth {
    let e = this.state.get(dep);
    if (!e) {
      e = {
        degraded: false,
        consecutiveFailures: 0,
        totalFailures: 0,
        lastError: null,
        lastFailureAt: null,
      };
      this.state.set(dep, e);
    }
    return e;
  }

  success(dep: Dependency) {
    const e = this.entry(dep);
    e.consecutiveFailures = 0;
    e.degraded = false;
  }

  failure(dep: Dependency, err: string) {
    const e = this.entry(dep);
    e.consecutiveFailures += 1;
    e.totalFailures += 1;
    e.lastError = err;
    e.lastFailureAt = this.now();
    e.degraded = e.consecutiveFailures >= this.degradedAfter;
  }

  isDegraded(dep: Dependency): boolean {
    return this.state.get(dep)?.degraded ?? false;
  }

  snapshot(): Partial<Record<Dependency, DependencyHealth>> {
    const out: Partial<Record<Dependency, DependencyHealth>> = {};
    for (const [k, v] of this.state) out[k] = { ...v };
    return out;
  }
}
