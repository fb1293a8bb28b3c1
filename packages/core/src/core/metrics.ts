/**
 * Usage counters shared by every scope of one runtime.
 *
 * Recording is a no-op unless tracking is enabled, so the hot paths pay a
 * single boolean check when metrics are off.
 */
export interface MetricsSnapshot {
  scopesCreated: number;
  scopesDisposed: number;
  registrations: number;
  resolutions: number;
  lazyMaterializations: number;
  factoryInvocations: number;
  deletions: number;
}

export type MetricName = keyof MetricsSnapshot;

const emptySnapshot = (): MetricsSnapshot => ({
  scopesCreated: 0,
  scopesDisposed: 0,
  registrations: 0,
  resolutions: 0,
  lazyMaterializations: 0,
  factoryInvocations: 0,
  deletions: 0,
});

export class Metrics {
  private counters = emptySnapshot();

  constructor(private enabled: boolean) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  record(name: MetricName): void {
    if (!this.enabled) return;
    this.counters[name]++;
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counters };
  }

  reset(): void {
    this.counters = emptySnapshot();
  }
}
