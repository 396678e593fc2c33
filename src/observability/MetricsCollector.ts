// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  readonly registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // Request metrics
    this.counters.set(
      'dep_requests_total',
      new Counter({
        name: 'dep_requests_total',
        help: 'DEP API requests sent, by outcome',
        labelNames: ['method', 'path', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'dep_request_duration',
      new Histogram({
        name: 'dep_request_duration_seconds',
        help: 'DEP API request duration',
        labelNames: ['method', 'path', 'status'],
        buckets: [0.1, 0.25, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    // Session metrics
    this.counters.set(
      'dep_auth_handshakes_total',
      new Counter({
        name: 'dep_auth_handshakes_total',
        help: 'Session handshakes performed against /session',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'dep_session_dedup',
      new Counter({
        name: 'dep_session_dedup_total',
        help: 'Session requests that joined an in-flight handshake',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'dep_auth_retries',
      new Counter({
        name: 'dep_auth_retries_total',
        help: 'Requests reissued after a session expiry signal',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'dep_session_rotation_failures',
      new Counter({
        name: 'dep_session_rotation_failures_total',
        help: 'Server-rotated session tokens the store failed to persist',
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    this.counters.get(name)?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    this.histograms.get(name)?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
