import { EventEmitter } from 'node:events';
import type { StatusDialect } from '../status/detect.js';
import { formatPrometheusFamily, joinFamilies, type PrometheusSample } from './prometheus.js';

type CounterMap = Record<string, number>;

type SourceScrapeState = {
  total: number;
  failures: number;
  up: boolean;
  lastScrapeAt: number | null;
  lastDurationMs: number | null;
  lastDialect: StatusDialect | null;
  lastError: string | null;
  lastErrorAt: number | null;
};

type SourceScrapeSnapshot = {
  total: number;
  failures: number;
  up: boolean;
  lastScrapeAt: string | null;
  lastDurationMs: number | null;
  lastDialect: StatusDialect | null;
  lastError: string | null;
  lastErrorAt: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastChangeAt: string | null;
  };
  scrapes: {
    total: number;
    failures: number;
    bySource: Record<string, SourceScrapeSnapshot>;
  };
};

export type ScrapeRecord = {
  source: string;
  ok: boolean;
  durationMs: number;
  dialect?: StatusDialect | null;
  error?: unknown;
};

export type PrometheusSelfMetricsOptions = {
  namespace?: string;
};

const LOG_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private readonly sources = new Map<string, SourceScrapeState>();
  private scrapeTotal = 0;
  private scrapeFailures = 0;

  reset() {
    this.logLevelCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.sources.clear();
    this.scrapeTotal = 0;
    this.scrapeFailures = 0;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    this.currentLogLevel = level;
    if (previous && previous !== level) {
      this.lastLogLevelChangeAt = Date.now();
    }
  }

  recordScrape(record: ScrapeRecord) {
    const state = getSourceState(this.sources, record.source);
    const now = Date.now();
    state.total += 1;
    state.up = record.ok;
    state.lastScrapeAt = now;
    state.lastDurationMs = record.durationMs;
    state.lastDialect = record.dialect ?? null;
    this.scrapeTotal += 1;

    if (!record.ok) {
      state.failures += 1;
      state.lastError = describeError(record.error);
      state.lastErrorAt = now;
      this.scrapeFailures += 1;
    }
  }

  /** Drops state for status paths that are no longer configured. */
  retainSources(sources: Iterable<string>) {
    const keep = new Set(sources);
    for (const source of this.sources.keys()) {
      if (!keep.has(source)) {
        this.sources.delete(source);
      }
    }
  }

  snapshot(): MetricsSnapshot {
    const bySource: Record<string, SourceScrapeSnapshot> = {};
    const entries = Array.from(this.sources.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [source, state] of entries) {
      bySource[source] = {
        total: state.total,
        failures: state.failures,
        up: state.up,
        lastScrapeAt: toIso(state.lastScrapeAt),
        lastDurationMs: state.lastDurationMs,
        lastDialect: state.lastDialect,
        lastError: state.lastError,
        lastErrorAt: toIso(state.lastErrorAt)
      };
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        lastChangeAt: toIso(this.lastLogLevelChangeAt)
      },
      scrapes: {
        total: this.scrapeTotal,
        failures: this.scrapeFailures,
        bySource
      }
    };
  }

  exportForPrometheus(options: PrometheusSelfMetricsOptions = {}): string {
    const prefix = `${options.namespace ?? 'openvpn'}_exporter`;
    const sources = Array.from(this.sources.entries()).sort(([a], [b]) => a.localeCompare(b));

    const totals: PrometheusSample[] = sources.map(([source, state]) => ({
      value: state.total,
      labels: { status_path: source }
    }));
    const failures: PrometheusSample[] = sources.map(([source, state]) => ({
      value: state.failures,
      labels: { status_path: source }
    }));
    const durations: PrometheusSample[] = sources
      .filter(([, state]) => state.lastDurationMs !== null)
      .map(([source, state]) => ({
        value: (state.lastDurationMs ?? 0) / 1000,
        labels: { status_path: source }
      }));
    const logs: PrometheusSample[] = Object.entries(mapLogLevelCounters(this.logLevelCounters)).map(
      ([level, count]) => ({ value: count, labels: { level } })
    );

    const blocks: string[] = [];
    if (totals.length > 0) {
      blocks.push(
        formatPrometheusFamily({
          name: `${prefix}_scrapes_total`,
          help: 'Status file scrapes attempted.',
          type: 'counter',
          samples: totals
        }),
        formatPrometheusFamily({
          name: `${prefix}_scrape_failures_total`,
          help: 'Status file scrapes that failed.',
          type: 'counter',
          samples: failures
        })
      );
    }
    if (durations.length > 0) {
      blocks.push(
        formatPrometheusFamily({
          name: `${prefix}_last_scrape_duration_seconds`,
          help: 'Duration of the most recent scrape of each status file.',
          type: 'gauge',
          samples: durations
        })
      );
    }
    if (logs.length > 0) {
      blocks.push(
        formatPrometheusFamily({
          name: `${prefix}_log_messages_total`,
          help: 'Log messages written, by level.',
          type: 'counter',
          samples: logs
        })
      );
    }
    return joinFamilies(blocks);
  }
}

function getSourceState(map: Map<string, SourceScrapeState>, source: string): SourceScrapeState {
  const existing = map.get(source);
  if (existing) {
    return existing;
  }
  const created: SourceScrapeState = {
    total: 0,
    failures: 0,
    up: false,
    lastScrapeAt: null,
    lastDurationMs: null,
    lastDialect: null,
    lastError: null,
    lastErrorAt: null
  };
  map.set(source, created);
  return created;
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const ordered = Array.from(source.entries()).sort(([a], [b]) => {
    const left = LOG_LEVEL_ORDER.indexOf(a);
    const right = LOG_LEVEL_ORDER.indexOf(b);
    if (left === -1 && right === -1) {
      return a.localeCompare(b);
    }
    if (left === -1) {
      return 1;
    }
    if (right === -1) {
      return -1;
    }
    return left - right;
  });
  return Object.fromEntries(ordered);
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? 'unknown error' : String(error);
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { MetricsSnapshot, SourceScrapeSnapshot };
export { MetricsRegistry };
export default defaultRegistry;
