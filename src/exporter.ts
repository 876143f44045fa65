import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import defaultLogger from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { renderExposition } from './metrics/prometheus.js';
import {
  collectStatusFromFile,
  createMeasurement,
  createStatusSpecs,
  MeasurementBuffer,
  type CollectStatusOptions,
  type Measurement,
  type StatusDialect,
  type StatusSpecs
} from './status/index.js';

export type StatusCollector = (
  statusPath: string,
  options: CollectStatusOptions
) => Promise<StatusDialect>;

export type StatusExporterOptions = {
  statusPaths: string[];
  ignoreIndividuals?: boolean;
  namespace?: string;
  logger?: Logger;
  metrics?: MetricsRegistry;
  collect?: StatusCollector;
};

export type SourceResult = {
  statusPath: string;
  up: boolean;
  dialect: StatusDialect | null;
  durationMs: number;
  error: unknown;
};

export type CollectResult = {
  measurements: Measurement[];
  sources: SourceResult[];
};

/**
 * Scrapes every configured status file and reports an `up` gauge per file.
 * Files are read concurrently; a failure in one never hides the others.
 */
export class StatusExporter {
  readonly specs: StatusSpecs;
  readonly statusPaths: readonly string[];
  readonly namespace: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly collectStatus: StatusCollector;

  constructor(options: StatusExporterOptions) {
    this.statusPaths = [...options.statusPaths];
    this.namespace = options.namespace ?? 'openvpn';
    this.specs = createStatusSpecs({
      namespace: this.namespace,
      ignoreIndividuals: options.ignoreIndividuals
    });
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.collectStatus = options.collect ?? collectStatusFromFile;
  }

  async collect(): Promise<CollectResult> {
    const scrapes = await Promise.all(this.statusPaths.map(statusPath => this.scrape(statusPath)));
    this.metrics.retainSources(this.statusPaths);

    const measurements: Measurement[] = [];
    const sources: SourceResult[] = [];
    for (const { buffer, result } of scrapes) {
      measurements.push(...buffer.measurements());
      sources.push(result);
    }
    return { measurements, sources };
  }

  async render(): Promise<string> {
    const { text } = await this.scrapeAll();
    return text;
  }

  /** Collects every source and renders the exposition, keeping per-source results. */
  async scrapeAll(): Promise<{ text: string; sources: SourceResult[] }> {
    const { measurements, sources } = await this.collect();
    const body = renderExposition(measurements, {
      onDuplicate: measurement => {
        this.logger.warn(
          { metric: measurement.descriptor.name, labels: measurement.labels },
          'Dropping duplicate sample'
        );
      }
    });
    return { text: body + this.metrics.exportForPrometheus({ namespace: this.namespace }), sources };
  }

  private async scrape(statusPath: string) {
    let buffer = new MeasurementBuffer();
    const startedAt = performance.now();
    let dialect: StatusDialect | null = null;
    let error: unknown = null;

    try {
      dialect = await this.collectStatus(statusPath, {
        specs: this.specs,
        emitter: buffer,
        logger: this.logger
      });
    } catch (caught) {
      error = caught;
      // a custom collector may have emitted before failing
      buffer = new MeasurementBuffer();
    }

    const durationMs = performance.now() - startedAt;
    const up = error === null;
    if (!up) {
      this.logger.warn({ err: error, statusPath }, 'Failed to scrape status file');
    }
    this.metrics.recordScrape({ source: statusPath, ok: up, durationMs, dialect, error });
    buffer.emit(createMeasurement(this.specs.up, up ? 1 : 0, [statusPath]));

    const result: SourceResult = { statusPath, up, dialect, durationMs, error };
    return { buffer, result };
  }
}
