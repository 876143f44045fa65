import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { PROMETHEUS_CONTENT_TYPE } from '../metrics/prometheus.js';
import { StatusExporter } from '../exporter.js';
import type { ConfigSource, ExporterConfig } from '../config/index.js';

export interface HttpServerOptions {
  config: ConfigSource;
  port?: number;
  host?: string;
  createExporter?: (config: ExporterConfig) => StatusExporter;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

function defaultExporterFactory(config: ExporterConfig): StatusExporter {
  return new StatusExporter({
    statusPaths: config.openvpn.statusPaths,
    ignoreIndividuals: config.openvpn.ignoreIndividuals,
    namespace: config.openvpn.namespace
  });
}

/**
 * Serves the exposition on the configured telemetry path. The exporter is
 * rebuilt whenever the config source hands back a different object, so a
 * reloaded configuration applies to the next scrape.
 */
export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 9176;
  const host = options.host ?? '0.0.0.0';
  const createExporter = options.createExporter ?? defaultExporterFactory;

  let exporterConfig: ExporterConfig | null = null;
  let exporter: StatusExporter | null = null;
  const resolveExporter = () => {
    const current = options.config.getConfig();
    if (exporter && exporterConfig === current) {
      return { config: current, exporter };
    }
    const next = createExporter(current);
    exporter = next;
    exporterConfig = current;
    return { config: current, exporter: next };
  };

  const server = http.createServer((req, res) => {
    handleRequest(req, res, resolveExporter).catch(error => {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.listen(port, host, () => resolve());
    server.on('error', reject);
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  resolveExporter: () => { config: ExporterConfig; exporter: StatusExporter }
): Promise<void> {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    sendJson(res, 405, { error: 'Method not allowed' }, req.method);
    return;
  }

  const url = new URL(req.url ?? '/', 'http://localhost');
  const { config, exporter } = resolveExporter();

  if (url.pathname === config.web.telemetryPath) {
    const body = await exporter.render();
    res.writeHead(200, { 'Content-Type': PROMETHEUS_CONTENT_TYPE });
    res.end(req.method === 'HEAD' ? undefined : body);
    return;
  }

  if (url.pathname === '/') {
    res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
    res.end(req.method === 'HEAD' ? undefined : renderLandingPage(config));
    return;
  }

  if (url.pathname === '/healthz') {
    sendJson(res, 200, { status: 'ok', metrics: metrics.snapshot() }, req.method);
    return;
  }

  sendJson(res, 404, { error: 'Not found' }, req.method);
}

function sendJson(res: ServerResponse, status: number, payload: unknown, method?: string) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(method === 'HEAD' ? undefined : JSON.stringify(payload));
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderLandingPage(config: ExporterConfig): string {
  const telemetryPath = escapeHtml(config.web.telemetryPath);
  const title = escapeHtml(config.app.name);
  return [
    '<html>',
    `<head><title>${title}</title></head>`,
    '<body>',
    `<h1>${title}</h1>`,
    `<p><a href="${telemetryPath}">Metrics</a></p>`,
    '</body>',
    '</html>'
  ].join('\n');
}

export default startHttpServer;
