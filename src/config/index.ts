import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import nodeConfig from 'config';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type WebConfig = {
  /** `host:port` or `:port`; an empty host listens on every interface. */
  listenAddress: string;
  telemetryPath: string;
};

export type OpenVpnConfig = {
  statusPaths: string[];
  ignoreIndividuals?: boolean;
  namespace?: string;
};

export type ExporterConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  web: WebConfig;
  openvpn: OpenVpnConfig;
};

export type ListenAddress = {
  host: string;
  port: number;
};

type JsonType = 'object' | 'array' | 'string' | 'number' | 'boolean';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const exporterConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'web', 'openvpn'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: LOG_LEVELS }
      }
    },
    web: {
      type: 'object',
      required: ['listenAddress', 'telemetryPath'],
      additionalProperties: false,
      properties: {
        listenAddress: { type: 'string' },
        telemetryPath: { type: 'string' }
      }
    },
    openvpn: {
      type: 'object',
      required: ['statusPaths'],
      additionalProperties: false,
      properties: {
        statusPaths: {
          type: 'array',
          items: { type: 'string' }
        },
        ignoreIndividuals: { type: 'boolean' },
        namespace: { type: 'string' }
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }
    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

/**
 * Splits `host:port`, `[v6]:port` or `:port`. Returns null when the port is
 * missing or out of range.
 */
export function parseListenAddress(value: string): ListenAddress | null {
  const match = /^(?:\[([^\]]*)\]|([^:]*)):(\d{1,5})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const port = Number(match[3]);
  if (!Number.isInteger(port) || port > 65535) {
    return null;
  }
  return { host: match[1] ?? match[2] ?? '', port };
}

function validateLogicalConfig(config: ExporterConfig) {
  const messages: string[] = [];

  if (!parseListenAddress(config.web.listenAddress)) {
    messages.push(
      `config.web.listenAddress "${config.web.listenAddress}" must look like host:port or :port`
    );
  }

  if (!config.web.telemetryPath.startsWith('/')) {
    messages.push('config.web.telemetryPath must start with "/"');
  } else if (config.web.telemetryPath === '/') {
    messages.push('config.web.telemetryPath must not be "/"');
  }

  if (config.openvpn.statusPaths.length === 0) {
    messages.push('config.openvpn.statusPaths must list at least one status file');
  }

  const seen = new Set<string>();
  config.openvpn.statusPaths.forEach((statusPath, index) => {
    if (statusPath.trim().length === 0) {
      messages.push(`config.openvpn.statusPaths[${index}] must be a non-empty string`);
      return;
    }
    if (seen.has(statusPath)) {
      messages.push(`config.openvpn.statusPaths[${index}] duplicates "${statusPath}"`);
    }
    seen.add(statusPath);
  });

  const namespace = config.openvpn.namespace;
  if (typeof namespace === 'string' && !/^[A-Za-z_][A-Za-z0-9_]*$/.test(namespace)) {
    messages.push('config.openvpn.namespace must be a valid metric name prefix');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

function matchesSchema(config: unknown, errors: string[]): config is ExporterConfig {
  errors.push(...validateAgainstSchema(exporterConfigSchema, config, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is ExporterConfig {
  const errors: string[] = [];
  if (!matchesSchema(config, errors)) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): ExporterConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ExporterConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads the merged node-config tree (`config/default.json` plus the
 * `NODE_ENV` and local overrides) and validates it.
 */
export function loadDefaultConfig(): ExporterConfig {
  const loaded: unknown = nodeConfig.util.toObject(nodeConfig);
  validateConfig(loaded);
  return loaded;
}

export interface ConfigSource {
  getConfig(): ExporterConfig;
}

export function staticConfigSource(config: ExporterConfig): ConfigSource {
  return { getConfig: () => config };
}

export type ConfigOverrides = {
  listenAddress?: string;
  telemetryPath?: string;
  statusPaths?: string[];
  ignoreIndividuals?: boolean;
};

export function applyConfigOverrides(
  config: ExporterConfig,
  overrides: ConfigOverrides
): ExporterConfig {
  const next: ExporterConfig = {
    app: { ...config.app },
    logging: { ...config.logging },
    web: {
      listenAddress: overrides.listenAddress ?? config.web.listenAddress,
      telemetryPath: overrides.telemetryPath ?? config.web.telemetryPath
    },
    openvpn: {
      ...config.openvpn,
      statusPaths: overrides.statusPaths ?? [...config.openvpn.statusPaths]
    }
  };
  if (typeof overrides.ignoreIndividuals === 'boolean') {
    next.openvpn.ignoreIndividuals = overrides.ignoreIndividuals;
  }
  validateConfig(next);
  return next;
}

/**
 * Applies command line overrides on top of whatever `source` currently
 * returns. The merged object is reused until the source hands back a new one.
 */
export function withConfigOverrides(source: ConfigSource, overrides: ConfigOverrides): ConfigSource {
  let base: ExporterConfig | null = null;
  let merged: ExporterConfig | null = null;
  return {
    getConfig() {
      const current = source.getConfig();
      if (merged && base === current) {
        return merged;
      }
      const next = applyConfigOverrides(current, overrides);
      base = current;
      merged = next;
      return next;
    }
  };
}

export type ConfigReloadEvent = {
  previous: ExporterConfig;
  next: ExporterConfig;
};

/**
 * Holds the current configuration and reloads it when the file changes.
 * A reload that fails validation keeps the previous configuration and emits
 * `error`.
 */
export class ConfigManager extends EventEmitter implements ConfigSource {
  private currentConfig: ExporterConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): ExporterConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): ExporterConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }
}

export { exporterConfigSchema };
