import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { LoggingConfig } from '../common/logger';
import { EntityStoreConfig } from '../persistence/types';
import { LifecycleSchedulerConfig } from '../lifecycle/LifecycleScheduler';
import { TelemetryGeneratorConfig } from '../telemetry/TelemetryGenerator';
import { DEFAULT_ANALYSIS_WINDOW_MINUTES, DEFAULT_DEVIATION_THRESHOLD } from '../analytics/BottleneckDetector';

/**
 * YAML configuration schema
 */
export interface YamlSimulationConfig {
  simulation: {
    name: string;
    environment?: string;
  };

  lifecycle?: {
    /** Poll interval (ms) */
    interval_ms?: number;
    /** Sleep after a failed cycle (ms) */
    backoff_ms?: number;
  };

  telemetry?: {
    interval_ms?: number;
    backoff_ms?: number;
  };

  analytics?: {
    window_minutes?: number;
    deviation_threshold?: number;
  };

  persistence?: {
    type?: 'memory' | 'wal';
    wal_path?: string;
    checksum?: boolean;
  };

  logging?: {
    lifecycle?: boolean;
    telemetry?: boolean;
    analytics?: boolean;
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Partial<Omit<YamlSimulationConfig, 'environments'>>;
  };
}

export interface AnalyticsConfig {
  analysisWindowMinutes: number;
  deviationThreshold: number;
}

export interface SimulationRuntimeConfig {
  store: EntityStoreConfig;
  lifecycle: Partial<LifecycleSchedulerConfig>;
  telemetry: Partial<TelemetryGeneratorConfig>;
  analytics: AnalyticsConfig;
  logging: LoggingConfig;
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalSection(parent: Section, key: string): Section | undefined {
  const value = parent[key];
  if (value === undefined || value === null) return undefined;
  if (!isSection(value)) {
    throw new Error(`${key} must be a mapping`);
  }
  return value;
}

function optionalPositiveNumber(section: Section, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${path}.${key} must be a positive number`);
  }
  return value;
}

function optionalNonNegativeNumber(section: Section, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`${path}.${key} must be a non-negative number`);
  }
  return value;
}

function optionalBoolean(section: Section, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`${path}.${key} must be a boolean`);
  }
  return value;
}

function optionalString(section: Section, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function parseStoreType(value: string | undefined, path: string): 'memory' | 'wal' | undefined {
  if (value === undefined || value === 'memory' || value === 'wal') return value;
  throw new Error(`${path} must be 'memory' or 'wal'`);
}

function setIfDefined<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

type IntervalSection = NonNullable<YamlSimulationConfig['lifecycle']>;

function parseIntervals(section: Section | undefined, path: string): IntervalSection | undefined {
  if (!section) return undefined;
  const intervals: IntervalSection = {};
  setIfDefined(intervals, 'interval_ms', optionalPositiveNumber(section, 'interval_ms', path));
  setIfDefined(intervals, 'backoff_ms', optionalPositiveNumber(section, 'backoff_ms', path));
  return intervals;
}

type ConfigBody = Partial<Omit<YamlSimulationConfig, 'environments'>>;

/**
 * Validate one configuration body (the top level or an environment override).
 * Keys absent from the YAML stay absent, so bodies merge with a plain spread.
 */
function parseBody(raw: Section): ConfigBody {
  const body: ConfigBody = {};

  const simulation = optionalSection(raw, 'simulation');
  if (simulation) {
    body.simulation = { name: optionalString(simulation, 'name', 'simulation') ?? '' };
    setIfDefined(body.simulation, 'environment', optionalString(simulation, 'environment', 'simulation'));
  }

  setIfDefined(body, 'lifecycle', parseIntervals(optionalSection(raw, 'lifecycle'), 'lifecycle'));
  setIfDefined(body, 'telemetry', parseIntervals(optionalSection(raw, 'telemetry'), 'telemetry'));

  const analytics = optionalSection(raw, 'analytics');
  if (analytics) {
    body.analytics = {};
    setIfDefined(body.analytics, 'window_minutes', optionalPositiveNumber(analytics, 'window_minutes', 'analytics'));
    setIfDefined(body.analytics, 'deviation_threshold', optionalNonNegativeNumber(analytics, 'deviation_threshold', 'analytics'));
  }

  const persistence = optionalSection(raw, 'persistence');
  if (persistence) {
    body.persistence = {};
    setIfDefined(body.persistence, 'type', parseStoreType(optionalString(persistence, 'type', 'persistence'), 'persistence.type'));
    setIfDefined(body.persistence, 'wal_path', optionalString(persistence, 'wal_path', 'persistence'));
    setIfDefined(body.persistence, 'checksum', optionalBoolean(persistence, 'checksum', 'persistence'));
  }

  const logging = optionalSection(raw, 'logging');
  if (logging) {
    body.logging = {};
    setIfDefined(body.logging, 'lifecycle', optionalBoolean(logging, 'lifecycle', 'logging'));
    setIfDefined(body.logging, 'telemetry', optionalBoolean(logging, 'telemetry', 'logging'));
    setIfDefined(body.logging, 'analytics', optionalBoolean(logging, 'analytics', 'logging'));
  }

  return body;
}

function mergeSection<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
  if (!override) return base;
  if (!base) return override;
  return { ...base, ...override };
}

/**
 * YAML configuration loader for the simulation runtime
 */
export class SimulationConfiguration extends EventEmitter {
  private config: YamlSimulationConfig | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = process.env.NODE_ENV ?? 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.config = this.parseFromYaml(yamlContent);
      this.configPath = filePath;

      this.applyEnvironmentOverrides();

      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load YAML configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Load configuration from a YAML string
   */
  loadFromString(yamlContent: string): void {
    this.config = this.parseFromYaml(yamlContent);
    this.configPath = null;
    this.applyEnvironmentOverrides();
    this.emit('config-loaded', { filePath: null, config: this.config });
  }

  /**
   * Parse and validate YAML content
   */
  parseFromYaml(yamlContent: string): YamlSimulationConfig {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      return this.validateConfiguration(parsed);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }
  }

  /**
   * Apply `NETDEPLOY_*` process environment overrides on top of the file
   */
  applyProcessEnvironment(env: NodeJS.ProcessEnv = process.env): void {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }

    const numeric = (name: string): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw === '') return undefined;
      const value = Number(raw);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`${name} must be a positive number`);
      }
      return value;
    };

    const lifecycle: IntervalSection = {};
    setIfDefined(lifecycle, 'interval_ms', numeric('NETDEPLOY_LIFECYCLE_INTERVAL_MS'));
    const telemetry: IntervalSection = {};
    setIfDefined(telemetry, 'interval_ms', numeric('NETDEPLOY_TELEMETRY_INTERVAL_MS'));
    const persistence: NonNullable<YamlSimulationConfig['persistence']> = {};
    setIfDefined(persistence, 'type', parseStoreType(env.NETDEPLOY_STORE_TYPE || undefined, 'NETDEPLOY_STORE_TYPE'));
    setIfDefined(persistence, 'wal_path', env.NETDEPLOY_WAL_PATH || undefined);

    this.config = SimulationConfiguration.mergeConfigurations(this.config, { lifecycle, telemetry, persistence });
  }

  /**
   * Convert the loaded configuration into runtime settings, filling defaults
   */
  toRuntimeConfig(): SimulationRuntimeConfig {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }

    const { lifecycle, telemetry, analytics, persistence, logging } = this.config;
    const store: EntityStoreConfig = persistence?.type === 'wal'
      ? { type: 'wal', walConfig: { filePath: persistence.wal_path, checksumEnabled: persistence.checksum } }
      : { type: 'memory' };

    const lifecycleConfig: Partial<LifecycleSchedulerConfig> = {};
    setIfDefined(lifecycleConfig, 'interval', lifecycle?.interval_ms);
    setIfDefined(lifecycleConfig, 'backoffInterval', lifecycle?.backoff_ms);

    const telemetryConfig: Partial<TelemetryGeneratorConfig> = {};
    setIfDefined(telemetryConfig, 'interval', telemetry?.interval_ms);
    setIfDefined(telemetryConfig, 'backoffInterval', telemetry?.backoff_ms);

    const loggingConfig: LoggingConfig = {};
    setIfDefined(loggingConfig, 'enableLifecycleLogs', logging?.lifecycle);
    setIfDefined(loggingConfig, 'enableTelemetryLogs', logging?.telemetry);
    setIfDefined(loggingConfig, 'enableAnalyticsLogs', logging?.analytics);

    return {
      store,
      lifecycle: lifecycleConfig,
      telemetry: telemetryConfig,
      analytics: {
        analysisWindowMinutes: analytics?.window_minutes ?? DEFAULT_ANALYSIS_WINDOW_MINUTES,
        deviationThreshold: analytics?.deviation_threshold ?? DEFAULT_DEVIATION_THRESHOLD
      },
      logging: loggingConfig
    };
  }

  getConfig(): YamlSimulationConfig | null {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(base: YamlSimulationConfig, override: ConfigBody): YamlSimulationConfig {
    const merged: YamlSimulationConfig = {
      simulation: {
        ...base.simulation,
        ...override.simulation,
        name: override.simulation?.name || base.simulation.name
      }
    };
    setIfDefined(merged, 'lifecycle', mergeSection(base.lifecycle, override.lifecycle));
    setIfDefined(merged, 'telemetry', mergeSection(base.telemetry, override.telemetry));
    setIfDefined(merged, 'analytics', mergeSection(base.analytics, override.analytics));
    setIfDefined(merged, 'persistence', mergeSection(base.persistence, override.persistence));
    setIfDefined(merged, 'logging', mergeSection(base.logging, override.logging));
    setIfDefined(merged, 'environments', base.environments);
    return merged;
  }

  private validateConfiguration(raw: unknown): YamlSimulationConfig {
    if (!isSection(raw)) {
      throw new Error('configuration must be a mapping');
    }

    const body = parseBody(raw);
    if (!body.simulation?.name) {
      throw new Error('simulation.name is required');
    }

    const config: YamlSimulationConfig = { ...body, simulation: body.simulation };

    const environments = optionalSection(raw, 'environments');
    if (environments) {
      config.environments = {};
      for (const [name, overrides] of Object.entries(environments)) {
        if (!isSection(overrides)) {
          throw new Error(`environments.${name} must be a mapping`);
        }
        config.environments[name] = parseBody(overrides);
      }
    }

    return config;
  }

  private applyEnvironmentOverrides(): void {
    const overrides = this.config?.environments?.[this.currentEnvironment];
    if (!this.config || !overrides) {
      return;
    }
    this.config = SimulationConfiguration.mergeConfigurations(this.config, overrides);
  }
}
