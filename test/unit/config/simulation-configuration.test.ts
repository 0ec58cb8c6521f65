import * as path from 'path';
import { SimulationConfiguration } from '../../../src/config/SimulationConfiguration';

const CONFIG_PATH = path.join(__dirname, '../../../config/simulation.yaml');

const MINIMAL_YAML = `
simulation:
  name: lab
`;

describe('SimulationConfiguration', () => {
  describe('Loading from file', () => {
    test('should apply the test environment overrides', async () => {
      const configuration = new SimulationConfiguration('test');
      await configuration.loadFromFile(CONFIG_PATH);

      expect(configuration.getConfigPath()).toBe(CONFIG_PATH);
      expect(configuration.getConfig()?.simulation.name).toBe('netdeploy');
      expect(configuration.toRuntimeConfig()).toEqual({
        store: { type: 'memory' },
        lifecycle: { interval: 50, backoffInterval: 100 },
        telemetry: { interval: 50, backoffInterval: 100 },
        analytics: { analysisWindowMinutes: 10, deviationThreshold: 2 },
        logging: { enableLifecycleLogs: true, enableTelemetryLogs: false, enableAnalyticsLogs: true }
      });
    });

    test('should switch production to the journaled store', async () => {
      const configuration = new SimulationConfiguration('production');
      await configuration.loadFromFile(CONFIG_PATH);

      const runtime = configuration.toRuntimeConfig();
      expect(runtime.store).toEqual({
        type: 'wal',
        walConfig: { filePath: './data/netdeploy.wal', checksumEnabled: true }
      });
      expect(runtime.lifecycle).toEqual({ interval: 2000, backoffInterval: 5000 });
      expect(runtime.logging.enableLifecycleLogs).toBe(false);
      expect(runtime.logging.enableAnalyticsLogs).toBe(true);
    });

    test('should report unreadable files with their path', async () => {
      const configuration = new SimulationConfiguration('development');
      const missing = path.join(__dirname, 'does-not-exist.yaml');
      const errors: unknown[] = [];
      configuration.on('config-error', event => errors.push(event));

      await expect(configuration.loadFromFile(missing)).rejects.toThrow(
        `Failed to load YAML configuration from ${missing}`
      );
      expect(errors).toHaveLength(1);
      expect(configuration.getConfig()).toBeNull();
    });
  });

  describe('Parsing', () => {
    test('should fill defaults for a minimal document', () => {
      const configuration = new SimulationConfiguration('development');
      configuration.loadFromString(MINIMAL_YAML);

      expect(configuration.toRuntimeConfig()).toEqual({
        store: { type: 'memory' },
        lifecycle: {},
        telemetry: {},
        analytics: { analysisWindowMinutes: 10, deviationThreshold: 2 },
        logging: {}
      });
    });

    test.each([
      ['- just\n- a list\n', 'configuration must be a mapping'],
      ['lifecycle:\n  interval_ms: 10\n', 'simulation.name is required'],
      ['simulation:\n  name: lab\nlifecycle:\n  interval_ms: -5\n', 'lifecycle.interval_ms must be a positive number'],
      ['simulation:\n  name: lab\nanalytics:\n  deviation_threshold: -1\n', 'analytics.deviation_threshold must be a non-negative number'],
      ['simulation:\n  name: lab\npersistence:\n  type: redis\n', "persistence.type must be 'memory' or 'wal'"],
      ['simulation:\n  name: lab\nlogging:\n  lifecycle: loud\n', 'logging.lifecycle must be a boolean'],
      ['simulation:\n  name: lab\nenvironments:\n  staging: 3\n', 'environments.staging must be a mapping']
    ])('should reject invalid document %#', (yamlContent, message) => {
      const configuration = new SimulationConfiguration('development');

      expect(() => configuration.loadFromString(yamlContent)).toThrow(`Failed to parse YAML configuration: ${message}`);
    });

    test('should accept a zero deviation threshold', () => {
      const configuration = new SimulationConfiguration('development');
      configuration.loadFromString(`${MINIMAL_YAML}analytics:\n  deviation_threshold: 0\n`);

      expect(configuration.toRuntimeConfig().analytics.deviationThreshold).toBe(0);
    });
  });

  describe('Process environment', () => {
    test('should override intervals and the store', () => {
      const configuration = new SimulationConfiguration('development');
      configuration.loadFromString(`${MINIMAL_YAML}lifecycle:\n  interval_ms: 1000\n  backoff_ms: 3000\n`);

      configuration.applyProcessEnvironment({
        NETDEPLOY_LIFECYCLE_INTERVAL_MS: '250',
        NETDEPLOY_STORE_TYPE: 'wal',
        NETDEPLOY_WAL_PATH: '/var/lib/netdeploy/entities.wal'
      });

      const runtime = configuration.toRuntimeConfig();
      expect(runtime.lifecycle).toEqual({ interval: 250, backoffInterval: 3000 });
      expect(runtime.telemetry).toEqual({});
      expect(runtime.store).toEqual({
        type: 'wal',
        walConfig: { filePath: '/var/lib/netdeploy/entities.wal', checksumEnabled: undefined }
      });
    });

    test('should ignore empty variables', () => {
      const configuration = new SimulationConfiguration('development');
      configuration.loadFromString(MINIMAL_YAML);

      configuration.applyProcessEnvironment({ NETDEPLOY_STORE_TYPE: '', NETDEPLOY_TELEMETRY_INTERVAL_MS: '' });

      expect(configuration.toRuntimeConfig().store).toEqual({ type: 'memory' });
    });

    test('should reject malformed values', () => {
      const configuration = new SimulationConfiguration('development');
      configuration.loadFromString(MINIMAL_YAML);

      expect(() => configuration.applyProcessEnvironment({ NETDEPLOY_TELEMETRY_INTERVAL_MS: 'soon' }))
        .toThrow('NETDEPLOY_TELEMETRY_INTERVAL_MS must be a positive number');
    });

    test('should require a loaded configuration', () => {
      expect(() => new SimulationConfiguration('development').applyProcessEnvironment({}))
        .toThrow('No configuration loaded');
    });
  });

  describe('mergeConfigurations', () => {
    test('should keep the base name when the override leaves it empty', () => {
      const merged = SimulationConfiguration.mergeConfigurations(
        { simulation: { name: 'base' }, lifecycle: { interval_ms: 1000, backoff_ms: 2000 } },
        { simulation: { name: '', environment: 'staging' }, lifecycle: { interval_ms: 10 } }
      );

      expect(merged).toEqual({
        simulation: { name: 'base', environment: 'staging' },
        lifecycle: { interval_ms: 10, backoff_ms: 2000 }
      });
    });
  });
});
