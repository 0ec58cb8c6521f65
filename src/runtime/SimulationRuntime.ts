import { EventEmitter } from 'events';
import { Clock, IEntityStore } from '../types';
import { FrameworkLogger, createLogger } from '../common/logger';
import { toError } from '../common/errors';
import { createEntityStore } from '../persistence/PersistenceFactory';
import { DeploymentService } from '../services/DeploymentService';
import { NodeService } from '../services/NodeService';
import { TelemetryService } from '../services/TelemetryService';
import { EventService } from '../services/EventService';
import { LifecycleScheduler } from '../lifecycle/LifecycleScheduler';
import { TelemetryGenerator } from '../telemetry/TelemetryGenerator';
import {
  BottleneckDetector,
  BottleneckReport,
  DEFAULT_ANALYSIS_WINDOW_MINUTES,
  DEFAULT_DEVIATION_THRESHOLD,
  DetectionOptions
} from '../analytics/BottleneckDetector';
import { SimulationConfiguration, SimulationRuntimeConfig } from '../config/SimulationConfiguration';

export interface SimulationRuntimeOptions {
  /** Use this store instead of creating one from `config.store` */
  store?: IEntityStore;
  logger?: FrameworkLogger;
  now?: Clock;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: number;
  store: 'healthy' | 'unhealthy';
  activeDeployments: number;
  lifecycleAlive: boolean;
  telemetryAlive: boolean;
  activeWorkers: boolean;
}

/**
 * Composition root for the simulation: owns the store, the services, both
 * periodic tasks and the bottleneck detector.
 *
 * Responsibilities:
 * - Open the store and start both tasks before callers are served
 * - Stop both tasks, drain in-flight cycles, then release the store
 * - Report task liveness for health checks
 */
export class SimulationRuntime extends EventEmitter {
  readonly store: IEntityStore;
  readonly deployments: DeploymentService;
  readonly nodes: NodeService;
  readonly telemetry: TelemetryService;
  readonly auditEvents: EventService;
  readonly lifecycleScheduler: LifecycleScheduler;
  readonly telemetryGenerator: TelemetryGenerator;
  readonly detector: BottleneckDetector;

  private config: SimulationRuntimeConfig;
  private readonly logger: FrameworkLogger;
  private readonly now: Clock;
  private isStarted = false;

  constructor(config: Partial<SimulationRuntimeConfig> = {}, options: SimulationRuntimeOptions = {}) {
    super();

    this.config = {
      store: { type: 'memory' },
      lifecycle: {},
      telemetry: {},
      analytics: {
        analysisWindowMinutes: DEFAULT_ANALYSIS_WINDOW_MINUTES,
        deviationThreshold: DEFAULT_DEVIATION_THRESHOLD
      },
      logging: {},
      ...config
    };
    this.logger = options.logger ?? createLogger(this.config.logging);
    this.now = options.now ?? Date.now;

    this.store = options.store ?? createEntityStore(this.config.store, this.logger);
    this.deployments = new DeploymentService(this.store, this.now);
    this.nodes = new NodeService(this.store, this.now);
    this.telemetry = new TelemetryService(this.store, this.now);
    this.auditEvents = new EventService(this.store);
    this.lifecycleScheduler = new LifecycleScheduler(this.store, this.config.lifecycle, this.logger, this.now);
    this.telemetryGenerator = new TelemetryGenerator(this.store, this.config.telemetry, this.logger, this.now);
    this.detector = new BottleneckDetector(this.store, this.logger, this.now);
  }

  /**
   * Build a runtime from a YAML configuration file
   */
  static async fromConfigFile(
    filePath: string,
    environment?: string,
    options: SimulationRuntimeOptions = {}
  ): Promise<SimulationRuntime> {
    const configuration = new SimulationConfiguration(environment);
    await configuration.loadFromFile(filePath);
    configuration.applyProcessEnvironment();
    return new SimulationRuntime(configuration.toRuntimeConfig(), options);
  }

  async start(): Promise<void> {
    if (this.isStarted) {
      return; // Already started
    }

    try {
      await this.store.open();
      this.lifecycleScheduler.start();
      this.telemetryGenerator.start();

      this.isStarted = true;
      this.emit('started', { timestamp: this.now() });
    } catch (error) {
      const err = toError(error);
      this.logger.error(`[SimulationRuntime] Start failed: ${err.message}`);
      await this.stopTasks();
      throw err;
    }
  }

  async stop(): Promise<void> {
    if (!this.isStarted) {
      return; // Already stopped
    }

    await this.stopTasks();
    await this.store.close();

    this.isStarted = false;
    this.emit('stopped', { timestamp: this.now() });
  }

  isRunning(): boolean {
    return this.isStarted;
  }

  isLifecycleAlive(): boolean {
    return this.lifecycleScheduler.isAlive();
  }

  isTelemetryAlive(): boolean {
    return this.telemetryGenerator.isAlive();
  }

  /**
   * Run the detector with the configured window and threshold unless overridden
   */
  async detectBottlenecks(deploymentId: number, options: DetectionOptions = {}): Promise<BottleneckReport> {
    return this.detector.detectBottlenecks(deploymentId, {
      analysisWindowMinutes: options.analysisWindowMinutes ?? this.config.analytics.analysisWindowMinutes,
      deviationThreshold: options.deviationThreshold ?? this.config.analytics.deviationThreshold
    });
  }

  async getHealth(): Promise<HealthReport> {
    let store: HealthReport['store'] = 'healthy';
    let activeDeployments = 0;
    try {
      activeDeployments = await this.store.countDeployments();
    } catch (error) {
      store = 'unhealthy';
      this.logger.warn(`[SimulationRuntime] Store health probe failed: ${toError(error).message}`);
    }

    const lifecycleAlive = this.isLifecycleAlive();
    const telemetryAlive = this.isTelemetryAlive();
    const activeWorkers = lifecycleAlive && telemetryAlive;

    return {
      status: store === 'healthy' && activeWorkers ? 'healthy' : 'degraded',
      timestamp: this.now(),
      store,
      activeDeployments,
      lifecycleAlive,
      telemetryAlive,
      activeWorkers
    };
  }

  getConfig(): SimulationRuntimeConfig {
    return { ...this.config };
  }

  private async stopTasks(): Promise<void> {
    await Promise.all([this.lifecycleScheduler.stop(), this.telemetryGenerator.stop()]);
  }
}
