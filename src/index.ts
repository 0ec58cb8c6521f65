// Main entry point for the netdeploy simulation core

// Types
export * from './types';

// Common modules
export * from './common/errors';
export * from './common/logger';
export * from './common/utils';
export * from './common/PeriodicTask';

// Configuration
export * from './config/SimulationConfiguration';

// Persistence modules
export * from './persistence/types';
export * from './persistence/wal/types';
export * from './persistence/memory/InMemoryEntityStore';
export * from './persistence/wal/WALFile';
export * from './persistence/wal/JournaledEntityStore';
export * from './persistence/PersistenceFactory';

// Services
export * from './services/DeploymentService';
export * from './services/NodeService';
export * from './services/TelemetryService';
export * from './services/EventService';

// Lifecycle
export * from './lifecycle/NodeStateMachine';
export * from './lifecycle/LifecycleScheduler';

// Telemetry
export * from './telemetry/TelemetrySynthesizer';
export * from './telemetry/TelemetryGenerator';

// Analytics
export * from './analytics/statistics';
export * from './analytics/BottleneckDetector';

// Runtime
export * from './runtime/SimulationRuntime';
