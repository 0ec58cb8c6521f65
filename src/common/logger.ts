/**
 * Logging utility for the netdeploy simulation core
 * Provides configurable logging for the periodic tasks and analytics
 */

export interface LoggingConfig {
  enableLifecycleLogs?: boolean;
  enableTelemetryLogs?: boolean;
  enableAnalyticsLogs?: boolean;
  enableTestMode?: boolean;
}

export class FrameworkLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log lifecycle scheduler messages
   */
  lifecycle(message: string, ...args: unknown[]): void {
    if (this.config.enableLifecycleLogs && !this.config.enableTestMode) {
      console.log(`[LIFECYCLE] ${message}`, ...args);
    }
  }

  /**
   * Log telemetry generator messages
   */
  telemetry(message: string, ...args: unknown[]): void {
    if (this.config.enableTelemetryLogs && !this.config.enableTestMode) {
      console.log(`[TELEMETRY] ${message}`, ...args);
    }
  }

  /**
   * Log bottleneck analysis messages
   */
  analytics(message: string, ...args: unknown[]): void {
    if (this.config.enableAnalyticsLogs && !this.config.enableTestMode) {
      console.log(`[ANALYTICS] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}
