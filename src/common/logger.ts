/**
 * Logging utility for the service registry
 * Provides configurable logging for the registry components
 */

export interface LoggingConfig {
  enableRegistryLogs?: boolean;
  enableStoreLogs?: boolean;
  enableSweeperLogs?: boolean;
  enableHubLogs?: boolean;
  enableHttpLogs?: boolean;
  enableTestMode?: boolean;
}

export class RegistryLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log request orchestration messages
   */
  registry(message: string, ...args: unknown[]): void {
    if (this.config.enableRegistryLogs && !this.config.enableTestMode) {
      console.log(`[REGISTRY] ${message}`, ...args);
    }
  }

  /**
   * Log instance store messages
   */
  store(message: string, ...args: unknown[]): void {
    if (this.config.enableStoreLogs && !this.config.enableTestMode) {
      console.log(`[STORE] ${message}`, ...args);
    }
  }

  sweeper(message: string, ...args: unknown[]): void {
    if (this.config.enableSweeperLogs && !this.config.enableTestMode) {
      console.log(`[SWEEPER] ${message}`, ...args);
    }
  }

  hub(message: string, ...args: unknown[]): void {
    if (this.config.enableHubLogs && !this.config.enableTestMode) {
      console.log(`[HUB] ${message}`, ...args);
    }
  }

  http(message: string, ...args: unknown[]): void {
    if (this.config.enableHttpLogs && !this.config.enableTestMode) {
      console.log(`[HTTP] ${message}`, ...args);
    }
  }

  /**
   * Log lifecycle messages (always shown unless in test mode)
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.log(`[INFO] ${message}`, ...args);
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
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): RegistryLogger {
  return new RegistryLogger(config);
}
