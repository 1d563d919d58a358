/**
 * Graceful Shutdown Service
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Stops accepting new requests and waits for in-flight ones, with a timeout
 * - Forces the exit if shutdown takes too long
 */

import { logger } from './logger.service.js';

export interface ShutdownConfig {
  /** Timeout in milliseconds to wait for in-flight work */
  timeout: number;
  /** Callback that stops the server and waits for in-flight requests */
  onShutdown?: () => Promise<void>;
  /** Exit hook, replaced in tests */
  exit?: (code: number) => void;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private shutdownConfig: ShutdownConfig;
  private forceShutdownTimeout?: NodeJS.Timeout;

  constructor(config: ShutdownConfig) {
    this.shutdownConfig = config;
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    // Kubernetes pod termination, docker stop
    process.on('SIGTERM', () => {
      void this.handleShutdown('SIGTERM');
    });

    // Ctrl+C in terminal
    process.on('SIGINT', () => {
      void this.handleShutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection', { error: reason });
      void this.handleShutdown('UNHANDLED_REJECTION', 1);
    });
  }

  /**
   * Runs the shutdown sequence once, later calls are ignored
   */
  async handleShutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress', { signal });
      return;
    }

    this.isShuttingDown = true;
    const startTime = Date.now();
    logger.warn(`Graceful shutdown initiated (${signal})`, { event: 'shutdown.started', signal });

    // Safety net if the server never finishes closing
    this.forceShutdownTimeout = setTimeout(() => {
      logger.error('Force shutdown timeout expired', { timeout: this.shutdownConfig.timeout });
      this.exit(1);
    }, this.shutdownConfig.timeout);

    try {
      if (this.shutdownConfig.onShutdown) {
        await this.shutdownConfig.onShutdown();
      }

      const duration = Date.now() - startTime;
      logger.info(`Graceful shutdown completed (${duration}ms)`, { event: 'shutdown.completed', duration });
      clearTimeout(this.forceShutdownTimeout);
      this.exit(exitCode);
    } catch (error) {
      logger.error('Error during graceful shutdown', { error });
      clearTimeout(this.forceShutdownTimeout);
      this.exit(1);
    }
  }

  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private exit(code: number): void {
    if (this.shutdownConfig.exit) {
      this.shutdownConfig.exit(code);
      return;
    }
    process.exit(code);
  }
}

/**
 * Creates a graceful shutdown service with default configuration
 */
export function createGracefulShutdown(customConfig?: Partial<ShutdownConfig>): GracefulShutdownService {
  const defaultConfig: ShutdownConfig = {
    timeout: 10000, // 10 seconds default
    ...customConfig,
  };

  return new GracefulShutdownService(defaultConfig);
}
