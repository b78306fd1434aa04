import type { EventEmitter } from 'events';
import { toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';

/**
 * Inspector lifecycle manager
 * Runs startup hooks, and shutdown hooks in reverse order on quit or signal
 */

export interface LifecycleHook {
  name: string;
  handler: () => Promise<void>;
}

export interface LifecycleOptions {
  shutdownTimeout?: number;
  /** Defaults to process.exit */
  exit?: (code: number) => void;
  /** Where signals and fatal process events are listened for; defaults to process */
  signals?: EventEmitter;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP'];

export class LifecycleManager {
  private logger: Logger;
  private startupHooks: LifecycleHook[] = [];
  private shutdownHooks: LifecycleHook[] = [];
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private exit: (code: number) => void;

  constructor(logger: Logger, options: LifecycleOptions = {}) {
    this.logger = logger.child({ component: 'lifecycle' });
    this.shutdownTimeout = options.shutdownTimeout ?? 5000;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
    this.setupSignalHandlers(options.signals ?? process);
  }

  onStartup(name: string, handler: () => Promise<void>): void {
    this.startupHooks.push({ name, handler });
  }

  onShutdown(name: string, handler: () => Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Execute all startup hooks in order; the first failure stops startup
   */
  async startup(): Promise<void> {
    for (const hook of this.startupHooks) {
      try {
        this.logger.debug(`Executing startup hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        this.logger.error(`Startup hook failed: ${hook.name}`, toError(error));
        throw error;
      }
    }

    this.logger.info('Inspector started');
  }

  /**
   * Run shutdown hooks and exit. `exitCode` is 1 after a fatal error.
   */
  async shutdown(reason?: string, exitCode: number = 0): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.debug('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Shutting down${reason ? ` (${reason})` : ''}`);

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeout}ms`));
      }, this.shutdownTimeout);
    });

    try {
      await Promise.race([this.executeShutdownHooks(), timeoutPromise]);
      this.exit(exitCode);
    } catch (error) {
      this.logger.error('Error during shutdown', toError(error));
      this.exit(1);
    } finally {
      clearTimeout(timer);
    }
  }

  private async executeShutdownHooks(): Promise<void> {
    const hooks = [...this.shutdownHooks].reverse();

    for (const hook of hooks) {
      try {
        this.logger.debug(`Executing shutdown hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        // The remaining hooks still run
        this.logger.error(`Shutdown hook failed: ${hook.name}`, toError(error));
      }
    }
  }

  private setupSignalHandlers(target: EventEmitter): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      target.on(signal, () => {
        void this.shutdown(signal);
      });
    }

    target.on('uncaughtException', (error: unknown) => {
      this.logger.error('Uncaught exception', toError(error));
      void this.shutdown('uncaughtException', 1);
    });

    target.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', toError(reason));
      void this.shutdown('unhandledRejection', 1);
    });
  }
}
