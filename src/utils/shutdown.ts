/**
 * Graceful shutdown handling for the repo-profiler CLI
 *
 * Temporary clones register a cleanup callback here so that an interrupt
 * (Ctrl+C, SIGTERM) still removes them from disk.
 */

import logger from './logger.js';
import { errorMessage } from './errors.js';

export type CleanupCallback = () => void | Promise<void>;

/**
 * Manages graceful shutdown with cleanup callbacks
 */
export class ShutdownManager {
  private callbacks: CleanupCallback[] = [];
  private isShuttingDown = false;
  private handlers: Map<NodeJS.Signals, () => void> = new Map();
  private handlersAttached = false;

  constructor(options?: { skipHandlers?: boolean }) {
    // Skip handlers in test environment or when explicitly disabled
    if (!options?.skipHandlers && process.env.NODE_ENV !== 'test') {
      this.setupHandlers();
    }
  }

  private setupHandlers(): void {
    if (this.handlersAttached) return;
    this.handlersAttached = true;

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const handler = (): void => {
        this.handleShutdown(signal).catch((error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        });
      };
      this.handlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  /**
   * Remove all registered signal handlers (for testing)
   */
  removeHandlers(): void {
    for (const [signal, handler] of this.handlers) {
      process.removeListener(signal, handler);
    }
    this.handlers.clear();
    this.handlersAttached = false;
  }

  private async handleShutdown(signal: NodeJS.Signals): Promise<void> {
    if (this.isShuttingDown) {
      logger.warning('Force quitting...');
      process.exit(1);
    }

    this.isShuttingDown = true;
    logger.blank();
    logger.warning('Interrupted! Cleaning up...');

    await this.runCleanup();

    process.exit(signal === 'SIGINT' ? 130 : 1);
  }

  /**
   * Run every registered callback, newest first, and forget them
   */
  async runCleanup(): Promise<void> {
    const callbacks = this.callbacks.reverse();
    this.callbacks = [];

    for (const callback of callbacks) {
      try {
        await callback();
      } catch (error) {
        logger.error(`Cleanup error: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Register a cleanup callback to run on shutdown
   */
  onCleanup(callback: CleanupCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Remove a cleanup callback
   */
  removeCleanup(callback: CleanupCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index !== -1) {
      this.callbacks.splice(index, 1);
    }
  }

  /**
   * Number of pending cleanup callbacks
   */
  pendingCount(): number {
    return this.callbacks.length;
  }

  /**
   * Check if shutdown is in progress
   */
  isInProgress(): boolean {
    return this.isShuttingDown;
  }
}

// Global shutdown manager instance
let globalManager: ShutdownManager | null = null;

/**
 * Get or create the global shutdown manager
 */
export function getShutdownManager(): ShutdownManager {
  if (!globalManager) {
    globalManager = new ShutdownManager();
  }
  return globalManager;
}

/**
 * Run `fn` with `cleanup` registered for interrupts, then always run `cleanup`
 */
export async function withCleanup<T>(
  cleanup: CleanupCallback,
  fn: () => Promise<T>,
  manager: ShutdownManager = getShutdownManager()
): Promise<T> {
  manager.onCleanup(cleanup);
  try {
    return await fn();
  } finally {
    manager.removeCleanup(cleanup);
    await cleanup();
  }
}
