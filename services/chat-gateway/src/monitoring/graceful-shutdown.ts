import type { HealthMonitor } from './health-monitor.js';

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean; // exit with 1 when the timeout is reached
  handleSignals: boolean;
  cleanupTasks: Array<() => Promise<void>>;
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private healthMonitor: HealthMonitor | null;
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private options: ShutdownOptions;
  private signalsInstalled: boolean = false;

  constructor(healthMonitor: HealthMonitor | null, options: Partial<ShutdownOptions> = {}) {
    this.healthMonitor = healthMonitor;
    this.options = {
      timeout: 30000, // 30 seconds default
      forceExit: true,
      handleSignals: true,
      cleanupTasks: [],
      exit: (code: number) => process.exit(code),
      ...options,
    };

    if (this.options.handleSignals) {
      this.setupSignalHandlers();
    }
  }

  private onSigterm = (): void => {
    console.log('Received SIGTERM signal');
    void this.shutdown('SIGTERM');
  };

  private onSigint = (): void => {
    console.log('Received SIGINT signal');
    void this.shutdown('SIGINT');
  };

  private onUncaughtException = (error: Error): void => {
    console.error('Uncaught Exception:', error);
    void this.shutdown('uncaughtException', error);
  };

  private onUnhandledRejection = (reason: unknown): void => {
    console.error('Unhandled Rejection:', reason);
    void this.shutdown('unhandledRejection', reason);
  };

  /**
   * Setup signal handlers for graceful shutdown
   */
  private setupSignalHandlers(): void {
    process.on('SIGTERM', this.onSigterm);
    process.on('SIGINT', this.onSigint);
    process.on('uncaughtException', this.onUncaughtException);
    process.on('unhandledRejection', this.onUnhandledRejection);
    this.signalsInstalled = true;
  }

  /**
   * Remove the process listeners installed by this instance
   */
  dispose(): void {
    if (!this.signalsInstalled) {
      return;
    }
    process.off('SIGTERM', this.onSigterm);
    process.off('SIGINT', this.onSigint);
    process.off('uncaughtException', this.onUncaughtException);
    process.off('unhandledRejection', this.onUnhandledRejection);
    this.signalsInstalled = false;
  }

  /**
   * Add a cleanup task to be executed during shutdown
   */
  addCleanupTask(task: () => Promise<void>): void {
    this.options.cleanupTasks.push(task);
  }

  /**
   * Run every cleanup task once, in registration order, then exit.
   * Later calls while a shutdown is running are ignored.
   */
  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return;
    }

    this.isShuttingDown = true;
    console.log(`🛑 Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);

    console.log('Executing cleanup tasks...');
    const failures = await this.executeCleanupTasks();

    if (this.healthMonitor) {
      const finalHealth = this.healthMonitor.getHealthMetrics();
      console.log('Final health status:', finalHealth.status, `(${finalHealth.activeSessions} sessions)`);
    }

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    console.log(failures === 0 ? '✅ Graceful shutdown completed successfully' : `⚠️ Shutdown completed with ${failures} failed task(s)`);
    this.options.exit(error !== undefined || failures > 0 ? 1 : 0);
  }

  /**
   * Returns the number of tasks that failed
   */
  private async executeCleanupTasks(): Promise<number> {
    const tasks = this.options.cleanupTasks;
    let failures = 0;

    for (let i = 0; i < tasks.length; i++) {
      const task = tasks[i];
      if (!task) {
        continue;
      }
      try {
        console.log(`Executing cleanup task ${i + 1}/${tasks.length}`);
        await task();
        console.log(`Cleanup task ${i + 1} completed successfully`);
      } catch (error) {
        failures++;
        console.error(`Cleanup task ${i + 1} failed:`, error);
      }
    }

    return failures;
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }
}
