import type { ErrorHandler } from './error-handler.js';

export interface GatewayLoad {
  activeSessions: number;
  storedSummaries: number;
  inFlightRequests: number;
}

export interface HealthMetrics {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  activeSessions: number;
  storedSummaries: number;
  inFlightRequests: number;
  memory: {
    used: number; // MB
    total: number; // MB
    percentage: number; // heap used against maxHeapMB
  };
  errors: number;
  warnings: string[];
}

export interface HealthMonitorOptions {
  maxHeapMB: number;
  memoryThreshold: number; // fraction of maxHeapMB
  memoryUsage: () => NodeJS.MemoryUsage;
}

export class HealthMonitor {
  private loadSource: () => GatewayLoad;
  private errorHandler: ErrorHandler;
  private startTime: number;
  private options: HealthMonitorOptions;

  constructor(loadSource: () => GatewayLoad, errorHandler: ErrorHandler, options: Partial<HealthMonitorOptions> = {}) {
    this.loadSource = loadSource;
    this.errorHandler = errorHandler;
    this.startTime = Date.now();
    this.options = {
      maxHeapMB: 1024,
      memoryThreshold: 0.85,
      memoryUsage: () => process.memoryUsage(),
      ...options,
    };
  }

  /**
   * Liveness snapshot with the gateway's current load
   */
  getHealthMetrics(now: number = Date.now()): HealthMetrics {
    const load = this.loadSource();
    const memory = this.getMemoryUsageMB();
    const warnings: string[] = [];

    if (memory.percentage > this.options.memoryThreshold) {
      warnings.push(`High memory usage: ${(memory.percentage * 100).toFixed(1)}%`);
    }

    return {
      status: warnings.length === 0 ? 'healthy' : 'degraded',
      timestamp: new Date(now).toISOString(),
      uptime: now - this.startTime,
      activeSessions: load.activeSessions,
      storedSummaries: load.storedSummaries,
      inFlightRequests: load.inFlightRequests,
      memory,
      errors: this.errorHandler.getErrorStats().total,
      warnings,
    };
  }

  getMemoryUsageMB(): { used: number; total: number; percentage: number } {
    const memoryUsage = this.options.memoryUsage();
    return {
      used: Math.round(memoryUsage.heapUsed / 1024 / 1024),
      total: Math.round(memoryUsage.heapTotal / 1024 / 1024),
      percentage: memoryUsage.heapUsed / (this.options.maxHeapMB * 1024 * 1024),
    };
  }
}
