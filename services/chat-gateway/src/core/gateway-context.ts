import type { GatewayConfig } from '../config/environment.js';
import { AgentServiceClient } from '../clients/agent-client.js';
import { ChartRendererClient } from '../clients/chart-renderer-client.js';
import { QueryServiceClient } from '../clients/query-client.js';
import { RateLimitPresets, type RateLimiter } from '../middleware/rate-limiter.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import { HealthMonitor, type GatewayLoad } from '../monitoring/health-monitor.js';
import { AgentGateway, type AgentTransport } from '../services/agent-gateway.js';
import { ChartService } from '../services/chart-service.js';
import { ChatOrchestrator, type InboundChatMessage } from '../services/chat-orchestrator.js';
import { ResultBundleStore, ResultPresenter } from '../services/result-presenter.js';
import { SessionStore } from '../services/session-store.js';
import type { ChartRenderer, ChatOutcome, QueryExecutionService, SweepReport } from '../types/index.js';
import { ThrottleError } from '../utils/errors.js';

const ERROR_RETENTION_MS = 24 * 60 * 60 * 1000;

export interface GatewayCollaborators {
  agentTransport: AgentTransport;
  queryService: QueryExecutionService;
  chartRenderer: ChartRenderer;
}

export interface GatewayContextOptions {
  clock?: () => number;
}

/**
 * Owns all shared state of one gateway process: the session, rate-window
 * and result-bundle tables, the collaborators and the background sweep.
 * Request handlers receive it by reference.
 */
export class GatewayContext {
  readonly config: GatewayConfig;
  readonly sessions: SessionStore;
  readonly rateLimiter: RateLimiter;
  readonly clientLimiter: RateLimiter | null;
  readonly bundles: ResultBundleStore;
  readonly errorHandler: ErrorHandler;
  readonly healthMonitor: HealthMonitor;
  readonly charts: ChartService;
  readonly presenter: ResultPresenter;
  readonly orchestrator: ChatOrchestrator;

  private clock: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;
  private inFlight: Set<Promise<ChatOutcome>> = new Set();

  constructor(config: GatewayConfig, collaborators: GatewayCollaborators, options: GatewayContextOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? Date.now;

    this.sessions = new SessionStore();
    this.rateLimiter = RateLimitPresets.chatSession(config.rateLimit.windowMs, config.rateLimit.maxRequests);
    this.clientLimiter = null;
    if (config.rateLimit.clientMaxRequests > 0) {
      this.clientLimiter = RateLimitPresets.perClient(
        config.rateLimit.clientMaxRequests,
        config.rateLimit.windowMs,
        (req, res, next, info) => next(new ThrottleError(info.retryAfter ?? 1))
      );
    }
    this.bundles = new ResultBundleStore();
    this.errorHandler = new ErrorHandler({ exposeStack: config.nodeEnv === 'development' });
    this.healthMonitor = new HealthMonitor(() => this.load(), this.errorHandler);
    this.charts = new ChartService(collaborators.chartRenderer, config.charts.outputDir);
    this.presenter = new ResultPresenter(this.bundles, {
      threshold: config.summaries.threshold,
      previewRows: config.summaries.previewRows,
      urlPrefix: config.urlPrefix,
    });

    this.orchestrator = new ChatOrchestrator({
      sessions: this.sessions,
      rateLimiter: this.rateLimiter,
      gateway: new AgentGateway(collaborators.agentTransport, {
        targets: config.agents.targets,
        deadlineMs: config.agents.deadlineMs,
      }),
      queryService: collaborators.queryService,
      charts: this.charts,
      presenter: this.presenter,
      errorHandler: this.errorHandler,
      urlPrefix: config.urlPrefix,
      clock: this.clock,
    });
  }

  /**
   * Start the periodic sweep
   */
  start(): void {
    if (this.sweepTimer) {
      console.log('Sweep already scheduled');
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.config.sessions.sweepIntervalMs);
    this.sweepTimer.unref();

    console.log(`🧹 Session sweep scheduled every ${Math.round(this.config.sessions.sweepIntervalMs / 1000)}s`);
  }

  /**
   * Cancel the sweep and wait, at most `drainTimeoutMs`, for chat requests
   * still in flight.
   */
  async stop(drainTimeoutMs: number = this.config.shutdown.timeoutMs): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    if (this.inFlight.size === 0) {
      return;
    }

    console.log(`⏳ Waiting for ${this.inFlight.size} chat request(s) to finish...`);
    let timer: NodeJS.Timeout | undefined;
    const drained = await Promise.race([
      Promise.allSettled([...this.inFlight]).then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), drainTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (!drained) {
      console.warn(`⚠️ ${this.inFlight.size} chat request(s) still running after ${drainTimeoutMs} ms`);
    }
  }

  get isRunning(): boolean {
    return this.sweepTimer !== null;
  }

  /**
   * Route one chat message through the orchestrator, tracking it until it settles
   */
  async handleChat(inbound: InboundChatMessage): Promise<ChatOutcome> {
    const pending = this.orchestrator.handle(inbound);
    this.inFlight.add(pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(pending);
    }
  }

  /**
   * Remove a session together with its rate window. Returns whether the session existed.
   */
  deleteSession(sessionId: string): boolean {
    this.rateLimiter.remove(sessionId);
    return this.sessions.remove(sessionId);
  }

  /**
   * Reap idle sessions, emptied rate windows and expired bundles
   */
  sweep(now: number = this.clock()): SweepReport {
    const report: SweepReport = {
      sessionsRemoved: this.sessions.sweep(now, this.config.sessions.idleTimeoutMs),
      rateWindowsRemoved: this.rateLimiter.sweep(now) + (this.clientLimiter?.sweep(now) ?? 0),
      bundlesRemoved: this.bundles.sweep(now, this.config.summaries.ttlMs),
      activeSessions: this.sessions.size(),
      storedSummaries: this.bundles.size(),
    };
    this.errorHandler.clearOldErrors(ERROR_RETENTION_MS, now);

    console.log(
      `🧹 Session cleanup completed. Active sessions: ${report.activeSessions}, Stored summaries: ${report.storedSummaries}`
    );
    return report;
  }

  load(): GatewayLoad {
    return {
      activeSessions: this.sessions.size(),
      storedSummaries: this.bundles.size(),
      inFlightRequests: this.inFlight.size,
    };
  }
}

/**
 * Build a context wired to the HTTP collaborators named in the config.
 * Any collaborator passed in replaces its HTTP client.
 */
export function createGatewayContext(
  config: GatewayConfig,
  collaborators: Partial<GatewayCollaborators> = {},
  options: GatewayContextOptions = {}
): GatewayContext {
  return new GatewayContext(
    config,
    {
      agentTransport: collaborators.agentTransport ?? new AgentServiceClient(config.agents.serviceUrl),
      queryService:
        collaborators.queryService ?? new QueryServiceClient(config.queryService.url, config.queryService.timeoutMs),
      chartRenderer: collaborators.chartRenderer ?? new ChartRendererClient(config.charts.rendererUrl),
    },
    options
  );
}
