import { v4 as uuidv4 } from 'uuid';
import type { RateLimiter } from '../middleware/rate-limiter.js';
import type { ErrorHandler } from '../monitoring/error-handler.js';
import {
  QueryIntent,
  type ChatOutcome,
  type ChatResponse,
  type QueryExecutionService,
  type ResponseType,
  type ResultRow,
} from '../types/index.js';
import { KeyedSequencer } from '../utils/keyed-sequencer.js';
import { toGatewayError } from '../utils/errors.js';
import type { AgentGateway } from './agent-gateway.js';
import type { ChartService } from './chart-service.js';
import { classifyIntent } from './intent-router.js';
import { NO_RESULTS_TEXT, type ResultPresenter } from './result-presenter.js';
import type { SessionStore } from './session-store.js';

export const THROTTLED_TEXT = '⚠️ Too many requests. Please wait a moment before sending another message.';
export const EMPTY_MESSAGE_TEXT = '❌ Message cannot be empty.';
export const GENERIC_ERROR_TEXT = '❌ I encountered an error processing your request. Please try again.';
export const CHART_READY_TEXT = "📊 I've generated a chart for your query. Here's your visualization:";

const DEFECT_INSTRUCTIONS =
  '\n\nProvide response with following headers each with different paragraphs: Matching Defect, Root Cause, Resolution';
const QUERY_INSTRUCTIONS = '\n instructions: generate sql query only for above prompt';

export interface InboundChatMessage {
  message: string;
  sessionId?: string; // From the request body
  headerSessionId?: string; // From X-Session-ID, wins over the body
}

export interface ChatOrchestratorDeps {
  sessions: SessionStore;
  rateLimiter: RateLimiter;
  gateway: AgentGateway;
  queryService: QueryExecutionService;
  charts: ChartService;
  presenter: ResultPresenter;
  errorHandler: ErrorHandler;
  urlPrefix: string;
  sequencer?: KeyedSequencer;
  clock?: () => number;
}

type Stage = 'defect_recommendation' | 'query_generation' | 'query_execution' | 'chart_generation';

export function generateSessionId(now: number = Date.now()): string {
  return `session_${now}_${uuidv4().slice(0, 8)}`;
}

export function buildDefectPrompt(text: string): string {
  return text + DEFECT_INSTRUCTIONS;
}

export function buildQueryPrompt(text: string): string {
  return text + QUERY_INSTRUCTIONS;
}

/**
 * Pull the query out of an agent answer: code fences go, then everything from
 * the first `select` up to the first `;` is kept. Answers without a `select`
 * are returned as cleaned.
 */
export function extractSqlQuery(agentResponse: string): string {
  const cleaned = agentResponse.replace(/```sql|```/g, '').trim();
  const selectIndex = cleaned.toLowerCase().indexOf('select');
  if (selectIndex === -1) {
    return cleaned;
  }
  return (cleaned.substring(selectIndex).split(';')[0] ?? '').trim();
}

function presentId(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class ChatOrchestrator {
  private deps: ChatOrchestratorDeps;
  private sequencer: KeyedSequencer;
  private clock: () => number;

  constructor(deps: ChatOrchestratorDeps) {
    this.deps = deps;
    this.sequencer = deps.sequencer ?? new KeyedSequencer();
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Handle one inbound chat message. Never rejects: every failure comes back
   * as an `error` response with the outcome status telling the caller which
   * kind it was.
   */
  async handle(inbound: InboundChatMessage): Promise<ChatOutcome> {
    const now = this.clock();
    const sessionId = presentId(inbound.headerSessionId) ?? presentId(inbound.sessionId) ?? generateSessionId(now);

    try {
      const rateLimit = this.deps.rateLimiter.check(sessionId, now);
      if (!rateLimit.allowed) {
        console.warn(`⚠️ Rate limit reached for session ${sessionId}`);
        return { status: 'throttled', body: this.reply(sessionId, THROTTLED_TEXT, 'error'), rateLimit };
      }

      this.deps.sessions.getOrCreate(sessionId, now);

      const text = inbound.message.trim();
      if (text === '') {
        return { status: 'invalid', body: this.reply(sessionId, EMPTY_MESSAGE_TEXT, 'error'), rateLimit };
      }

      // The user/bot pair of one request is appended before the next request of the session starts
      return await this.sequencer.run(sessionId, async (): Promise<ChatOutcome> => {
        this.deps.sessions.append(sessionId, 'user', text, this.clock());

        let outcome: ChatOutcome;
        try {
          outcome = { status: 'ok', body: await this.dispatch(sessionId, text), rateLimit };
        } catch (error) {
          this.deps.errorHandler.captureError(error, { sessionId, stage: 'dispatch' });
          outcome = { status: 'failed', body: this.reply(sessionId, GENERIC_ERROR_TEXT, 'error'), rateLimit };
        }

        this.deps.sessions.append(sessionId, 'bot', outcome.body.response, this.clock());
        return outcome;
      });
    } catch (error) {
      this.deps.errorHandler.captureError(error, { sessionId, stage: 'orchestration' });
      return { status: 'failed', body: this.reply(sessionId, GENERIC_ERROR_TEXT, 'error') };
    }
  }

  private async dispatch(sessionId: string, text: string): Promise<ChatResponse> {
    const intent = classifyIntent(text);
    console.log(`🧭 Session ${sessionId} routed as ${intent}`);

    switch (intent) {
      case QueryIntent.Defect:
        return this.handleDefectQuery(sessionId, text);
      case QueryIntent.Chart:
      case QueryIntent.Text:
        return this.handleDataQuery(sessionId, text, intent);
    }
  }

  private async handleDefectQuery(sessionId: string, text: string): Promise<ChatResponse> {
    try {
      const outcome = await this.deps.gateway.invoke(buildDefectPrompt(text), sessionId, 'defect');
      return this.reply(sessionId, outcome.text, 'defect_recommendation');
    } catch (error) {
      return this.stageFailure(sessionId, 'defect_recommendation', error, '❌ Error processing defect recommendation: ');
    }
  }

  private async handleDataQuery(sessionId: string, text: string, intent: QueryIntent): Promise<ChatResponse> {
    let generated: string;
    try {
      const outcome = await this.deps.gateway.invoke(buildQueryPrompt(text), sessionId, 'query');
      if (outcome.status === 'empty') {
        return this.reply(sessionId, outcome.text, 'text');
      }
      generated = extractSqlQuery(outcome.text);
    } catch (error) {
      return this.stageFailure(sessionId, 'query_generation', error, '❌ Error generating query: ');
    }

    let rows: ResultRow[];
    try {
      rows = await this.deps.queryService.execute(generated);
    } catch (error) {
      return this.stageFailure(sessionId, 'query_execution', error, '❌ Error executing query: ');
    }

    if (intent === QueryIntent.Chart) {
      return this.handleChart(sessionId, text, rows);
    }

    const presentation = this.deps.presenter.present(rows, text, this.clock());
    if (presentation.kind === 'summary') {
      return this.reply(sessionId, presentation.text, 'summary', { downloadUrl: presentation.downloadUrl });
    }
    return this.reply(sessionId, presentation.text, 'text');
  }

  private async handleChart(sessionId: string, text: string, rows: ResultRow[]): Promise<ChatResponse> {
    if (rows.length === 0) {
      return this.reply(sessionId, NO_RESULTS_TEXT, 'text');
    }

    try {
      const filename = await this.deps.charts.createChart(rows, text, this.clock());
      return this.reply(sessionId, CHART_READY_TEXT, 'chart', { chartUrl: `${this.deps.urlPrefix}/chart/${filename}` });
    } catch (error) {
      return this.stageFailure(sessionId, 'chart_generation', error, '❌ Error generating chart: ');
    }
  }

  private stageFailure(sessionId: string, stage: Stage, error: unknown, prefix: string): ChatResponse {
    const gatewayError = toGatewayError(error);
    const upstreamStatus = gatewayError.details?.['upstreamStatus'];
    this.deps.errorHandler.captureError(gatewayError, {
      sessionId,
      stage,
      upstreamStatus: typeof upstreamStatus === 'number' ? upstreamStatus : undefined,
    });

    // Internal failures may carry file paths or stack details
    const detail = gatewayError.kind === 'internal' ? 'unexpected internal error' : gatewayError.message;
    return this.reply(sessionId, prefix + detail, 'error');
  }

  private reply(
    sessionId: string,
    response: string,
    type: ResponseType,
    links: Pick<ChatResponse, 'chartUrl' | 'downloadUrl'> = {}
  ): ChatResponse {
    return {
      response,
      type,
      sessionId,
      ...links,
      timestamp: this.clock(),
    };
  }
}
