import { loadConfig, type GatewayConfig } from '../config/environment.js';
import type { AgentInvocationRequest, AgentStreamEvent, AgentTransport } from '../services/agent-gateway.js';
import type { ChartRenderRequest, ChartRenderer, QueryExecutionService, ResultRow } from '../types/index.js';

export type AgentResponder = (request: AgentInvocationRequest) => AgentStreamEvent[] | Promise<AgentStreamEvent[]>;

export const GENERATED_QUERY = 'SELECT key, status FROM issues WHERE status = \'Open\'';

/**
 * Defect agent answers with a recommendation, query agent with a fenced query
 */
export const defaultResponder: AgentResponder = (request) =>
  request.agentId === 'defect-agent'
    ? [
        { type: 'chunk', text: 'Matching Defect: BUG-12\n\n' },
        { type: 'chunk', text: 'Root Cause: null session\n\nResolution: guard the lookup' },
        { type: 'completed' },
      ]
    : [{ type: 'chunk', text: `\`\`\`sql\n${GENERATED_QUERY};\n\`\`\`` }, { type: 'completed' }];

export class FakeAgentTransport implements AgentTransport {
  requests: AgentInvocationRequest[] = [];
  responder: AgentResponder;

  constructor(responder: AgentResponder = defaultResponder) {
    this.responder = responder;
  }

  async *invoke(request: AgentInvocationRequest, signal: AbortSignal): AsyncGenerator<AgentStreamEvent> {
    this.requests.push(request);
    const events = await this.responder(request);
    for (const event of events) {
      if (signal.aborted) {
        return;
      }
      yield event;
    }
  }
}

export class FakeQueryService implements QueryExecutionService {
  queries: string[] = [];
  rows: ResultRow[] = [];
  failure: Error | null = null;

  async execute(query: string): Promise<ResultRow[]> {
    this.queries.push(query);
    if (this.failure) {
      throw this.failure;
    }
    return this.rows;
  }
}

export class FakeChartRenderer implements ChartRenderer {
  requests: ChartRenderRequest[] = [];
  failure: Error | null = null;

  async render(request: ChartRenderRequest): Promise<Buffer> {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    return Buffer.from('fake-png');
  }
}

export function issueRows(count: number): ResultRow[] {
  return Array.from({ length: count }, (_, i) => ({ key: `BUG-${i + 1}`, status: i % 2 === 0 ? 'Open' : 'Done' }));
}

export function testConfig(chartDir: string, env: Record<string, string> = {}): GatewayConfig {
  return loadConfig({
    NODE_ENV: 'test',
    CHART_OUTPUT_DIR: chartDir,
    ...env,
  });
}
