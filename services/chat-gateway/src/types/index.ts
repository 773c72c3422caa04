// Conversation Types
export type Sender = 'user' | 'bot';

export interface ChatMessage {
  sender: Sender;
  message: string;
  timestamp: number;
}

export interface ChatSession {
  sessionId: string;
  messages: ChatMessage[];
  createdAt: number;
  lastActivity: number;
}

// Routing Types
export const QueryIntent = {
  Defect: 'defect_query',
  Chart: 'chart_query',
  Text: 'text_query',
} as const;

export type QueryIntent = (typeof QueryIntent)[keyof typeof QueryIntent];

export type ChartKind = 'pie' | 'bar';

export type AgentKind = 'defect' | 'query';

// Result Types
export type ResultRow = Readonly<Record<string, string>>;

export interface ResultBundle {
  bundleId: string;
  originalQuery: string;
  rows: readonly ResultRow[];
  createdAt: number;
}

// API Types
export type ResponseType = 'text' | 'chart' | 'summary' | 'defect_recommendation' | 'error';

export interface ChatResponse {
  response: string;
  type: ResponseType;
  sessionId: string;
  chartUrl?: string;
  downloadUrl?: string;
  timestamp: number;
}

export interface RateLimitInfo {
  allowed: boolean;
  limit: number;
  remaining: number;
  reset: number; // Timestamp when the oldest recorded request leaves the window
  retryAfter?: number; // Seconds until retry is allowed
}

export type ChatOutcomeStatus = 'ok' | 'throttled' | 'invalid' | 'failed';

export interface ChatOutcome {
  status: ChatOutcomeStatus;
  body: ChatResponse;
  rateLimit?: RateLimitInfo;
}

export interface SweepReport {
  sessionsRemoved: number;
  rateWindowsRemoved: number;
  bundlesRemoved: number;
  activeSessions: number;
  storedSummaries: number;
}

// Collaborator Types
export interface QueryExecutionService {
  execute(query: string): Promise<ResultRow[]>;
}

export interface ChartRenderRequest {
  kind: ChartKind;
  title: string;
  rows: readonly ResultRow[];
}

export interface ChartRenderer {
  render(request: ChartRenderRequest): Promise<Buffer>;
}
