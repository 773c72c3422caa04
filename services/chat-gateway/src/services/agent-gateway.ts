import type { AgentKind } from '../types/index.js';
import type { AgentTarget } from '../config/environment.js';
import { UpstreamError, UpstreamTimeoutError, errorMessage } from '../utils/errors.js';

// Agent Stream Types
export type AgentStreamEvent =
  | { type: 'chunk'; text: string }
  | { type: 'completed' }
  | { type: 'error'; message: string };

export interface AgentInvocationRequest {
  agentId: string;
  agentAliasId: string;
  sessionId: string;
  prompt: string;
  sessionAttributes: Record<string, string>;
}

/**
 * Opens one invocation against the agent service. Aborting `signal` must end
 * the local read of the stream; it is never forwarded to the remote agent.
 */
export interface AgentTransport {
  invoke(request: AgentInvocationRequest, signal: AbortSignal): AsyncIterable<AgentStreamEvent>;
}

export interface InvocationOutcome {
  status: 'completed' | 'empty';
  text: string;
}

export interface AgentGatewayOptions {
  targets: Record<AgentKind, AgentTarget>;
  deadlineMs: number;
}

type InvocationState = 'streaming' | 'completed' | 'failed' | 'timed_out';

/**
 * Lifecycle of a single agent invocation. Only the first transition out of
 * `streaming` counts; anything after it is dropped.
 */
class AgentInvocation {
  private state: InvocationState = 'streaming';
  private buffer = '';
  private failure = '';

  get current(): InvocationState {
    return this.state;
  }

  get failureMessage(): string {
    return this.failure;
  }

  /**
   * Apply one stream event. Returns false once the invocation is terminal.
   */
  accept(event: AgentStreamEvent): boolean {
    if (this.state !== 'streaming') {
      return false;
    }

    switch (event.type) {
      case 'chunk':
        this.buffer += event.text;
        return true;
      case 'completed':
        this.state = 'completed';
        return false;
      case 'error':
        this.fail(event.message);
        return false;
    }
  }

  finish(): void {
    if (this.state === 'streaming') {
      this.state = 'completed';
    }
  }

  fail(message: string): void {
    if (this.state === 'streaming') {
      this.state = 'failed';
      this.failure = message;
      this.buffer = '';
    }
  }

  timeOut(): void {
    if (this.state === 'streaming') {
      this.state = 'timed_out';
      this.buffer = '';
    }
  }

  text(): string {
    return this.buffer.trim();
  }
}

export class AgentGateway {
  private readonly transport: AgentTransport;
  private readonly targets: Record<AgentKind, AgentTarget>;
  private readonly deadlineMs: number;

  constructor(transport: AgentTransport, options: AgentGatewayOptions) {
    this.transport = transport;
    this.targets = options.targets;
    this.deadlineMs = options.deadlineMs;
  }

  /**
   * Send a prompt to the agent behind `kind` and collect its streamed answer.
   *
   * Resolves with the trimmed text, or with the `No response from <KIND> agent`
   * sentinel when the stream carried nothing. Rejects with UpstreamError when
   * the stream reports an error or the transport throws, and with
   * UpstreamTimeoutError once the deadline passes.
   */
  async invoke(
    prompt: string,
    sessionId: string,
    kind: AgentKind,
    deadlineMs: number = this.deadlineMs
  ): Promise<InvocationOutcome> {
    const target = this.targets[kind];
    const label = kind.toUpperCase();
    const invocation = new AgentInvocation();
    const controller = new AbortController();
    const request: AgentInvocationRequest = {
      agentId: target.agentId,
      agentAliasId: target.agentAliasId,
      sessionId,
      prompt,
      sessionAttributes: { session_id: sessionId },
    };

    console.log(`🤖 Invoking ${label} agent ${target.agentId}/${target.agentAliasId} for session ${sessionId}`);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        invocation.timeOut();
        controller.abort();
        resolve();
      }, deadlineMs);
    });

    try {
      await Promise.race([this.consume(request, invocation, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }

    switch (invocation.current) {
      case 'timed_out':
        console.warn(`⏱️ ${label} agent timed out after ${deadlineMs} ms (session ${sessionId})`);
        throw new UpstreamTimeoutError(`${label} agent`, deadlineMs);
      case 'failed':
        console.error(`❌ Error in ${label} agent invocation: ${invocation.failureMessage}`);
        throw new UpstreamError(`${label} agent`, invocation.failureMessage);
      case 'streaming':
      case 'completed':
        break;
    }

    const text = invocation.text();
    if (text === '') {
      console.warn(`⚠️ ${label} agent returned an empty response`);
      return { status: 'empty', text: `No response from ${label} agent` };
    }

    console.log(`✅ ${label} agent answered with ${text.length} characters`);
    return { status: 'completed', text };
  }

  /**
   * Drain the transport into `invocation`. Never rejects; failures become
   * state transitions.
   */
  private async consume(request: AgentInvocationRequest, invocation: AgentInvocation, signal: AbortSignal): Promise<void> {
    try {
      for await (const event of this.transport.invoke(request, signal)) {
        if (!invocation.accept(event)) {
          break;
        }
      }
      invocation.finish();
    } catch (error) {
      invocation.fail(errorMessage(error));
    }
  }
}
