/**
 * Agent Service client
 * Streams agent answers over server-sent events
 */

import type { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { z } from 'zod';
import type { AgentInvocationRequest, AgentStreamEvent, AgentTransport } from '../services/agent-gateway.js';
import { UpstreamError } from '../utils/errors.js';
import { createServiceClient, toUpstreamError } from './http.js';

const SERVICE = 'Agent service';

const agentEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('chunk'), text: z.string() }),
  z.object({ type: z.literal('completed') }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

function parseEvent(data: string): AgentStreamEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch {
    throw new UpstreamError(SERVICE, 'Malformed event from agent service');
  }

  const parsed = agentEventSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamError(SERVICE, 'Unexpected event from agent service');
  }
  return parsed.data;
}

/**
 * Decode a server-sent event stream into agent events.
 *
 * `data:` lines are collected until a blank line dispatches them; comment
 * lines and other fields are skipped. Pieces may split lines, or multi-byte
 * characters, anywhere.
 */
export async function* decodeEventStream(source: AsyncIterable<Buffer | string>): AsyncGenerator<AgentStreamEvent> {
  const decoder = new TextDecoder();
  let pending = '';
  let data: string[] = [];

  function* drain(final: boolean): Generator<AgentStreamEvent> {
    let newline = pending.indexOf('\n');
    while (newline !== -1 || (final && pending !== '')) {
      const end = newline === -1 ? pending.length : newline;
      const line = pending.slice(0, end).replace(/\r$/, '');
      pending = newline === -1 ? '' : pending.slice(newline + 1);

      if (line === '') {
        if (data.length > 0) {
          const event = parseEvent(data.join('\n'));
          data = [];
          yield event;
        }
      } else if (line.startsWith('data:')) {
        data.push(line.slice(5).replace(/^ /, ''));
      }

      newline = pending.indexOf('\n');
    }
  }

  for await (const piece of source) {
    pending += typeof piece === 'string' ? piece : decoder.decode(piece, { stream: true });
    yield* drain(false);
  }

  pending += decoder.decode();
  yield* drain(true);
  if (data.length > 0) {
    yield parseEvent(data.join('\n'));
  }
}

export class AgentServiceClient implements AgentTransport {
  private client: AxiosInstance;

  constructor(serviceUrl: string) {
    this.client = createServiceClient(SERVICE, {
      baseURL: serviceUrl,
      headers: { Accept: 'text/event-stream' },
    });
  }

  async *invoke(request: AgentInvocationRequest, signal: AbortSignal): AsyncGenerator<AgentStreamEvent> {
    let stream: Readable;
    try {
      const response = await this.client.post<Readable>(
        '/invoke',
        {
          agentId: request.agentId,
          agentAliasId: request.agentAliasId,
          sessionId: request.sessionId,
          inputText: request.prompt,
          sessionState: { sessionAttributes: request.sessionAttributes },
        },
        { responseType: 'stream', signal }
      );
      stream = response.data;
    } catch (error) {
      throw toUpstreamError(SERVICE, error);
    }

    yield* decodeEventStream(stream);
  }
}
