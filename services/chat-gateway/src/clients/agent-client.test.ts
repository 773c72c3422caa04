import { createServer, type IncomingMessage, type Server } from 'http';
import type { AddressInfo } from 'net';
import { Readable } from 'stream';
import { afterEach, describe, it, expect } from 'vitest';
import { AgentServiceClient, decodeEventStream } from './agent-client.js';
import type { AgentStreamEvent } from '../services/agent-gateway.js';

async function collect(source: AsyncIterable<AgentStreamEvent>): Promise<AgentStreamEvent[]> {
  const events: AgentStreamEvent[] = [];
  for await (const event of source) {
    events.push(event);
  }
  return events;
}

describe('decodeEventStream', () => {
  it('decodes events split across arbitrary chunk boundaries', async () => {
    const wire = 'data: {"type":"chunk","text":"SELECT"}\n\ndata: {"type":"chunk","text":" 1"}\n\ndata: {"type":"completed"}\n\n';
    const pieces = [wire.slice(0, 7), wire.slice(7, 30), wire.slice(30, 61), wire.slice(61)];

    await expect(collect(decodeEventStream(Readable.from(pieces)))).resolves.toEqual([
      { type: 'chunk', text: 'SELECT' },
      { type: 'chunk', text: ' 1' },
      { type: 'completed' },
    ]);
  });

  it('keeps multi-byte characters split between buffers intact', async () => {
    const bytes = Buffer.from('data: {"type":"chunk","text":"📊"}\n\n', 'utf8');
    const cut = bytes.indexOf(0xf0) + 2;

    await expect(collect(decodeEventStream(Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)])))).resolves.toEqual([
      { type: 'chunk', text: '📊' },
    ]);
  });

  it('skips comments and unknown fields and accepts CRLF', async () => {
    const wire = ': keep-alive\r\nevent: message\r\nid: 7\r\ndata: {"type":"error","message":"quota"}\r\n\r\n';

    await expect(collect(decodeEventStream(Readable.from([wire])))).resolves.toEqual([
      { type: 'error', message: 'quota' },
    ]);
  });

  it('dispatches a trailing event without a blank line', async () => {
    await expect(collect(decodeEventStream(Readable.from(['data: {"type":"completed"}'])))).resolves.toEqual([
      { type: 'completed' },
    ]);
  });

  it('rejects payloads that are not agent events', async () => {
    await expect(collect(decodeEventStream(Readable.from(['data: {"type":"progress"}\n\n'])))).rejects.toThrow(
      'Unexpected event from agent service'
    );
    await expect(collect(decodeEventStream(Readable.from(['data: not json\n\n'])))).rejects.toThrow(
      'Malformed event from agent service'
    );
  });
});

describe('AgentServiceClient', () => {
  let server: Server | undefined;

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (running) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
  });

  async function start(handler: (req: IncomingMessage, body: string) => { status: number; body: string }): Promise<string> {
    const instance = createServer((req, res) => {
      let body = '';
      req.setEncoding('utf8');
      req.on('data', (piece: string) => {
        body += piece;
      });
      req.on('end', () => {
        const reply = handler(req, body);
        res.writeHead(reply.status, { 'Content-Type': 'text/event-stream' });
        res.end(reply.body);
      });
    });
    server = instance;
    await new Promise<void>((resolve) => instance.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = instance.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  it('posts the invocation and streams the decoded events', async () => {
    const received: unknown[] = [];
    const url = await start((req, body) => {
      received.push({ url: req.url, body: JSON.parse(body) });
      return { status: 200, body: 'data: {"type":"chunk","text":"hi"}\n\ndata: {"type":"completed"}\n\n' };
    });
    const client = new AgentServiceClient(url);

    const events = await collect(
      client.invoke(
        {
          agentId: 'query-agent',
          agentAliasId: 'live',
          sessionId: 's1',
          prompt: 'count bugs',
          sessionAttributes: { session_id: 's1' },
        },
        new AbortController().signal
      )
    );

    expect(events).toEqual([{ type: 'chunk', text: 'hi' }, { type: 'completed' }]);
    expect(received).toEqual([
      {
        url: '/invoke',
        body: {
          agentId: 'query-agent',
          agentAliasId: 'live',
          sessionId: 's1',
          inputText: 'count bugs',
          sessionState: { sessionAttributes: { session_id: 's1' } },
        },
      },
    ]);
  });

  it('reports a failed status as an upstream error', async () => {
    const url = await start(() => ({ status: 503, body: '' }));
    const client = new AgentServiceClient(url);

    await expect(
      collect(
        client.invoke(
          { agentId: 'a', agentAliasId: 'b', sessionId: 's1', prompt: 'p', sessionAttributes: {} },
          new AbortController().signal
        )
      )
    ).rejects.toThrow('Agent service responded with status 503');
  });
});
