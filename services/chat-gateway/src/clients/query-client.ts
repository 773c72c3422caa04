/**
 * Query Execution Service client
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { QueryExecutionService, ResultRow } from '../types/index.js';
import { UpstreamError } from '../utils/errors.js';
import { createServiceClient, toUpstreamError } from './http.js';

const SERVICE = 'Query service';

const envelopeSchema = z.object({
  statusCode: z.number().int(),
  body: z.string(),
});

const rowsSchema = z.array(z.record(z.unknown()));

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Turn the service's `{ statusCode, body }` envelope into rows. Column order
 * follows the order of keys in each returned object.
 */
export function parseQueryEnvelope(payload: unknown): ResultRow[] {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new UpstreamError(SERVICE, 'Malformed response from query service');
  }

  const { statusCode, body } = envelope.data;
  if (statusCode !== 200) {
    throw new UpstreamError(SERVICE, `Query execution failed: ${body}`, statusCode);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    throw new UpstreamError(SERVICE, 'Query service returned an unreadable result body');
  }

  const rows = rowsSchema.safeParse(decoded);
  if (!rows.success) {
    throw new UpstreamError(SERVICE, 'Query service returned rows in an unexpected shape');
  }

  return rows.data.map((row) => {
    const cells: Record<string, string> = {};
    for (const [column, value] of Object.entries(row)) {
      cells[column] = cellText(value);
    }
    return cells;
  });
}

export class QueryServiceClient implements QueryExecutionService {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(serviceUrl: string, timeoutMs: number) {
    this.timeoutMs = timeoutMs;
    this.client = createServiceClient(SERVICE, { baseURL: serviceUrl, timeout: timeoutMs });
  }

  async execute(query: string): Promise<ResultRow[]> {
    console.log(`🗄️ Executing query: ${query}`);

    let payload: unknown;
    try {
      const response = await this.client.post<unknown>('/invoke', { action: 'query', sqlQuery: query });
      payload = response.data;
    } catch (error) {
      throw toUpstreamError(SERVICE, error, this.timeoutMs);
    }

    const rows = parseQueryEnvelope(payload);
    console.log(`📊 Query returned ${rows.length} row(s)`);
    return rows;
  }
}
