import type { AxiosInstance } from 'axios';
import type { ChartRenderRequest, ChartRenderer } from '../types/index.js';
import { createServiceClient, toUpstreamError } from './http.js';

const SERVICE = 'Chart renderer';
const RENDER_TIMEOUT_MS = 30_000;

export class ChartRendererClient implements ChartRenderer {
  private client: AxiosInstance;

  constructor(rendererUrl: string) {
    this.client = createServiceClient(SERVICE, {
      baseURL: rendererUrl,
      timeout: RENDER_TIMEOUT_MS,
      headers: { Accept: 'image/png' },
    });
  }

  async render(request: ChartRenderRequest): Promise<Buffer> {
    try {
      const response = await this.client.post<ArrayBuffer>('/render', request, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      throw toUpstreamError(SERVICE, error, RENDER_TIMEOUT_MS);
    }
  }
}
