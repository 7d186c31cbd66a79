import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

/**
 * axios-based HTTP transport.
 * Wraps an axios instance and converts its responses to RawHttpResponse.
 * Every status resolves, so the caller sees 4xx/5xx as responses rather than
 * as thrown errors.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    // Normalize headers to plain object; axios keeps set-cookie as an array
    const headers: HttpHeaders = {};
    let cookies: string[] = [];
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) {
        continue;
      }
      if (key.toLowerCase() === 'set-cookie') {
        cookies = Array.isArray(value) ? value.map(String) : [String(value)];
        continue;
      }
      headers[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
    }

    return {
      status: response.status,
      headers,
      cookies,
      body: toArrayBuffer(response.data),
    };
  };
};

// Node's axios adapter hands back a Buffer for 'arraybuffer' responses
function toArrayBuffer(data: unknown): ArrayBuffer {
  if (data instanceof ArrayBuffer) {
    return data;
  }
  const view = ArrayBuffer.isView(data)
    ? new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
    : new TextEncoder().encode(typeof data === 'string' ? data : '');
  const copy = new Uint8Array(view.byteLength);
  copy.set(view);
  return copy.buffer;
}
