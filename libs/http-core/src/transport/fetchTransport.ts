import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and converts the Response to a RawHttpResponse.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest): Promise<RawHttpResponse> => {
  const response = await fetch(req.url, { method: 'GET' });
  const body = new Uint8Array(await response.arrayBuffer());

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
    url: response.url || req.url,
  };
};
