/**
 * Minimal HTTP surface shared by the token provider and the ARM client.
 * The global fetch satisfies it; tests pass an in-process stand-in.
 */

import { CloudError, toError } from '../../errors';

export interface HttpRequest {
  method: 'GET' | 'PUT' | 'DELETE' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpFetch = (url: string, request: HttpRequest) => Promise<HttpResponse>;

export const defaultFetch: HttpFetch = (url, request) => fetch(url, request);

/**
 * Read a response body as JSON; empty bodies read as undefined.
 * Error responses that are not JSON read as `{ message }`; success responses must parse.
 */
export async function readJson(response: HttpResponse): Promise<unknown> {
  const text = await response.text();
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    if (response.status >= 400) {
      return { message: text };
    }
    throw new CloudError(
      `Response with HTTP ${response.status} is not valid JSON: ${toError(error).message}`,
      response.status,
      'INVALID_RESPONSE',
    );
  }
}
