/**
 * Canned HTTP responses for the ARM client and token provider
 */

import type { HttpResponse } from '../../../src/infrastructure/azure';

export function jsonResponse(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {},
): HttpResponse {
  const lowered = new Map(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    status,
    headers: { get: (name: string) => lowered.get(name.toLowerCase()) ?? null },
    text: async () => {
      if (body === undefined) return '';
      return typeof body === 'string' ? body : JSON.stringify(body);
    },
  };
}
