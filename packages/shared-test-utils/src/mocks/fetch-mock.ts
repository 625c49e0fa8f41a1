import { vi } from 'vitest';

/**
 * In-process stand-in for `fetch`
 *
 * Responds from a URL -> route table; unknown URLs get a 404. Nothing leaves
 * the process.
 */

export type MockRoute =
  | { body: Uint8Array; status?: number }
  | { status: number; body?: undefined }
  | { error: Error }
  | { stallAfter: Uint8Array };

export function createMockFetch(routes: Record<string, MockRoute>) {
  return vi.fn(async (url: string, _init: { signal: AbortSignal; redirect: 'follow' }) => {
    const route = routes[url];
    if (route === undefined) {
      return new Response(null, { status: 404, statusText: 'Not Found' });
    }

    if ('error' in route) {
      throw route.error;
    }

    if ('stallAfter' in route) {
      // Sends one chunk, then never closes
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(route.stallAfter);
        },
      });
      return new Response(stream, { status: 200 });
    }

    if (route.body === undefined) {
      return new Response(null, { status: route.status });
    }

    return new Response(route.body, {
      status: route.status ?? 200,
      headers: { 'content-length': String(route.body.byteLength) },
    });
  });
}
