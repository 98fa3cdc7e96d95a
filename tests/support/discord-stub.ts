import { vi } from 'vitest';

type Route = 'messages' | 'channel' | 'me';

type RouteHandler = () => Response | Promise<Response>;

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
  statusText = status < 300 ? 'OK' : 'Error'
): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function routeOf(url: string): Route {
  if (/\/users\/(@|%40)me/.test(url)) return 'me';
  if (/\/channels\/[^/?]+\/messages/.test(url)) return 'messages';
  return 'channel';
}

/**
 * Discord REST の makeRequest を差し替えるスタブ
 * 未定義のルートは 404 を返す
 */
export function createDiscordStub(handlers: Partial<Record<Route, RouteHandler>>) {
  return vi.fn(async (url: string, _init: unknown): Promise<Response> => {
    const handler = handlers[routeOf(url)];
    if (!handler) {
      return jsonResponse(404, { message: 'Unknown route', code: 0 }, {}, 'Not Found');
    }
    return handler();
  });
}
