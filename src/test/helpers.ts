import { vi } from 'vitest'
import { createLogger } from '../logger'
import { RedfishClient, type RedfishClientOptions } from '../services/redfishClient'
import type { FetchLike, TransportRequestInit } from '../services/transport'

export const silentLogger = createLogger('silent')

export function jsonResponse(payload: unknown, init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers)
  if (!headers.has('Content-Type')) {
    headers.set('Content-Type', 'application/json')
  }

  return new Response(JSON.stringify(payload), {
    ...init,
    headers,
  })
}

export interface RecordedRequest {
  method: string
  path: string
  url: string
  headers: Record<string, string>
  body?: unknown
}

export type RouteHandler = (request: RecordedRequest) => Response

export function createFakeController(routes: Record<string, RouteHandler>) {
  const requests: RecordedRequest[] = []

  const fetch = vi.fn<FetchLike>(async (url: string, init: TransportRequestInit) => {
    const request: RecordedRequest = {
      method: init.method,
      path: new URL(url).pathname,
      url,
      headers: init.headers,
      body: init.body !== undefined ? (JSON.parse(init.body) as unknown) : undefined,
    }
    requests.push(request)

    const handler = routes[`${request.method} ${request.path}`]
    if (!handler) {
      return jsonResponse({ error: { message: 'not found' } }, { status: 404 })
    }

    return handler(request)
  })

  return { fetch, requests }
}

/** Returns each payload in turn, then keeps repeating the last one. */
export function sequence(...payloads: unknown[]): RouteHandler {
  let index = 0
  return () => {
    const payload = payloads[Math.min(index, payloads.length - 1)]
    index += 1
    return jsonResponse(payload)
  }
}

export function fixed(payload: unknown, init?: ResponseInit): RouteHandler {
  return () => jsonResponse(payload, init)
}

export function createFakeClock() {
  let current = 0

  return {
    now: () => current,
    sleep: vi.fn(async (ms: number) => {
      current += ms
    }),
  }
}

export function createTestClient(fetch: FetchLike, options: Partial<RedfishClientOptions> = {}): RedfishClient {
  return new RedfishClient({
    host: 'bmc.test',
    username: 'root',
    password: 'test-secret',
    fetch,
    logger: silentLogger,
    ...options,
  })
}
