/**
 * In-process stand-in for the Threads Graph API
 */

import type { FetchLike } from '../../src/threads/client.js'

export type FetchCall = { url: URL; init?: RequestInit }

export type FetchHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  })
}

export function errorResponse(
  status: number,
  message = 'error',
  headers: Record<string, string> = {},
): Response {
  return jsonResponse({ error: { message } }, status, headers)
}

/**
 * fetch that records every call and answers through `handler`
 */
export function createFakeFetch(handler: FetchHandler): {
  fetch: FetchLike
  calls: FetchCall[]
} {
  const calls: FetchCall[] = []
  const fetch: FetchLike = async (input, init) => {
    const url = new URL(input)
    calls.push({ url, init })
    return handler(url, init)
  }
  return { fetch, calls }
}

export type FakeThreadsApiOptions = {
  /** Pages of raw posts served in order through paging.next */
  pages: ReadonlyArray<ReadonlyArray<Record<string, unknown>>>
  /** Insights per post id; posts without an entry get an empty data list */
  insights?: Record<string, Partial<Record<string, number>>>
  /** Post ids whose insights request fails with this status */
  failingInsights?: Record<string, number>
  /** 1-based page numbers answered with this status */
  failingPages?: Record<number, number>
  baseUrl?: string
}

/**
 * Handler serving `me/threads` pages and `{id}/insights`
 *
 * Page n links to page n+1 with `after=cursor-n`.
 */
export function fakeThreadsApi(options: FakeThreadsApiOptions): FetchHandler {
  const baseUrl = options.baseUrl ?? 'https://graph.threads.net/v1.0'
  return (url) => {
    const route = url.pathname.replace(/^\/v1\.0\//, '')

    if (route === 'me/threads') {
      const after = url.searchParams.get('after')
      const index = after ? Number(after.replace('cursor-', '')) : 0
      const failing = options.failingPages?.[index + 1]
      if (failing) return errorResponse(failing, `page ${index + 1} failed`)

      const data = options.pages[index] ?? []
      const hasNext = index + 1 < options.pages.length
      return jsonResponse({
        data,
        paging: {
          cursors: { after: `cursor-${index + 1}` },
          ...(hasNext
            ? { next: `${baseUrl}/me/threads?after=cursor-${index + 1}&limit=999` }
            : {}),
        },
      })
    }

    const insightsMatch = /^(.+)\/insights$/.exec(route)
    if (insightsMatch?.[1]) {
      const postId = insightsMatch[1]
      const failing = options.failingInsights?.[postId]
      if (failing) return errorResponse(failing, `insights for ${postId} failed`)
      const metrics = options.insights?.[postId] ?? {}
      return jsonResponse({
        data: Object.entries(metrics).map(([name, value]) => ({
          name,
          values: [{ value }],
        })),
      })
    }

    if (route === 'me') {
      return jsonResponse({ id: 'user-1', username: 'tester' })
    }

    return errorResponse(404, `no route for ${url.pathname}`)
  }
}
