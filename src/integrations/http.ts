export type FetchResponseLike = {
  status: number
  text: () => Promise<string>
}

export type FetchLike = (
  url: string,
  init?: {
    method?: string
    headers?: Record<string, string>
    body?: string
  }
) => Promise<FetchResponseLike>

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH"

export function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function parseBody(text: string): unknown {
  if (!text) {
    return {}
  }

  try {
    return JSON.parse(text)
  } catch {
    // plain-text error pages
    return { message: text }
  }
}

export function resolveFetch(fetchImpl?: FetchLike): FetchLike {
  return fetchImpl ?? ((url, init) => globalThis.fetch(url, init))
}
