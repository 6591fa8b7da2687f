/**
 * Thin fetch wrapper for the Pica API
 */

import { PicaApiError, errorMessage } from '../config/errors'
import type { QueryValue } from './types'

export interface HttpRequest {
  method: string
  url: string
  headers?: Record<string, string>
  query?: Record<string, QueryValue | undefined>
  body?: string | FormData | URLSearchParams
}

export interface HttpResponse {
  status: number
  data: unknown
}

export function buildUrl(url: string, query?: Record<string, QueryValue | undefined>): string {
  if (!query) return url

  const params = new URLSearchParams()
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) params.append(name, String(value))
  }

  const search = params.toString()
  if (!search) return url
  return `${url}${url.includes('?') ? '&' : '?'}${search}`
}

/**
 * Parse a response body as JSON, falling back to text
 */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text()
  if (!text) return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * Send a request
 * @throws PicaApiError on network failure or a non-2xx status
 */
export async function sendRequest(request: HttpRequest): Promise<HttpResponse> {
  const url = buildUrl(request.url, request.query)

  let response: Response
  try {
    response = await fetch(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
    })
  } catch (error) {
    throw new PicaApiError(`Request to ${url} failed: ${errorMessage(error)}`, { url, cause: error })
  }

  if (!response.ok) {
    const body = await response.text()
    throw new PicaApiError(`Pica API error: ${response.status} - ${body}`, {
      url,
      status: response.status,
      body,
    })
  }

  return { status: response.status, data: await readBody(response) }
}
