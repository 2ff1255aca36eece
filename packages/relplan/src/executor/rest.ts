/**
 * JSON over HTTP
 *
 * Shared request helper for the backend connections. Network failures become
 * ConnectivityError, non-2xx answers become BackendExecutionError carrying the
 * backend's own message.
 */

import type { z } from 'zod'
import { BackendExecutionError, ConnectivityError } from '../errors'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface RestRequest {
  method?: 'GET' | 'POST'
  path: string
  query?: Record<string, string>
  body?: unknown
}

export class RestClient {
  constructor(
    readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  url(path: string, query?: Record<string, string>): string {
    const search = query ? `?${new URLSearchParams(query).toString()}` : ''
    return `${this.baseUrl}${path}${search}`
  }

  /**
   * Send a request and validate the JSON answer.
   */
  async json<T>(request: RestRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.send(request)
    return this.decode(response, schema)
  }

  /**
   * Like `json`, but a 404 answer yields null.
   */
  async optionalJson<T>(request: RestRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const response = await this.send(request, [404])
    if (response.status === 404) return null
    return this.decode(response, schema)
  }

  private async send(request: RestRequest, accepted: number[] = []): Promise<Response> {
    const url = this.url(request.path, request.query)
    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method: request.method ?? 'GET',
        headers: request.body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
      })
    } catch (error) {
      throw new ConnectivityError(
        `Unable to connect to ${this.baseUrl}`,
        url,
        error instanceof Error ? error : undefined,
      )
    }

    if (!response.ok && !accepted.includes(response.status)) {
      const message = (await response.text()).trim() || `${response.status} ${response.statusText}`
      throw new BackendExecutionError(message, response.status, url)
    }
    return response
  }

  private async decode<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body: unknown = await response.json()
    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new BackendExecutionError(
        `Unexpected response from ${response.url || this.baseUrl}: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
        response.status,
      )
    }
    return parsed.data
  }
}
