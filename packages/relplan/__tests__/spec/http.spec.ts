/**
 * HTTP Surface Tests
 *
 * Requests go through `app.request`; no socket is opened.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Hono } from 'hono'
import { ConnectivityError, createApp } from '../../src'
import { createFakeClients } from './fixtures/backends'
import type { FakeClients } from './fixtures/backends'

const FILTER = 'A(x) :- R(x,3)'

function query(path: string, params: Record<string, string>): string {
  return `${path}?${new URLSearchParams(params).toString()}`
}

describe('HTTP surface', () => {
  let clients: FakeClients
  let app: Hono

  beforeEach(() => {
    clients = createFakeClients()
    app = createApp({ clients, buildInfo: { version: 'abc123', branch: 'main' } })
  })

  describe('planning', () => {
    it('answers the logical plan as a JSON string', async () => {
      const res = await app.request(query('/plan', { query: FILTER }))
      expect(res.status).toBe(200)
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*')
      expect(await res.json()).toBe('A = Apply(x=$0)[Select(($1 = 3))[Scan(public:adhoc:R)]]')
    })

    it('reads POSTed form parameters', async () => {
      const res = await app.request('/optimize', {
        method: 'POST',
        body: new URLSearchParams({ query: FILTER, backend: 'clang' }),
      })
      expect(res.status).toBe(200)
      expect(await res.json()).toBe('A = CStore(public:adhoc:A)[CApply(x=$0)[CSelect(($1 = 3))[CFileScan(public:adhoc:R)]]]')
    })

    it('returns the compiled program without submitting it', async () => {
      const res = await app.request(query('/compile', { query: FILTER, backend: 'grappa' }))
      expect(await res.json()).toMatchObject({ backend: 'grappa', relations: ['public:adhoc:R'] })
      expect(clients.codegen.submitQuery).not.toHaveBeenCalled()
    })

    it('serves dot as plain text', async () => {
      const res = await app.request(query('/dot', { query: FILTER, type: 'logical' }))
      expect(res.headers.get('Content-Type')).toMatch(/^text\/plain/)
      expect((await res.text()).split('\n')[0]).toBe('digraph G {')
    })
  })

  describe('errors', () => {
    it('answers unsupported requests with 400', async () => {
      const res = await app.request(query('/plan', { query: FILTER, language: 'prolog' }))
      expect(res.status).toBe(400)
      expect(res.headers.get('Content-Type')).toMatch(/^text\/plain/)
      expect(await res.text()).toBe('Error 400 (Bad Request): Language prolog is not supported on myria')
    })

    it('names syntax errors', async () => {
      const res = await app.request(query('/plan', { query: 'A(x) R(x)' }))
      expect(res.status).toBe(400)
      expect(await res.text()).toMatch(/^Error 400 \(Bad Request\): QuerySyntaxError: /)
    })

    it('answers 503 when the cluster cannot be reached', async () => {
      vi.mocked(clients.myria.workersAlive).mockRejectedValueOnce(
        new ConnectivityError('Unable to connect to http://myria.test:8753'),
      )
      const res = await app.request(query('/optimize', { query: FILTER }))
      expect(res.status).toBe(503)
      expect(await res.text()).toBe('Error 503 (Unavailable): Unable to connect to REST server')
    })

    it('answers 500 for anything unexpected, with a stack only in debug mode', async () => {
      clients.myria.submitQuery.mockRejectedValue(new Error('boom'))
      const quiet = await app.request('/execute', { method: 'POST', body: new URLSearchParams({ query: FILTER }) })
      expect(quiet.status).toBe(500)
      expect(await quiet.text()).toBe('Error 500 (Internal Server Error): boom')

      const debug = createApp({ clients, debug: true })
      const loud = await debug.request('/execute', { method: 'POST', body: new URLSearchParams({ query: FILTER }) })
      const body = await loud.text()
      expect(body.startsWith('Error 500 (Internal Server Error): boom\n\nError: boom')).toBe(true)
    })
  })

  describe('execution', () => {
    it('submits with 201 and a Content-Location header', async () => {
      const res = await app.request('/execute', { method: 'POST', body: new URLSearchParams({ query: FILTER }) })
      expect(res.status).toBe(201)
      expect(res.headers.get('Content-Location')).toBe('http://myria.test:8753/execute?query_id=7')
      expect(await res.json()).toEqual({
        queryId: 7,
        status: 'ACCEPTED',
        url: 'http://myria.test:8753/execute?query_id=7',
      })
    })

    it('answers 503 when the submission cannot reach the cluster', async () => {
      clients.myria.submitQuery.mockRejectedValueOnce(new ConnectivityError('Unable to connect to http://myria.test:8753'))
      const res = await app.request('/execute', { method: 'POST', body: new URLSearchParams({ query: FILTER }) })
      expect(clients.myria.workersAlive).toHaveBeenCalled()
      expect(res.status).toBe(503)
      expect(await res.text()).toBe('Error 503 (Unavailable): Unable to connect to REST server')
    })

    it('reports status on GET', async () => {
      const res = await app.request(query('/execute', { queryId: '7' }))
      expect(await res.json()).toEqual({ queryId: 7, status: 'ACCEPTED' })

      const missing = await app.request('/execute')
      expect(missing.status).toBe(400)
      expect(await missing.text()).toBe('Error 400 (Bad Request): missing query_id')
    })
  })

  describe('/status', () => {
    it('describes the connections and the build', async () => {
      const res = await app.request('/status')
      expect(await res.json()).toEqual({
        connection: 'myria.test:8753 [4/4]',
        version: 'abc123',
        branch: 'main',
        myria: 'http://myria.test:8753',
        codegen: 'http://codegen.test:1337',
      })
    })

    it('still answers when the cluster is down', async () => {
      vi.mocked(clients.myria.workers).mockRejectedValueOnce(new ConnectivityError('Unable to connect'))
      const res = await createApp({ clients }).request('/status')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        connection: 'error connecting to myria.test:8753',
        version: 'commit version file not found',
        branch: 'branch file not found',
        myria: 'http://myria.test:8753',
        codegen: 'http://codegen.test:1337',
      })
    })
  })
})
