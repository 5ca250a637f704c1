import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest'
import type { Server } from 'http'
import { createApp } from './app.js'
import { loadConfig, type ServerConfig } from './config.js'

async function start(cfg: ServerConfig): Promise<{ server: Server; base: string }> {
  const server = createApp(cfg).listen(0, '127.0.0.1')
  await new Promise<void>((resolve) => server.once('listening', () => resolve()))
  const addr = server.address()
  if (addr === null || typeof addr === 'string') throw new Error('server has no TCP address')
  return { server, base: `http://127.0.0.1:${addr.port}` }
}

function stop(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
}

function postJson(url: string, body: unknown) {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  })
}

function identifiers(doc: unknown): string[] {
  return JSON.stringify(doc).match(/\b(?:resp|msg)_[0-9a-f]{32}\b/g) ?? []
}

describe('HTTP routes', () => {
  let server: Server
  let base: string

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    ;({ server, base } = await start(loadConfig({})))
  })

  afterAll(async () => {
    await stop(server)
    vi.restoreAllMocks()
  })

  it('GET /v1/health reports ok', async () => {
    const res = await fetch(`${base}/v1/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok' })
  })

  it('POST /v1/responses synthesizes a story', async () => {
    const res = await postJson(`${base}/v1/responses`, {
      model: 'gpt-4.1',
      input: 'Write a story about a brave fox.',
    })
    expect(res.status).toBe(200)
    expect(res.headers.get('access-control-allow-origin')).toBe('*')

    expect(await res.json()).toMatchObject({
      id: expect.stringMatching(/^resp_[0-9a-f]{32}$/),
      object: 'response',
      model: 'gpt-4.1-2025-04-14',
      output: [
        {
          id: expect.stringMatching(/^msg_[0-9a-f]{32}$/),
          content: [{ type: 'output_text', text: expect.stringContaining('silver moon, brave fox discovered') }],
        },
      ],
      temperature: 1,
      top_p: 1,
      usage: {
        input_tokens: 7,
        input_tokens_details: { cached_tokens: 0 },
        output_tokens: 62,
        output_tokens_details: { reasoning_tokens: 0 },
        total_tokens: 69,
      },
    })
  })

  it('echoes sampling parameters and defaults the model', async () => {
    const res = await postJson(`${base}/v1/responses`, { input: [], temperature: 0.2, top_p: 0.5 })
    expect(await res.json()).toMatchObject({
      model: 'gpt-4.1-2025-04-14',
      temperature: 0.2,
      top_p: 0.5,
      usage: { input_tokens: 0 },
      output: [{ content: [{ text: expect.stringContaining('As a approached the water') }] }],
    })
  })

  it('issues new identifiers on every call', async () => {
    const [a, b] = await Promise.all([
      postJson(`${base}/v1/responses`, { model: 'm', input: 'hi' }).then((r) => r.json()),
      postJson(`${base}/v1/responses`, { model: 'm', input: 'hi' }).then((r) => r.json()),
    ])
    const seen = new Set([...identifiers(a), ...identifiers(b)])
    expect(identifiers(a)).toHaveLength(2)
    expect(seen.size).toBe(4)
  })

  it('health stays ok after other traffic', async () => {
    await postJson(`${base}/v1/responses`, { model: 'm', input: 'about a heron' })
    const res = await fetch(`${base}/v1/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok' })
  })

  it('rejects a body that is not JSON', async () => {
    const res = await fetch(`${base}/v1/responses`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{not json',
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: {
        message: 'We could not parse the JSON body of your request.',
        type: 'invalid_request_error',
        code: 'invalid_json',
      },
    })
  })

  it('answers CORS preflight', async () => {
    const res = await fetch(`${base}/v1/responses`, { method: 'OPTIONS' })
    expect(res.status).toBe(204)
    expect(res.headers.get('access-control-allow-methods')).toBe('GET,HEAD,POST,OPTIONS')
  })

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${base}/v1/completions`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({
      error: {
        message: 'No route for GET /v1/completions',
        type: 'invalid_request_error',
        code: 'not_found',
      },
    })
  })

  it('serves the root ping', async () => {
    const res = await fetch(`${base}/`)
    expect(await res.json()).toEqual({ ok: true, msg: 'responses-mock-server' })
  })
})

describe('body limit', () => {
  let server: Server
  let base: string

  beforeAll(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    ;({ server, base } = await start({ ...loadConfig({}), bodyLimit: '64b' }))
  })

  afterAll(async () => {
    await stop(server)
    vi.restoreAllMocks()
  })

  it('returns 413 for oversized bodies', async () => {
    const res = await postJson(`${base}/v1/responses`, { model: 'm', input: 'x'.repeat(200) })
    expect(res.status).toBe(413)
    expect(await res.json()).toMatchObject({ error: { code: 'payload_too_large' } })
  })
})
