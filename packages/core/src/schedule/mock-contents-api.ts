/**
 * Mock Contents API
 *
 * In-memory stand-in for a GitHub-compatible contents API and its raw
 * mirror, holding a single versioned blob. Used by tests and by the
 * dashboard's `store.mode: mock` for local development.
 */

import { createHash } from 'node:crypto'
import { z } from 'zod'
import type { FetchLike, StoreConfig } from './types.js'

const DEFAULT_API_BASE = 'https://api.contents.test'
const DEFAULT_MIRROR_BASE = 'https://raw.contents.test'

const putBodySchema = z.object({
  message: z.string(),
  content: z.string(),
  sha: z.string().optional(),
  branch: z.string().optional(),
})

export interface RecordedRequest {
  method: string
  url: string
  authorization: string | null
  body: unknown
}

export interface RecordedPut {
  message: string
  /** Token the client attached, null when omitted */
  sha: string | null
  status: number
}

export interface MockContentsApiOptions {
  repo?: string
  path?: string
  branch?: string
  /** Credential the API accepts; requests carrying another one get 401 */
  token?: string | null
  initialCsv?: string
}

interface Blob {
  content: string
  sha: string
}

/** Git blob hash, the same value GitHub reports as a file's sha */
export function gitBlobSha(content: string): string {
  return createHash('sha1')
    .update(`blob ${Buffer.byteLength(content, 'utf-8')}\0`)
    .update(content, 'utf-8')
    .digest('hex')
}

function wrapBase64(text: string): string {
  const encoded = Buffer.from(text, 'utf-8').toString('base64')
  return (encoded.match(/.{1,60}/g) ?? []).join('\n') + '\n'
}

function json(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
  })
}

export class MockContentsApi {
  readonly repo: string
  readonly path: string
  readonly branch: string
  readonly requests: RecordedRequest[] = []
  readonly puts: RecordedPut[] = []

  /** Invoked after a request is recorded and before it is answered */
  onRequest: ((request: RecordedRequest) => void) | null = null

  private blob: Blob | null = null
  private acceptedToken: string | null

  constructor(options: MockContentsApiOptions = {}) {
    this.repo = options.repo ?? 'demo/schedule'
    this.path = options.path ?? 'schedule.csv'
    this.branch = options.branch ?? 'main'
    this.acceptedToken = options.token ?? null
    if (options.initialCsv !== undefined) {
      this.blob = { content: options.initialCsv, sha: gitBlobSha(options.initialCsv) }
    }
  }

  get sha(): string | null {
    return this.blob?.sha ?? null
  }

  get content(): string | null {
    return this.blob?.content ?? null
  }

  /** Store config pointing a client at this mock */
  storeConfig(token: string | null = this.acceptedToken): StoreConfig {
    return {
      repo: this.repo,
      path: this.path,
      branch: this.branch,
      apiBaseUrl: DEFAULT_API_BASE,
      mirrorBaseUrl: DEFAULT_MIRROR_BASE,
      token,
      userAgent: 'csv-scheduler-mock',
    }
  }

  /** Simulate another session replacing the blob */
  externalWrite(csv: string): string {
    this.blob = { content: csv, sha: gitBlobSha(csv) }
    return this.blob.sha
  }

  readonly fetch: FetchLike = async (url, init) => this.handle(url, init)

  private handle(url: string, init?: RequestInit): Response {
    const method = (init?.method ?? 'GET').toUpperCase()
    const authorization = new Headers(init?.headers).get('authorization')
    const body = typeof init?.body === 'string' ? this.parseBody(init.body) : null

    const recorded: RecordedRequest = { method, url, authorization, body }
    this.requests.push(recorded)
    this.onRequest?.(recorded)

    const target = new URL(url)
    const location = `${target.origin}${target.pathname}`

    if (location === `${DEFAULT_API_BASE}/repos/${this.repo}/contents/${this.path}`) {
      if (authorization !== null && authorization !== `token ${this.acceptedToken}`) {
        return json(401, { message: 'Bad credentials' })
      }
      if (method === 'GET') return this.getContents()
      if (method === 'PUT') {
        if (authorization === null) {
          return json(401, { message: 'Requires authentication' })
        }
        return this.putContents(body)
      }
      return json(405, { message: 'Method Not Allowed' })
    }

    if (location === `${DEFAULT_MIRROR_BASE}/${this.repo}/${this.branch}/${this.path}`) {
      if (this.blob === null) {
        return new Response('404: Not Found', { status: 404 })
      }
      return new Response(this.blob.content, {
        status: 200,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      })
    }

    return json(404, { message: 'Not Found' })
  }

  private parseBody(text: string): unknown {
    try {
      return JSON.parse(text)
    } catch {
      return text
    }
  }

  private getContents(): Response {
    if (this.blob === null) {
      return json(404, { message: 'Not Found' })
    }
    return json(200, {
      name: this.path.split('/').pop(),
      path: this.path,
      sha: this.blob.sha,
      encoding: 'base64',
      content: wrapBase64(this.blob.content),
    })
  }

  private putContents(body: unknown): Response {
    const parsed = putBodySchema.safeParse(body)
    if (!parsed.success) {
      return json(422, { message: 'Invalid request.' })
    }

    const { message, content, sha } = parsed.data
    const existed = this.blob !== null

    let status: number
    if (existed && sha === undefined) {
      status = 422
    } else if (sha !== undefined && sha !== this.blob?.sha) {
      status = 409
    } else {
      status = existed ? 200 : 201
    }
    this.puts.push({ message, sha: sha ?? null, status })

    if (status === 422) {
      return json(422, { message: 'Invalid request.\n\n"sha" wasn\'t supplied.' })
    }
    if (status === 409) {
      return json(409, { message: `${this.path} does not match ${sha}` })
    }

    const text = Buffer.from(content, 'base64').toString('utf-8')
    this.blob = { content: text, sha: gitBlobSha(text) }
    return json(status, {
      content: { name: this.path.split('/').pop(), path: this.path, sha: this.blob.sha },
      commit: { message },
    })
  }
}
