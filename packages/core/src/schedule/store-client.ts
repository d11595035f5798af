/**
 * Remote Store Client
 *
 * Reads and writes the schedule CSV through a Git-hosting contents API
 * (GitHub-compatible). The blob's "sha" acts as the version token.
 *
 * Writes always re-resolve the token immediately before the PUT and send
 * that fresh token, never the one the caller read earlier. This narrows
 * the race window but does not close it: a write that lands after another
 * session's write replaces it (last writer wins).
 */

import { z } from 'zod'
import { serializeCsv, parseCsv } from './csv.js'
import { DecodeError, MissingCredentialError, TransportError, describeError } from './errors.js'
import { emptyTable, normalize } from './record.js'
import type {
  EventRecord,
  FetchLike,
  FetchResult,
  LoadedSchedule,
  ScheduleStore,
  ScheduleTable,
  StoreConfig,
  VersionToken,
  WriteResult,
} from './types.js'

const contentsResponseSchema = z.object({
  sha: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional(),
})

const putResponseSchema = z.object({
  content: z.object({ sha: z.string() }).nullable().optional(),
})

export interface RemoteScheduleStoreOptions {
  /** Defaults to the global fetch */
  fetch?: FetchLike
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '')
}

function encodePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/')
}

/**
 * Decode the transport encoding of a contents API payload.
 */
export function decodeContent(content: string): string {
  const bytes = Buffer.from(content, 'base64')
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    throw new DecodeError('Stored schedule is not valid UTF-8', err)
  }
}

export function encodeContent(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64')
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    console.warn(`[ScheduleStore] Response is not JSON: ${describeError(err)}`)
    return null
  }
}

/**
 * Contents-API implementation of ScheduleStore
 */
export class RemoteScheduleStore implements ScheduleStore {
  private config: StoreConfig
  private fetchImpl: FetchLike

  constructor(config: StoreConfig, options: RemoteScheduleStoreOptions = {}) {
    this.config = config
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
  }

  get hasCredential(): boolean {
    return this.config.token !== null && this.config.token.length > 0
  }

  /** Contents API endpoint for the schedule blob */
  get apiUrl(): string {
    const { apiBaseUrl, repo, path } = this.config
    return `${trimTrailingSlash(apiBaseUrl)}/repos/${repo}/contents/${encodePath(path)}`
  }

  /** Public read-only mirror of the same blob */
  get mirrorUrl(): string {
    const { mirrorBaseUrl, repo, branch, path } = this.config
    return `${trimTrailingSlash(mirrorBaseUrl)}/${repo}/${encodeURIComponent(branch)}/${encodePath(path)}`
  }

  private get readUrl(): string {
    return `${this.apiUrl}?ref=${encodeURIComponent(this.config.branch)}`
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.v3+json',
      'User-Agent': this.config.userAgent,
    }
    if (this.config.token) {
      headers.Authorization = `token ${this.config.token}`
    }
    return headers
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init)
    } catch (err) {
      throw new TransportError(url, err)
    }
  }

  /**
   * Authoritative read of the blob and its version token.
   * A payload that cannot be decoded yields an empty table paired with
   * the fetched token; a non-200 reply yields no table and no token.
   */
  async fetch(): Promise<FetchResult> {
    const response = await this.request(this.readUrl, { method: 'GET', headers: this.headers() })

    if (response.status !== 200) {
      console.warn(`[ScheduleStore] GET ${this.config.path} returned ${response.status}`)
      return { table: null, token: null, status: response.status }
    }

    const payload = contentsResponseSchema.safeParse(parseJson(await response.text()))
    if (!payload.success) {
      console.warn(`[ScheduleStore] Unexpected contents payload for ${this.config.path}`)
      return { table: null, token: null, status: response.status }
    }

    const { sha, content } = payload.data
    let table: ScheduleTable
    try {
      table = normalize(parseCsv(decodeContent(content ?? '')))
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err
      console.warn(`[ScheduleStore] ${err.message}; treating ${this.config.path} as empty`)
      table = emptyTable()
    }

    return { table, token: sha, status: response.status }
  }

  /**
   * Unauthenticated read of the mirror. Any failure yields an empty table.
   */
  async fetchMirror(): Promise<ScheduleTable> {
    let response: Response
    try {
      response = await this.request(this.mirrorUrl, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent },
      })
    } catch (err) {
      console.warn(`[ScheduleStore] Mirror unreachable: ${describeError(err)}`)
      return emptyTable()
    }

    if (!response.ok) {
      console.warn(`[ScheduleStore] Mirror returned ${response.status}`)
      return emptyTable()
    }

    try {
      return normalize(parseCsv(await response.text()))
    } catch (err) {
      console.warn(`[ScheduleStore] Mirror content unreadable: ${describeError(err)}`)
      return emptyTable()
    }
  }

  /**
   * Read for display: the API when a credential exists, else (or when the
   * API read fails) the public mirror.
   */
  async load(): Promise<LoadedSchedule> {
    if (this.hasCredential) {
      try {
        const result = await this.fetch()
        if (result.table) {
          return { table: result.table, token: result.token, source: 'api' }
        }
      } catch (err) {
        if (!(err instanceof TransportError)) throw err
        console.warn(`[ScheduleStore] ${err.message}; falling back to mirror`)
      }
    }

    return { table: await this.fetchMirror(), token: null, source: 'mirror' }
  }

  /**
   * Current version token of the blob, or null when it does not exist
   * or cannot be read.
   */
  async resolveToken(): Promise<VersionToken | null> {
    const response = await this.request(this.readUrl, { method: 'GET', headers: this.headers() })
    if (response.status !== 200) {
      return null
    }
    const payload = contentsResponseSchema.safeParse(parseJson(await response.text()))
    return payload.success ? payload.data.sha : null
  }

  /**
   * Replace the blob with `records`.
   *
   * @param knownToken - Token the caller last observed; only used to report
   * that the remote moved in the meantime
   */
  async write(
    records: EventRecord[],
    knownToken: VersionToken | null,
    message: string,
  ): Promise<WriteResult> {
    if (!this.hasCredential) {
      throw new MissingCredentialError()
    }

    const content = encodeContent(serializeCsv(records))

    const freshToken = await this.resolveToken()
    const staleBase = knownToken !== freshToken
    if (staleBase) {
      console.warn(
        `[ScheduleStore] ${this.config.path} moved from ${knownToken ?? '(none)'} to ${freshToken ?? '(none)'} since it was read; this write replaces that revision`,
      )
    }

    const body: Record<string, string> = { message, content, branch: this.config.branch }
    if (freshToken) {
      body.sha = freshToken
    }

    const response = await this.request(this.apiUrl, {
      method: 'PUT',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })

    const text = await response.text()
    const ok = response.status === 200 || response.status === 201

    let newToken: VersionToken | null = null
    if (ok) {
      const reply = putResponseSchema.safeParse(parseJson(text))
      newToken = reply.success ? (reply.data.content?.sha ?? null) : null
      console.log(`[ScheduleStore] Wrote ${records.length} row(s) to ${this.config.path}: "${message}"`)
    } else {
      console.error(`[ScheduleStore] Write to ${this.config.path} failed with ${response.status}`)
    }

    return {
      ok,
      status: response.status,
      body: text,
      tokenSent: freshToken,
      newToken,
      staleBase,
    }
  }
}

export function createRemoteScheduleStore(
  config: StoreConfig,
  options?: RemoteScheduleStoreOptions,
): RemoteScheduleStore {
  return new RemoteScheduleStore(config, options)
}
