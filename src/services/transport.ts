import { Agent, type Dispatcher, fetch as undiciFetch } from 'undici'
import { logger as rootLogger, type Logger } from '../logger'
import type { ExtendedMessage, RedfishResult } from '../types/redfish'
import { isQualifiedUrl, isRecord } from '../utils/redfish'
import { InvalidArgumentError, OperationFailedError, TimeoutError, UnexpectedContentTypeError } from './errors'

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE'

export interface TransportRequestInit {
  method: HttpMethod
  headers: Record<string, string>
  body?: string
  dispatcher?: Dispatcher
  signal?: AbortSignal
}

export interface TransportResponse {
  status: number
  ok: boolean
  headers: { get(name: string): string | null }
  text(): Promise<string>
}

export type FetchLike = (url: string, init: TransportRequestInit) => Promise<TransportResponse>

export interface RedfishTransportOptions {
  host: string
  username: string
  password: string
  verifyTls?: boolean
  requestTimeoutMs?: number
  fetch?: FetchLike
  logger?: Logger
}

function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`
}

function mediaType(contentType: string | null): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase()
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown
  } catch {
    return undefined
  }
}

export function extractExtendedMessages(body: unknown): ExtendedMessage[] {
  if (!isRecord(body) || !isRecord(body.error)) {
    return []
  }

  const entries = body.error['@Message.ExtendedInfo']
  if (!Array.isArray(entries)) {
    return []
  }

  return entries.filter(isRecord).map((entry) => ({
    messageId: typeof entry.MessageId === 'string' ? entry.MessageId : '',
    message: typeof entry.Message === 'string' ? entry.Message : '',
  }))
}

/**
 * Authenticated JSON requests against a single management controller.
 * Paths are absolute and unqualified; the transport never talks to any
 * other origin.
 */
export class RedfishTransport {
  readonly baseUrl: string
  private readonly authorization: string
  private readonly dispatcher?: Dispatcher
  private readonly requestTimeoutMs?: number
  private readonly fetchImpl: FetchLike
  private readonly log: Logger

  constructor(options: RedfishTransportOptions) {
    this.baseUrl = `https://${options.host}`
    this.authorization = basicAuthorization(options.username, options.password)
    this.requestTimeoutMs = options.requestTimeoutMs
    this.fetchImpl = options.fetch ?? undiciFetch
    this.log = (options.logger ?? rootLogger).child({ component: 'transport' })

    // controllers usually ship self-signed certificates
    if (options.verifyTls === false) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
      this.log.debug({ host: options.host }, 'tls verification disabled')
    }
  }

  async request(method: HttpMethod, path: string, payload?: Record<string, unknown>): Promise<RedfishResult> {
    if (isQualifiedUrl(path)) {
      throw new InvalidArgumentError(`cannot fetch fully qualified url ${path}`)
    }

    if (!path.startsWith('/')) {
      throw new InvalidArgumentError(`path must be absolute: ${path}`)
    }

    if (!path.startsWith('/redfish')) {
      this.log.warn({ path }, 'path does not look like a redfish uri')
    }

    this.log.debug({ method, path }, 'request')

    const signal = this.requestTimeoutMs !== undefined ? AbortSignal.timeout(this.requestTimeoutMs) : undefined
    let response: TransportResponse
    let text: string

    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: this.authorization,
        },
        body: payload !== undefined ? JSON.stringify(payload) : undefined,
        dispatcher: this.dispatcher,
        signal,
      })
      text = response.status === 204 ? '' : await response.text()
    } catch (error) {
      if (signal?.aborted) {
        throw new TimeoutError(`${method} ${path} timed out after ${this.requestTimeoutMs}ms`, { cause: error })
      }
      throw error
    }

    if (!response.ok) {
      const body = text.length > 0 ? parseJson(text) : undefined
      throw new OperationFailedError({
        method,
        path,
        status: response.status,
        body: body ?? text,
        errors: extractExtendedMessages(body),
      })
    }

    const location = response.headers.get('Location') ?? ''

    if (text.length === 0) {
      return { _location: location }
    }

    const contentType = response.headers.get('Content-Type')
    if (mediaType(contentType) !== 'application/json') {
      throw new UnexpectedContentTypeError(contentType ?? '')
    }

    const data = parseJson(text)
    if (!isRecord(data)) {
      throw new UnexpectedContentTypeError(`${contentType ?? ''} (body is not a JSON object)`)
    }

    return { ...data, _location: location }
  }

  fetch(path: string): Promise<RedfishResult> {
    return this.request('GET', path)
  }

  invoke(path: string, payload: Record<string, unknown>): Promise<RedfishResult> {
    return this.request('POST', path, payload)
  }
}
