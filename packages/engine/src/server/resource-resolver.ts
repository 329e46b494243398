import type { ContentSource } from '../content/content-source.js'
import type { HttpRequest, HttpResponse, HttpStatus } from '../http/types.js'
import { STATUS_TEXT } from '../http/types.js'
import type { Logger } from '../logging/logger.js'
import { fromString } from '../utils/buffer.js'
import { getMimeType } from './mime-types.js'

export type ResolveErrorKind = 'NOT_FOUND' | 'METHOD_NOT_ALLOWED' | 'INTERNAL'

export class ResolveError extends Error {
  constructor(
    readonly kind: ResolveErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ResolveError'
  }
}

const RESOLVE_ERROR_STATUS: Record<ResolveErrorKind, HttpStatus> = {
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL: 500,
}

const ALLOWED_METHODS = 'GET, HEAD'
const EMPTY_BODY = new Uint8Array(0)

export interface ResourceResolverOptions {
  source: ContentSource
  /** Value of the `Server` header. */
  serverName: string
  logger?: Logger
}

export class ResourceResolver {
  private source: ContentSource
  private serverName: string
  private logger?: Logger

  constructor(options: ResourceResolverOptions) {
    this.source = options.source
    this.serverName = options.serverName
    this.logger = options.logger
  }

  /**
   * Map a request to its response. Never rejects: lookup faults become 500.
   */
  async resolve(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.resolveContent(request)
    } catch (err) {
      if (err instanceof ResolveError) {
        return this.errorResponse(request, err)
      }

      this.logger?.error('Error resolving request:', err)
      return this.errorResponse(
        request,
        new ResolveError('INTERNAL', STATUS_TEXT[500], { cause: err }),
      )
    }
  }

  errorResponse(request: HttpRequest, err: ResolveError): HttpResponse {
    const status = RESOLVE_ERROR_STATUS[err.kind]
    const message = err.kind === 'INTERNAL' ? STATUS_TEXT[500] : err.message
    const response = this.textResponse(status, message, request.method === 'HEAD')
    if (err.kind === 'METHOD_NOT_ALLOWED') {
      return {
        ...response,
        headers: new Map([...response.headers, ['allow', ALLOWED_METHODS]]),
      }
    }
    return response
  }

  /** Small text/plain response; HEAD keeps the length but drops the bytes. */
  textResponse(status: HttpStatus, message: string, head = false): HttpResponse {
    const body = fromString(`${message}\n`)
    const headers = this.baseHeaders()
    headers.set('content-type', 'text/plain; charset=utf-8')
    headers.set('content-length', String(body.length))
    return { status, headers, body: head ? EMPTY_BODY : body }
  }

  private async resolveContent(request: HttpRequest): Promise<HttpResponse> {
    if (request.method !== 'GET' && request.method !== 'HEAD') {
      throw new ResolveError(
        'METHOD_NOT_ALLOWED',
        `${STATUS_TEXT[405]}: ${request.method}`,
      )
    }

    const found = await this.lookup(request.path)
    if (!found) {
      throw new ResolveError('NOT_FOUND', `${STATUS_TEXT[404]}: ${request.path}`)
    }

    const headers = this.baseHeaders()
    headers.set('content-type', getMimeType(found.path))
    headers.set('content-length', String(found.body.length))
    return {
      status: 200,
      headers,
      body: request.method === 'HEAD' ? EMPTY_BODY : found.body,
    }
  }

  private async lookup(
    path: string,
  ): Promise<{ path: string; body: Uint8Array } | null> {
    // Directories are served through their index.html
    const candidates = path.endsWith('/')
      ? [`${path}index.html`]
      : [path, `${path}/index.html`]

    for (const candidate of candidates) {
      const body = await this.source.lookup(candidate)
      if (body) {
        return { path: candidate, body }
      }
    }
    return null
  }

  private baseHeaders(): Map<string, string> {
    const headers = new Map<string, string>()
    headers.set('server', this.serverName)
    headers.set('date', new Date().toUTCString())
    return headers
  }
}
