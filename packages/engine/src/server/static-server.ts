import type { IFileSystem } from '../interfaces/filesystem.js'
import type { HttpRequest } from '../http/request.js'
import { HttpResponse } from '../http/response.js'
import { ResponseHeader } from '../http/response-header.js'
import { Status } from '../http/status.js'
import { ALLOWED_METHODS, HTTP_VERSION } from '../http/types.js'
import { getMimeType } from './mime-types.js'
import { fromString } from '../utils/buffer.js'
import type { Logger } from '../logging/logger.js'

const ALLOWED_METHOD_LIST = ALLOWED_METHODS.split(', ')

export interface StaticServerOptions {
  root: string
  fs: IFileSystem
  /** Value of the `Server` header. */
  serverName: string
  logger?: Logger
  /** Clock for the `Date` header. */
  now?: () => Date
}

export class StaticServer {
  private root: string
  private fs: IFileSystem
  private serverName: string
  private logger?: Logger
  private now: () => Date

  constructor(options: StaticServerOptions) {
    this.root = options.root.replace(/\/+$/, '')
    this.fs = options.fs
    this.serverName = options.serverName
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  async handleRequest(request: HttpRequest): Promise<HttpResponse> {
    const headOnly = request.method === 'HEAD'

    if (!ALLOWED_METHOD_LIST.includes(request.method)) {
      return this.textResponse(Status.MethodNotAllowed, 'Method Not Allowed', headOnly, [
        ResponseHeader.allow(ALLOWED_METHODS),
      ])
    }

    const urlPath = decodeRequestPath(request.url)
    if (!urlPath) {
      return this.textResponse(Status.BadRequest, 'Bad Request', headOnly)
    }

    const fsPath = this.root + urlPath

    if (!fsPath.startsWith(this.root + '/') && fsPath !== this.root) {
      return this.textResponse(Status.NotFound, 'Not Found', headOnly)
    }

    try {
      if (!(await this.fs.exists(fsPath))) {
        return this.textResponse(Status.NotFound, 'Not Found', headOnly)
      }

      const stat = await this.fs.stat(fsPath)

      if (stat.isDirectory) {
        const indexPath = fsPath.replace(/\/+$/, '') + '/index.html'
        if (await this.fs.exists(indexPath)) {
          return this.serveFile(indexPath, headOnly)
        }
        return this.textResponse(Status.NotFound, 'Not Found', headOnly)
      }

      if (stat.isFile) {
        return this.serveFile(fsPath, headOnly)
      }

      return this.textResponse(Status.NotFound, 'Not Found', headOnly)
    } catch (err) {
      this.logger?.error('Error serving request:', err)
      return this.textResponse(Status.InternalServerError, 'Internal Server Error', headOnly)
    }
  }

  /** Plain-text response, used for every error the server answers with. */
  textResponse(
    status: Status,
    text: string,
    headOnly = false,
    extraHeaders: ResponseHeader[] = [],
  ): HttpResponse {
    const body = fromString(text)
    const response = new HttpResponse(HTTP_VERSION, status, headOnly ? undefined : body)
    this.addCommonHeaders(response)
    for (const header of extraHeaders) {
      response.addHeader(header)
    }
    response
      .addHeader(ResponseHeader.contentType('text/plain; charset=utf-8'))
      .addHeader(ResponseHeader.contentLength(body.length))
    return response
  }

  private async serveFile(filePath: string, headOnly: boolean): Promise<HttpResponse> {
    const data = await this.fs.readFile(filePath)
    const response = new HttpResponse(HTTP_VERSION, Status.Ok, headOnly ? undefined : data)
    this.addCommonHeaders(response)
    return response
      .addHeader(ResponseHeader.acceptRanges('none'))
      .addHeader(ResponseHeader.contentType(getMimeType(filePath)))
      .addHeader(ResponseHeader.contentLength(data.length))
  }

  private addCommonHeaders(response: HttpResponse): void {
    response
      .addHeader(ResponseHeader.server(this.serverName))
      .addHeader(ResponseHeader.date(this.now().toUTCString()))
  }
}

/**
 * Decode request URL to a filesystem-safe path.
 * Returns null if the URL is malformed.
 */
export function decodeRequestPath(url: string): string | null {
  try {
    // Strip query string and fragment
    const pathPart = url.split('?')[0].split('#')[0]

    const decoded = decodeURIComponent(pathPart)
    if (decoded.includes('\0')) {
      return null
    }

    // Normalize: collapse double slashes, resolve . and ..
    const segments = decoded.split('/').filter(Boolean)
    const resolved: string[] = []
    for (const seg of segments) {
      if (seg === '.') continue
      if (seg === '..') {
        resolved.pop()
        continue
      }
      resolved.push(seg)
    }

    return '/' + resolved.join('/')
  } catch {
    return null
  }
}
