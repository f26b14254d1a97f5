export type HttpHeaders = Record<string, string>

export interface HttpResponse<TBody> {
  status: number
  contentType: string
  body: TBody
}

export interface HttpRequestConfig {
  timeoutMs: number
  headers: HttpHeaders
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} on GET ${url}`)
    this.name = "HttpError"
  }
}

const withTimeoutSignal = (timeoutMs: number, signal?: AbortSignal): AbortSignal => {
  const timeoutSignal = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([timeoutSignal, signal]) : timeoutSignal
}

const get = async (
  url: string,
  config: HttpRequestConfig,
  signal?: AbortSignal,
): Promise<Response> => {
  const response = await fetch(url, {
    method: "GET",
    headers: config.headers,
    signal: withTimeoutSignal(config.timeoutMs, signal),
  })
  if (!response.ok) {
    throw new HttpError(response.status, url)
  }
  return response
}

export const httpGetText = async (
  url: string,
  config: HttpRequestConfig,
  signal?: AbortSignal,
): Promise<HttpResponse<string>> => {
  const response = await get(url, config, signal)
  return {
    status: response.status,
    contentType: response.headers.get("content-type") ?? "",
    body: await response.text(),
  }
}

export const httpGetBytes = async (
  url: string,
  config: HttpRequestConfig,
  signal?: AbortSignal,
): Promise<HttpResponse<Uint8Array>> => {
  const response = await get(url, config, signal)
  return {
    status: response.status,
    contentType: response.headers.get("content-type") ?? "",
    body: new Uint8Array(await response.arrayBuffer()),
  }
}
