// Keep-Alive via undici per-origin pools
import { fetch as undiciFetch, Pool } from "undici";

export type HttpMethod = "GET" | "POST";

export const HTTP_METHOD = {
  GET: "GET",
  POST: "POST",
} as const satisfies Record<HttpMethod, HttpMethod>;

export type RequestHeaders = Record<string, string>;

export const JSON_HEADERS: RequestHeaders = {
  "Accept": "application/json",
};

type KeepAliveConfig = {
  defaultConnections: number;
  perHostConnections: Record<string, number>;
  keepAliveTimeoutMs: number;
  keepAliveMaxTimeoutMs: number;
  pipelining: number;
};

const keepAliveConfig: KeepAliveConfig = {
  defaultConnections: 4,
  perHostConnections: {},
  keepAliveTimeoutMs: 10000,
  keepAliveMaxTimeoutMs: 30000,
  pipelining: 1,
};

const originPools = new Map<string, Pool>();

/**
 * Close all per-origin pools so a one-shot run leaves no sockets open.
 */
export async function closeAllHttpPools(): Promise<void> {
  const closers = [ ...originPools.values() ].map( (pool) => pool.close() );
  originPools.clear();
  await Promise.allSettled( closers );
}

function getPoolForUrl(url: string): Pool {
  const u = new URL( url );
  const origin = u.origin;
  let pool = originPools.get( origin );
  if ( pool ) return pool;
  const connections = keepAliveConfig.perHostConnections[u.hostname] ?? keepAliveConfig.defaultConnections;
  pool = new Pool( origin, {
    connections,
    pipelining: keepAliveConfig.pipelining,
    keepAliveTimeout: keepAliveConfig.keepAliveTimeoutMs,
    keepAliveMaxTimeout: keepAliveConfig.keepAliveMaxTimeoutMs,
  } );
  originPools.set( origin, pool );
  return pool;
}

export type FetchJsonOptions = {
  method?: HttpMethod;
  headers?: RequestHeaders;
  body?: unknown; // JSON.stringified unless already a string
  timeoutMs?: number; // default 5000
};

export class HttpStatusError extends Error {
  constructor(
    public readonly method: HttpMethod,
    public readonly url: string,
    public readonly status: number,
    statusText: string,
    body: string,
  ) {
    super( `${ method } ${ url } failed: ${ status } ${ statusText } ${ body }`.trim() );
    this.name = "HttpStatusError";
  }
}

export async function fetchJson(url: string, opts: FetchJsonOptions = {}): Promise<unknown> {
  const method = opts.method || HTTP_METHOD.GET;
  const timeoutMs = opts.timeoutMs ?? 5000;
  const headers: RequestHeaders = { ...JSON_HEADERS, ...(opts.headers || {}) };

  let body: string | undefined = undefined;
  if ( opts.body !== undefined ) {
    if ( typeof opts.body === "string" ) body = opts.body;
    else {
      headers["content-type"] = headers["content-type"] || "application/json";
      body = JSON.stringify( opts.body );
    }
  }

  const res = await undiciFetch( url, {
    method,
    headers,
    body,
    signal: AbortSignal.timeout( timeoutMs ),
    dispatcher: getPoolForUrl( url ),
  } );
  if ( !res.ok ) {
    const text = await res.text().catch( () => "" );
    throw new HttpStatusError( method, url, res.status, res.statusText, text );
  }
  const text = await res.text();
  return text ? JSON.parse( text ) : undefined;
}

export type RequestStatusOptions = {
  headers?: RequestHeaders;
  timeoutMs?: number;
};

/**
 * GET a URL and report only its status code. The body is drained and
 * discarded; network errors and timeouts reject.
 */
export async function requestStatus(url: string, opts: RequestStatusOptions = {}): Promise<number> {
  const res = await undiciFetch( url, {
    method: HTTP_METHOD.GET,
    headers: opts.headers,
    signal: AbortSignal.timeout( opts.timeoutMs ?? 5000 ),
    dispatcher: getPoolForUrl( url ),
  } );
  await res.arrayBuffer().catch( () => undefined );
  return res.status;
}

export type JsonFetcher = (url: string, opts?: FetchJsonOptions) => Promise<unknown>;

export type StatusRequester = (url: string, opts?: RequestStatusOptions) => Promise<number>;
