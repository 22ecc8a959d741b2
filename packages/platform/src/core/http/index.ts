/**
 * HTTP Client
 *
 * Thin wrapper used for every call to the server. Each request:
 *
 *   1. defaults the content-type header to application/json (not for uploads),
 *   2. JSON-encodes `data` when the content type is JSON. GET and HEAD
 *      carry `data` as query parameters instead, since fetch forbids a body,
 *   3. logs the request before it is sent and the response when it arrives.
 *
 * Responses are returned as-is; callers decide when to raiseForStatus().
 */

import { createLogger } from "../logging/index.js";
import type { ClientOptions } from "../config/index.js";
import { HttpResponse } from "./response.js";
import {
  UndiciTransport,
  type FileUpload,
  type HttpMethod,
  type Transport,
  type TransportBody,
} from "./transport.js";

export { HttpResponse } from "./response.js";
export { UndiciTransport } from "./transport.js";
export type {
  FileUpload,
  HttpMethod,
  Transport,
  TransportBody,
  TransportRequest,
} from "./transport.js";

const logger = createLogger("http");

export interface RequestOptions extends ClientOptions {
  /** Request payload: JSON body, query parameters, or multipart fields */
  data?: unknown;
  /** Files for a multipart upload, keyed by form field name */
  files?: Record<string, FileUpload>;
  headers?: Record<string, string>;
  /** Aborts the request when it fires */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Transport registry
// ---------------------------------------------------------------------------

let transport: Transport = new UndiciTransport();

/** Replaces the transport for every subsequent request. */
export function setTransport(next: Transport): void {
  transport = next;
}

/** Restores the default undici transport. */
export function resetTransport(): void {
  transport = new UndiciTransport();
}

export function getTransport(): Transport {
  return transport;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function normalizeHeaders(headers: Record<string, string> = {}): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = value;
  }
  return normalized;
}

function queryValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Appends `data` to `url` as query parameters.
 * Arrays repeat the key with a `[]` suffix; null and undefined are skipped.
 */
export function withQuery(url: string, data: unknown): string {
  if (typeof data !== "object" || data === null) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) params.append(`${key}[]`, queryValue(item));
    } else {
      params.append(key, queryValue(value));
    }
  }
  const query = params.toString();
  if (query === "") return url;
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

function multipartFields(data: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof data === "object" && data !== null) {
    for (const [key, value] of Object.entries(data)) {
      if (value !== null && value !== undefined) fields[key] = queryValue(value);
    }
  }
  return fields;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export async function request(
  method: HttpMethod,
  url: string,
  options: RequestOptions = {}
): Promise<HttpResponse> {
  const headers = normalizeHeaders(options.headers);
  const { data, files } = options;

  let target = url;
  let body: TransportBody = { kind: "none" };

  if (files !== undefined) {
    body = { kind: "multipart", fields: multipartFields(data), files };
  } else {
    headers["content-type"] ??= "application/json";
    const isJson = headers["content-type"].toLowerCase() === "application/json";
    if (data !== undefined && data !== null) {
      if (method === "GET" || method === "HEAD") {
        target = withQuery(url, data);
      } else if (isJson) {
        body = { kind: "text", text: JSON.stringify(data) };
      } else {
        body = { kind: "text", text: typeof data === "string" ? data : String(data) };
      }
    }
  }

  if (options.auth !== undefined) {
    const [username, password] = options.auth;
    headers.authorization = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
  }

  logger.debug(`Making HTTP ${method} request to ${target}`, {
    headers: Object.keys(headers).filter((name) => name !== "authorization"),
    data: files === undefined ? (data ?? null) : { fields: data ?? null, files: Object.keys(files) },
    verify: options.verify ?? true,
  });

  const response = await transport.send({
    method,
    url: target,
    headers,
    body,
    verify: options.verify ?? true,
    signal: options.signal,
  });

  const message = `Received HTTP ${response.status} response: ${response.text}`;
  if (response.status >= 400) {
    logger.warn(message, { status: response.status, url: target });
  } else {
    logger.debug(message, { status: response.status, url: target });
  }

  return response;
}

export function get(url: string, options?: RequestOptions): Promise<HttpResponse> {
  return request("GET", url, options);
}

export function head(url: string, options?: RequestOptions): Promise<HttpResponse> {
  return request("HEAD", url, options);
}

export function post(url: string, data?: unknown, options: RequestOptions = {}): Promise<HttpResponse> {
  return request("POST", url, { ...options, data });
}

export function put(url: string, data?: unknown, options: RequestOptions = {}): Promise<HttpResponse> {
  return request("PUT", url, { ...options, data });
}

export function patch(url: string, data?: unknown, options: RequestOptions = {}): Promise<HttpResponse> {
  return request("PATCH", url, { ...options, data });
}

/** DELETE. Named `del` because `delete` is reserved. */
export function del(url: string, options?: RequestOptions): Promise<HttpResponse> {
  return request("DELETE", url, options);
}
