/**
 * HTTP Transport
 *
 * The seam between the HTTP wrapper and the network. The default transport
 * sends requests with undici; tests install an in-process fake through
 * setTransport().
 */

import { Agent, fetch, FormData, type Dispatcher } from "undici";
import { HttpResponse } from "./response.js";

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE";

/** A file part of a multipart upload */
export interface FileUpload {
  content: Uint8Array | string;
  filename: string;
  contentType?: string;
}

/** Request body after encoding */
export type TransportBody =
  | { kind: "none" }
  | { kind: "text"; text: string }
  | { kind: "multipart"; fields: Record<string, string>; files: Record<string, FileUpload> };

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body: TransportBody;
  /** Verify the server's TLS certificate */
  verify: boolean;
  signal?: AbortSignal;
}

/** The contract every transport implements. */
export interface Transport {
  send(request: TransportRequest): Promise<HttpResponse>;
}

// ---------------------------------------------------------------------------
// undici transport
// ---------------------------------------------------------------------------

function toFormData(
  fields: Record<string, string>,
  files: Record<string, FileUpload>
): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  for (const [name, file] of Object.entries(files)) {
    form.append(
      name,
      new Blob([file.content], { type: file.contentType ?? "application/octet-stream" }),
      file.filename
    );
  }
  return form;
}

export class UndiciTransport implements Transport {
  /** Shared agent for servers with self-signed certificates */
  private insecureAgent?: Dispatcher;

  async send(request: TransportRequest): Promise<HttpResponse> {
    const body =
      request.body.kind === "text"
        ? request.body.text
        : request.body.kind === "multipart"
          ? toFormData(request.body.fields, request.body.files)
          : undefined;

    const res = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body,
      dispatcher: request.verify ? undefined : this.getInsecureAgent(),
      signal: request.signal,
    });

    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return new HttpResponse(res.status, request.url, await res.text(), headers);
  }

  private getInsecureAgent(): Dispatcher {
    this.insecureAgent ??= new Agent({ connect: { rejectUnauthorized: false } });
    return this.insecureAgent;
  }
}
