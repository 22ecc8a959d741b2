/**
 * Test Support
 *
 * An in-process transport that answers requests from a scripted queue and
 * records everything it was asked to send. Install it with setTransport()
 * in a beforeEach and restore the real one with resetTransport().
 */

import { HttpResponse } from "../core/http/response.js";
import type { Transport, TransportRequest } from "../core/http/transport.js";

export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly queue: Array<{ status: number; body: unknown }> = [];

  /** Queues a response. A non-string body is JSON-encoded; undefined means empty. */
  reply(status: number, body?: unknown): this {
    this.queue.push({ status, body });
    return this;
  }

  async send(request: TransportRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`FakeTransport has no response queued for ${request.method} ${request.url}`);
    }
    const text =
      next.body === undefined
        ? ""
        : typeof next.body === "string"
          ? next.body
          : JSON.stringify(next.body);
    return new HttpResponse(next.status, request.url, text);
  }

  /** Responses queued but never requested */
  get pending(): number {
    return this.queue.length;
  }

  get lastRequest(): TransportRequest {
    const last = this.requests.at(-1);
    if (last === undefined) {
      throw new Error("FakeTransport has not received any request");
    }
    return last;
  }

  /** Decoded JSON body of the request at `index` (default: the last one). */
  jsonBody(index = this.requests.length - 1): unknown {
    const request = this.requests[index];
    if (request === undefined || request.body.kind !== "text") {
      throw new Error(`Request ${index} has no text body`);
    }
    return JSON.parse(request.body.text);
  }

  /** "METHOD url" for every request, in order */
  calls(): string[] {
    return this.requests.map((request) => `${request.method} ${request.url}`);
  }
}
