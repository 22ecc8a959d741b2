/**
 * HTTP Response
 *
 * The buffered result of one request. Bodies are read eagerly, so a response
 * can be logged, decoded and inspected any number of times.
 */

import { HttpError } from "@satkit/contracts";

export class HttpResponse {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly text: string,
    readonly headers: Record<string, string> = {}
  ) {}

  get ok(): boolean {
    return this.status < 400;
  }

  /**
   * Decodes the body as JSON.
   * Throws a SyntaxError when the body is not JSON.
   */
  json(): unknown {
    return JSON.parse(this.text);
  }

  /** Throws HttpError for 4xx and 5xx responses. */
  raiseForStatus(): void {
    if (!this.ok) {
      throw new HttpError(this.status, this.url, this.text);
    }
  }
}
