/**
 * Immutable response value threaded through the middleware chain.
 */

/** Anything a fetch Response accepts as its body. */
export type ResponseBody = Exclude<
  ConstructorParameters<typeof Response>[0],
  undefined
>;

type HeadersInit = ConstructorParameters<typeof Headers>[0];

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";
const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

// Statuses a fetch Response refuses a body for.
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export interface ServerResponseInit {
  status?: number;
  headers?: HeadersInit;
  body?: ResponseBody;
}

export class ServerResponse {
  readonly status: number;
  readonly body: ResponseBody;
  private readonly _headers: Headers;

  constructor(init: ServerResponseInit = {}) {
    this.status = init.status ?? 200;
    this._headers = new Headers(init.headers);
    this.body = init.body ?? null;
  }

  /**
   * A copy of the headers; changing it does not change the response.
   */
  get headers(): Headers {
    return new Headers(this._headers);
  }

  getHeader(name: string): string | null {
    return this._headers.get(name);
  }

  hasHeader(name: string): boolean {
    return this._headers.has(name);
  }

  withStatus(status: number): ServerResponse {
    return new ServerResponse({
      status,
      headers: this._headers,
      body: this.body,
    });
  }

  withHeader(name: string, value: string): ServerResponse {
    const headers = new Headers(this._headers);
    headers.set(name, value);
    return new ServerResponse({ status: this.status, headers, body: this.body });
  }

  withAddedHeader(name: string, value: string): ServerResponse {
    const headers = new Headers(this._headers);
    headers.append(name, value);
    return new ServerResponse({ status: this.status, headers, body: this.body });
  }

  withoutHeader(name: string): ServerResponse {
    const headers = new Headers(this._headers);
    headers.delete(name);
    return new ServerResponse({ status: this.status, headers, body: this.body });
  }

  withBody(body: ResponseBody): ServerResponse {
    return new ServerResponse({
      status: this.status,
      headers: this._headers,
      body,
    });
  }

  withText(text: string): ServerResponse {
    return this.withBody(text).withHeader("Content-Type", TEXT_CONTENT_TYPE);
  }

  withJson(data: unknown): ServerResponse {
    return this.withBody(JSON.stringify(data)).withHeader(
      "Content-Type",
      JSON_CONTENT_TYPE,
    );
  }

  toResponse(): Response {
    const body = NULL_BODY_STATUSES.has(this.status) ? null : this.body;
    return new Response(body, {
      status: this.status,
      headers: this._headers,
    });
  }
}
