/**
 * Immutable server-side request.
 *
 * Wraps a fetch `Request` and adds the pieces routing needs: a mutable-by-copy
 * method and request-target, and attributes that middleware use to hand
 * values downstream (path variables land here).
 */

type HeadersInit = ConstructorParameters<typeof Headers>[0];

interface ServerRequestInit {
  method: string;
  target: string;
  headers: HeadersInit;
  raw: Request | null;
  attributes: ReadonlyMap<string, unknown>;
}

const EMPTY_ATTRIBUTES: ReadonlyMap<string, unknown> = new Map();

/**
 * Reduce a request-target to its path component.
 *
 * Handles origin-form (`/a/b?q=1#f`) and absolute-form
 * (`http://host/a/b?q=1`) targets.
 */
export function pathOf(target: string): string {
  let start = 0;
  const schemeEnd = target.indexOf("://");
  if (schemeEnd !== -1 && schemeEnd < target.search(/[/?#]/)) {
    const authority = schemeEnd + 3;
    const authorityEnd = target.slice(authority).search(/[/?#]/);
    if (authorityEnd === -1 || target[authority + authorityEnd] !== "/") {
      return "/";
    }
    start = authority + authorityEnd;
  }

  let end = target.length;
  const query = target.indexOf("?", start);
  if (query !== -1) end = query;
  const fragment = target.indexOf("#", start);
  if (fragment !== -1 && fragment < end) end = fragment;

  return target.slice(start, end);
}

export class ServerRequest {
  readonly method: string;
  /** Request-target: the path plus query string, e.g. `/cats/42?size=s`. */
  readonly target: string;
  /** The fetch Request this was built from, for reading the body. */
  readonly raw: Request | null;
  private readonly attributes: ReadonlyMap<string, unknown>;
  private readonly _headers: Headers;

  constructor(init: Partial<ServerRequestInit> = {}) {
    this.method = (init.method ?? "GET").toUpperCase();
    this.target = init.target ?? "/";
    this._headers = new Headers(init.headers);
    this.raw = init.raw ?? null;
    this.attributes = init.attributes ?? EMPTY_ATTRIBUTES;
  }

  /**
   * A copy of the headers; changing it does not change the request.
   */
  get headers(): Headers {
    return new Headers(this._headers);
  }

  getHeader(name: string): string | null {
    return this._headers.get(name);
  }

  /**
   * Build a ServerRequest from a fetch Request.
   */
  static from(request: Request): ServerRequest {
    const url = new URL(request.url);
    return new ServerRequest({
      method: request.method,
      target: `${url.pathname}${url.search}`,
      headers: request.headers,
      raw: request,
    });
  }

  /**
   * The path component of the target, without query string or fragment.
   */
  getPath(): string {
    return pathOf(this.target);
  }

  getQuery(): URLSearchParams {
    const index = this.target.indexOf("?");
    if (index === -1) return new URLSearchParams();
    const hash = this.target.indexOf("#", index);
    return new URLSearchParams(
      this.target.slice(index + 1, hash === -1 ? undefined : hash),
    );
  }

  getAttribute<T = unknown>(name: string): T | undefined;
  getAttribute<T>(name: string, defaultValue: T): T;
  getAttribute(name: string, defaultValue?: unknown): unknown {
    return this.attributes.has(name)
      ? this.attributes.get(name)
      : defaultValue;
  }

  getAttributes(): Record<string, unknown> {
    return Object.fromEntries(this.attributes);
  }

  withAttribute(name: string, value: unknown): ServerRequest {
    const attributes = new Map(this.attributes);
    attributes.set(name, value);
    return this.copy({ attributes });
  }

  withoutAttribute(name: string): ServerRequest {
    if (!this.attributes.has(name)) return this;
    const attributes = new Map(this.attributes);
    attributes.delete(name);
    return this.copy({ attributes });
  }

  withMethod(method: string): ServerRequest {
    return this.copy({ method });
  }

  withTarget(target: string): ServerRequest {
    return this.copy({ target });
  }

  private copy(changes: Partial<ServerRequestInit>): ServerRequest {
    return new ServerRequest({
      method: this.method,
      target: this.target,
      headers: this._headers,
      raw: this.raw,
      attributes: this.attributes,
      ...changes,
    });
  }
}
