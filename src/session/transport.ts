/**
 * HTTP capability the session talks through. Anything that can GET with query
 * parameters and POST a form will do; FetchTransport is the default.
 */

export interface HttpResponse {
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
  /** Release an unread body. Transports without a streamed body can omit it. */
  discard?(): Promise<void>;
}

export interface GetOptions {
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface PostOptions {
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface Transport {
  get(url: string, options?: GetOptions): Promise<HttpResponse>;
  post(url: string, options?: PostOptions): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  userAgent?: string;
  timeoutMs?: number;
}

function toHttpResponse(res: Response): HttpResponse {
  return {
    status: res.status,
    text: () => res.text(),
    json: async (): Promise<unknown> => res.json(),
    discard: async () => {
      await res.body?.cancel();
    },
  };
}

export class FetchTransport implements Transport {
  constructor(private readonly options: FetchTransportOptions = {}) {}

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return this.options.userAgent ? { "User-Agent": this.options.userAgent, ...extra } : { ...extra };
  }

  private signal(): AbortSignal | undefined {
    return this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined;
  }

  async get(url: string, options: GetOptions = {}): Promise<HttpResponse> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      target.searchParams.set(key, value);
    }

    const res = await fetch(target.toString(), {
      headers: this.headers(options.headers),
      signal: this.signal(),
    });
    return toHttpResponse(res);
  }

  async post(url: string, options: PostOptions = {}): Promise<HttpResponse> {
    const res = await fetch(url, {
      method: "POST",
      headers: this.headers({ "Content-Type": "application/x-www-form-urlencoded", ...options.headers }),
      body: new URLSearchParams(options.form ?? {}).toString(),
      signal: this.signal(),
    });
    return toHttpResponse(res);
  }
}
