import { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  authorization?: string;
  body?: unknown;
}

export interface FakeReply {
  status: number;
  data?: unknown;
}

type Handler = (request: RecordedRequest) => FakeReply;

/**
 * In-process stand-in for the provider API and provider pages.
 * Routes are keyed by "METHOD absolute-url"; unknown routes answer 404.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Handler>();

  on(method: string, url: string, reply: FakeReply | Handler): this {
    this.routes.set(`${method.toUpperCase()} ${url}`, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  calls(method: string, url: string): RecordedRequest[] {
    return this.requests.filter(
      (request) => request.method === method.toUpperCase() && request.url === url,
    );
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = `${config.baseURL ?? ''}${config.url ?? ''}`;
    const authorization = config.headers.get('Authorization');
    const request: RecordedRequest = {
      method,
      url,
      authorization: typeof authorization === 'string' ? authorization : undefined,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    };
    this.requests.push(request);

    const handler = this.routes.get(`${method} ${url}`);
    const reply = handler ? handler(request) : { status: 404, data: 'Not Found' };
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
      request: {},
    };
  };
}

export const API_BASE = 'http://api.test';

export function page(priceHtml: string): string {
  return `<html><body><h1>Fyringsolie</h1>${priceHtml}</body></html>`;
}

/**
 * Read a string property from a recorded request body
 */
export function stringField(body: unknown, key: string): string {
  const value: unknown = body && typeof body === 'object' ? Reflect.get(body, key) : undefined;
  if (typeof value !== 'string') {
    throw new Error(`Expected string field ${key} in ${JSON.stringify(body)}`);
  }
  return value;
}
