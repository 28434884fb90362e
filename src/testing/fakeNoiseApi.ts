/**
 * In-process stand-in for the noise API, installed in place of the global
 * fetch by the tests.
 */

export interface FakeResponse {
  status?: number;
  body: unknown;
}

export interface RecordedRequest {
  url: URL;
  headers: Headers;
}

export type FakeRoute = (url: URL) => FakeResponse | Promise<FakeResponse>;

export const FAKE_BASE_URL = 'https://noise.test/v1';

/**
 * Serves JSON responses from a routing function and records every request
 */
export class FakeNoiseApi {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly route: FakeRoute) {}

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    this.requests.push({ url, headers: new Headers(init?.headers) });

    const { status = 200, body } = await this.route(url);
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  /**
   * Requests whose path matches, in the order they were made
   */
  requestsTo(pathname: string): URL[] {
    return this.requests.map((r) => r.url).filter((url) => url.pathname === pathname);
  }
}

/**
 * Route noise pages by their `page` query parameter; pages past the end are empty
 */
export function pagedMeasurements(pages: unknown[][]): (url: URL) => FakeResponse {
  return (url) => {
    const page = Number(url.searchParams.get('page') ?? '0');
    return { body: { measurements: pages[page] ?? [] } };
  };
}
