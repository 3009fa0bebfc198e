/**
 * HTTP utilities for network-backed probes
 */
import got from 'got';
import CircuitBreaker from 'opossum';

export interface HttpResult {
  ok: boolean;
  status: number;
  out: string;
  err?: string;
}

// Circuit breaker configuration
const circuitBreakerOptions = {
  timeout: 10000, // If request takes longer than 10s, trigger a failure
  errorThresholdPercentage: 50, // Open circuit if 50% of requests fail
  resetTimeout: 60000, // Try again after 60s
};

export interface HttpResponse {
  ok: boolean;
  statusCode: number;
  body: string;
}

export type HttpRequest = (url: string, headers: Record<string, string>) => Promise<HttpResponse>;

const makeRequest: HttpRequest = async (url, headers) => {
  const response = await got(url, {
    method: 'GET',
    headers,
    timeout: {
      request: 8000,
    },
    retry: {
      limit: 2,
      methods: ['GET'],
      statusCodes: [408, 413, 429, 500, 502, 503, 504, 521, 522, 524],
    },
    throwHttpErrors: false,
  });

  return {
    ok: response.statusCode >= 200 && response.statusCode < 300,
    statusCode: response.statusCode,
    body: response.body,
  };
};

/**
 * Build a GET function with one circuit breaker per host, so an unreachable
 * host only trips its own breaker.
 */
export function createHttpGet(request: HttpRequest = makeRequest) {
  const breakers = new Map<string, CircuitBreaker<[string, Record<string, string>], HttpResponse>>();

  const breakerFor = (host: string) => {
    let breaker = breakers.get(host);
    if (breaker === undefined) {
      breaker = new CircuitBreaker(request, circuitBreakerOptions);
      breakers.set(host, breaker);
    }
    return breaker;
  };

  return async (url: string, headers: Record<string, string> = {}): Promise<HttpResult> => {
    try {
      const result = await breakerFor(new URL(url).host).fire(url, headers);

      if (result.ok) {
        return { ok: true, status: result.statusCode, out: result.body };
      }
      return { ok: false, status: result.statusCode, out: result.body, err: `HTTP ${String(result.statusCode)}` };
    } catch (error) {
      return {
        ok: false,
        status: 0,
        out: '',
        err: error instanceof Error ? error.message : String(error),
      };
    }
  };
}

/**
 * GET with retries and a per-host circuit breaker. Never throws.
 */
export const httpGet = createHttpGet();
