export interface IHttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type HttpGet = (
  url: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> },
) => Promise<IHttpResponse>;

export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'SunburnRiskService/1.0' };

export const createFetchWithTimeout =
  (timeoutMs: number, fetchImpl: HttpGet = fetch): HttpGet =>
  async (url, init = {}) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  };

// Timeout wrapper for clients that take no AbortSignal
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('API request timed out')), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
