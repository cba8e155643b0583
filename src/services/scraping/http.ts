import axios, { AxiosInstance } from 'axios';
import { FetchError, errorMessage } from '../../errors';

export const USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:128.0) Gecko/20100101 Firefox/128.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
];

export const http: AxiosInstance = axios.create({
  timeout: 15000,
  responseType: 'text',
  headers: {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'no-cache',
    'Pragma': 'no-cache',
    'Upgrade-Insecure-Requests': '1',
  },
  validateStatus: (s) => !!s && s >= 200 && s < 400,
});

/** Chooses the user agent and the pause before each request. */
export interface FetchPolicy {
  userAgent(): string;
  delayMs(): number;
}

export function randomPolicy(
  window: { minMs: number; maxMs: number },
  agents: readonly string[] = USER_AGENTS,
  random: () => number = Math.random,
): FetchPolicy {
  const lo = Math.min(window.minMs, window.maxMs);
  const hi = Math.max(window.minMs, window.maxMs);
  return {
    userAgent: () => agents[Math.floor(random() * agents.length) % agents.length],
    delayMs: () => Math.round(lo + random() * (hi - lo)),
  };
}

export function fixedPolicy(userAgent: string = USER_AGENTS[0]): FetchPolicy {
  return { userAgent: () => userAgent, delayMs: () => 0 };
}

export interface HttpResponse {
  status: number;
  body: string;
  url: string;
}

export type HttpGet = (url: string, opts: { headers: Record<string, string>; timeoutMs: number }) => Promise<HttpResponse>;

function originOf(url: string): string | null {
  try { return new URL(url).origin; } catch { return null; }
}

/** GET a page as text. Non-2xx/3xx statuses, timeouts and network errors raise FetchError. */
export const getText: HttpGet = async (url, { headers, timeoutMs }) => {
  const referer = originOf(url);
  try {
    const resp = await http.get<string>(url, {
      timeout: timeoutMs,
      headers: { ...(referer ? { Referer: referer } : {}), ...headers },
    });
    const body = typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data);
    const finalUrl = resp.request?.res?.responseUrl;
    return { status: resp.status, body, url: typeof finalUrl === 'string' ? finalUrl : url };
  } catch (err) {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      if (status) throw new FetchError(url, `HTTP ${status} for ${url}`, { status, cause: err });
      const isTimeout = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || /timeout/i.test(err.message);
      throw new FetchError(url, isTimeout ? `Timed out after ${timeoutMs}ms fetching ${url}` : `Request to ${url} failed: ${err.message}`, { cause: err });
    }
    throw new FetchError(url, `Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
  }
};
