import { config } from '../config';

const DEFAULT_RATE_LIMIT_WAIT_MS = 4000;
const MIN_RATE_LIMIT_WAIT_MS = 2000;
const MAX_RATE_LIMIT_WAIT_MS = 12000;

const USER_AGENT = 'pitch-similarity/1.0';

export interface ApiFetchOptions {
  timeoutMs?: number;
  /** Attempts in total, counting the first; only 429 responses are retried */
  maxAttempts?: number;
}

function clampWaitMs(waitMs: number): number {
  if (!Number.isFinite(waitMs)) return DEFAULT_RATE_LIMIT_WAIT_MS;
  return Math.min(Math.max(waitMs, MIN_RATE_LIMIT_WAIT_MS), MAX_RATE_LIMIT_WAIT_MS);
}

function getRetryAfterMs(response: Response): number | null {
  const header = response.headers.get('retry-after');
  if (!header) return null;
  const seconds = Number.parseInt(header, 10);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }
  const dateMs = Date.parse(header);
  if (Number.isFinite(dateMs)) {
    return dateMs - Date.now();
  }
  return null;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type ResponseReader<T> = (response: Response) => Promise<T>;

type AttemptOutcome<T> = { done: true; value: T } | { done: false; retryAfterMs: number | null };

/**
 * Runs one request and its body read under a single abort timer, so a body
 * that stalls after the headers arrive still times out.
 */
async function attemptWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  retryOn429: boolean,
  read: ResponseReader<T>
): Promise<AttemptOutcome<T>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    if (response.status === 429 && retryOn429) {
      return { done: false, retryAfterMs: getRetryAfterMs(response) };
    }
    return { done: true, value: await read(response) };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeoutMs}ms: ${url}`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * fetch with a timeout and bounded retries on HTTP 429. `read` consumes the
 * response inside the timeout; it sees any non-429 status as is, and the last
 * 429 once attempts run out.
 */
export async function apiFetch<T>(
  url: string,
  read: ResponseReader<T>,
  init: RequestInit = {},
  options: ApiFetchOptions = {}
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? config.httpTimeoutMs;
  const maxAttempts = options.maxAttempts ?? config.httpMaxAttempts;
  const headers = new Headers(init.headers);
  if (!headers.has('user-agent')) headers.set('user-agent', USER_AGENT);

  let attempt = 0;
  while (true) {
    attempt += 1;
    const outcome = await attemptWithTimeout(url, { ...init, headers }, timeoutMs, attempt < maxAttempts, read);
    if (outcome.done) {
      return outcome.value;
    }

    const waitMs = clampWaitMs(outcome.retryAfterMs ?? DEFAULT_RATE_LIMIT_WAIT_MS);
    console.warn(`⏳ Rate limited by ${new URL(url).host}, retrying in ${Math.round(waitMs / 1000)}s (${attempt}/${maxAttempts})`);
    await delay(waitMs);
  }
}

function assertOk(response: Response, url: string): void {
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText} from ${url}`);
  }
}

/**
 * Body text of a successful response. Strips a UTF-8 BOM.
 */
export async function fetchText(url: string, options: ApiFetchOptions = {}): Promise<string> {
  return apiFetch(
    url,
    async (response) => {
      assertOk(response, url);
      const text = await response.text();
      return text.startsWith('\uFEFF') ? text.slice(1) : text;
    },
    {},
    options
  );
}

export async function fetchJson(url: string, options: ApiFetchOptions = {}): Promise<unknown> {
  return apiFetch(
    url,
    async (response): Promise<unknown> => {
      assertOk(response, url);
      const body: unknown = await response.json();
      return body;
    },
    { headers: { accept: 'application/json' } },
    options
  );
}
