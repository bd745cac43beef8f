import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';

export interface DownloadOptions {
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
  userAgent: string;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface DownloadedReport {
  data: Uint8Array;
  contentType: string;
  attempts: number;
}

export class DownloadError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly attempts: number
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

function requestHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'application/pdf,text/html;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Cache-Control': 'max-age=0',
  };
}

function looksLikePdf(contentType: string): boolean {
  return contentType.includes('pdf') || contentType.includes('application/octet-stream');
}

async function attemptDownload(
  url: string,
  options: DownloadOptions
): Promise<{ data: Uint8Array; contentType: string }> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const res = await fetchImpl(url, {
    headers: requestHeaders(options.userAgent),
    redirect: 'follow',
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  if (!res.ok) {
    throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
  }
  const contentType = (res.headers.get('content-type') ?? '').toLowerCase();
  return { data: new Uint8Array(await res.arrayBuffer()), contentType };
}

/**
 * Downloads the report, retrying failed attempts. A response that does not
 * look like a PDF is still returned.
 */
export async function downloadReport(
  url: string,
  options: DownloadOptions
): Promise<DownloadedReport> {
  const log = options.logger;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxRetries = Math.max(1, options.maxRetries);
  let lastError = 'no attempts made';

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    log?.info({ url, attempt, maxRetries }, 'Downloading report');
    try {
      const { data, contentType } = await attemptDownload(url, options);
      if (!looksLikePdf(contentType)) {
        log?.warn({ contentType }, 'Response may not be a PDF');
      }
      log?.info({ bytes: data.byteLength }, 'Download complete');
      return { data, contentType, attempts: attempt };
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
      log?.error({ attempt, err: lastError }, 'Download attempt failed');
      if (attempt < maxRetries) {
        log?.info({ retryDelayMs: options.retryDelayMs }, 'Retrying download');
        await sleep(options.retryDelayMs);
      }
    }
  }

  throw new DownloadError(
    `Failed to download ${url} after ${maxRetries} attempt(s): ${lastError}`,
    url,
    maxRetries
  );
}
