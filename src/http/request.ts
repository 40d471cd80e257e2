import { err, ok, type Result } from '../result.js';

const USER_AGENT = 'property-distress-tracker/0.1 (+records refresh)';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type RequestErrorKind = 'timeout' | 'network' | 'http_status';

export interface RequestError {
  kind: RequestErrorKind;
  url: string;
  message: string;
  status?: number;
}

export interface RequestOptions {
  timeoutMs: number;
  retries?: number;
  accept?: string;
  fetchImpl?: FetchLike;
}

export interface FetchedDocument {
  url: string;
  contentType: string;
  body: Buffer;
}

/**
 * GET with a hard timeout per attempt. Failures come back as values; nothing
 * here throws for transport or status problems.
 */
export async function requestDocument(
  url: string,
  options: RequestOptions,
): Promise<Result<FetchedDocument, RequestError>> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const attempts = Math.max(1, 1 + (options.retries ?? 0));
  let lastError: RequestError = { kind: 'network', url, message: 'no attempt made' };

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method: 'GET',
        headers: {
          'user-agent': USER_AGENT,
          accept: options.accept ?? 'text/html, text/plain, application/pdf, */*',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        lastError = { kind: 'http_status', url, status: response.status, message: `HTTP ${response.status}` };
        continue;
      }

      const body = Buffer.from(await response.arrayBuffer());
      return ok({
        url: response.url || url,
        contentType: response.headers.get('content-type') ?? '',
        body,
      });
    } catch (error) {
      const aborted = controller.signal.aborted;
      lastError = {
        kind: aborted ? 'timeout' : 'network',
        url,
        message: aborted ? `timed out after ${options.timeoutMs}ms` : describeError(error),
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  return err(lastError);
}

export async function requestText(url: string, options: RequestOptions): Promise<Result<string, RequestError>> {
  const result = await requestDocument(url, options);
  if (!result.ok) {
    return result;
  }
  return ok(result.value.body.toString('utf8'));
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
