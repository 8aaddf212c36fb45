import { FetchError } from "./errors.js";
import type { DocumentFetcher, FetchOutcome, FetchParams } from "./types.js";

export const ENTITY_STATEMENT_CONTENT_TYPE = "application/entity-statement+jwt";

const FETCH_TIMEOUT = "federation_fetch_timeout";

export type HttpFetcherOptions = {
  fetchImpl?: typeof fetch;
};

// Undefined once the body passes `maxBytes`; reading stops there.
const readBody = async (response: Response, maxBytes?: number): Promise<string | undefined> => {
  if (!maxBytes) {
    return response.text();
  }
  const declared = Number(response.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > maxBytes) {
    await response.body?.cancel();
    return undefined;
  }
  if (!response.body) {
    return "";
  }
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      return undefined;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString("utf8");
};

export const createHttpFetcher = (options: HttpFetcherOptions = {}): DocumentFetcher => {
  const fetchImpl = options.fetchImpl ?? fetch;

  const fetchOne = async (url: string, params: FetchParams, signal: AbortSignal): Promise<FetchOutcome> => {
    try {
      const response = await fetchImpl(url, {
        method: "GET",
        headers: { accept: ENTITY_STATEMENT_CONTENT_TYPE },
        signal
      });
      if (!response.ok) {
        return {
          url,
          ok: false,
          error: new FetchError(url, {
            status: response.status,
            message: `${url} answered ${response.status}`
          })
        };
      }
      const body = await readBody(response, params.maxResponseBytes);
      if (body === undefined) {
        return {
          url,
          ok: false,
          error: new FetchError(url, {
            message: `${url} returned more than ${params.maxResponseBytes} bytes`
          })
        };
      }
      return { url, ok: true, body };
    } catch (error) {
      if (signal.aborted && signal.reason === FETCH_TIMEOUT) {
        return { url, ok: false, error: new FetchError(url, { timeout: true, cause: error }) };
      }
      return { url, ok: false, error: new FetchError(url, { cause: error }) };
    }
  };

  return {
    fetch: async (urls, params) => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(FETCH_TIMEOUT), params.timeoutMs);
      timeout.unref?.();
      const cancel = () => controller.abort(params.signal?.reason);
      if (params.signal?.aborted) {
        cancel();
      } else {
        params.signal?.addEventListener("abort", cancel, { once: true });
      }
      try {
        return await Promise.all(urls.map((url) => fetchOne(url, params, controller.signal)));
      } finally {
        clearTimeout(timeout);
        params.signal?.removeEventListener("abort", cancel);
      }
    }
  };
};
