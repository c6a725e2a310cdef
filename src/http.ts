import type { z } from "zod";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly url: string,
  ) {
    super(`${status} ${statusText}`.trim());
    this.name = "HttpStatusError";
  }
}

export type FetchJsonOptions = {
  init?: RequestInit;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

/**
 * GETs `url` with an abort timeout and validates the JSON body against
 * `schema`. Non-2xx responses throw HttpStatusError.
 */
export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  { init, timeoutMs = 30_000, fetchImpl = fetch }: FetchJsonOptions = {},
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  const headers = new Headers(init?.headers);
  if (!headers.has("accept")) headers.set("accept", "application/json");

  try {
    const response = await fetchImpl(url, {
      ...init,
      signal: controller.signal,
      headers,
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText, url);
    }

    return schema.parse(await response.json());
  } finally {
    clearTimeout(timeout);
  }
}
