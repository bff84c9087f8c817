import type { z } from "zod";

import { fail, ok, type Result } from "@/lib/result";

export type RequestOptions = {
  userAgent: string;
  timeoutMs: number;
  accept?: string;
};

async function request(
  url: string,
  options: RequestOptions,
): Promise<Result<Response>> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        Accept: options.accept ?? "application/json",
        "User-Agent": options.userAgent,
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("fetch-error", `${url}: ${message}`);
  }

  if (response.status === 404) {
    return fail("not-found", `${url} returned 404`);
  }

  if (!response.ok) {
    return fail(
      "fetch-error",
      `${url} returned ${response.status} ${response.statusText}`,
    );
  }

  return ok(response);
}

export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions,
): Promise<Result<T>> {
  const response = await request(url, options);
  if (!response.ok) return response;

  let body: unknown;
  try {
    body = await response.value.json();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("invalid-response", `${url}: body is not JSON (${message})`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return fail("invalid-response", `${url}: ${parsed.error.message}`);
  }

  return ok(parsed.data);
}

export async function fetchText(
  url: string,
  options: RequestOptions,
): Promise<Result<string>> {
  const response = await request(url, options);
  if (!response.ok) return response;

  try {
    return ok(await response.value.text());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("fetch-error", `${url}: ${message}`);
  }
}
