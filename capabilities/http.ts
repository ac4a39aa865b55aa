import type { CapabilityResult } from "../orchestrator/capabilities";
import { errorMessage } from "../orchestrator/errors";
import type { Validator } from "../src";

export type FetchFn = typeof fetch;

export interface HttpOptions {
  fetch?: FetchFn;
}

/**
 * Perform a request and validate the JSON body. Transport errors, non-2xx
 * statuses and payloads the validator rejects all become `ok: false`.
 */
export async function requestJson<T>(
  service: string,
  url: string,
  init: RequestInit,
  validator: Validator<T>,
  fetchFn: FetchFn = fetch,
): Promise<CapabilityResult<T>> {
  try {
    const res = await fetchFn(url, init);
    if (!res.ok) {
      const body = await res.text();
      return { ok: false, error: `${service} error: ${res.status} - ${body.slice(0, 200)}` };
    }
    return { ok: true, data: validator.parse(await res.json()) };
  } catch (err) {
    return { ok: false, error: `${service} request failed: ${errorMessage(err)}` };
  }
}

export function missingKey(service: string): CapabilityResult<never> {
  return { ok: false, error: `${service} API key is not configured` };
}
