import { UpstreamUnavailableError, describeError, isAbortError } from "@/lib/errors";

export type FetchOptions = RequestInit & { timeoutMs?: number };

export async function fetchWithTimeout(input: RequestInfo | URL, init: FetchOptions = {}) {
  const { timeoutMs = 12000, ...rest } = init;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(input, { ...rest, signal: controller.signal, cache: "no-store" });
  } finally {
    clearTimeout(t);
  }
}

const STATUS_HINTS: Record<number, string> = {
  401: "authentication failed (check the API key)",
  404: "location not found",
  429: "rate limited",
};

/**
 * Single-attempt JSON GET. Every transport failure, timeout or non-2xx status
 * becomes an `UpstreamUnavailableError` tagged with `service`.
 */
export async function fetchJson(
  service: string,
  input: URL,
  { timeoutMs, headers = {} }: { timeoutMs?: number; headers?: Record<string, string> } = {}
): Promise<unknown> {
  let res: Response;
  try {
    res = await fetchWithTimeout(input, { timeoutMs, headers: { Accept: "application/json", ...headers } });
  } catch (e) {
    if (isAbortError(e)) throw new UpstreamUnavailableError(service, "request timed out", { timedOut: true, cause: e });
    throw new UpstreamUnavailableError(service, describeError(e), { cause: e });
  }

  if (!res.ok) {
    const hint = STATUS_HINTS[res.status];
    throw new UpstreamUnavailableError(service, `HTTP ${res.status}${hint ? ` ${hint}` : ""}`);
  }

  try {
    return await res.json();
  } catch (e) {
    throw new UpstreamUnavailableError(service, "response was not JSON", { cause: e });
  }
}
