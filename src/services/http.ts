import { z } from "zod";

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

/** Network error, timeout, non-2xx status or unexpected body from a provider. */
export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
  ) {
    super(`${provider}: ${message}`);
    this.name = "ProviderError";
  }
}

/** A provider price sent as a number or numeric string; anything not > 0 reads as null. */
export const PriceSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((raw) => {
    const value = typeof raw === "string" ? Number(raw) : raw;
    return value != null && Number.isFinite(value) && value > 0 ? value : null;
  });

export const JsonObjectSchema = z.record(z.string(), z.unknown());

export function parsePrice(raw: unknown): number | null {
  const result = PriceSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export async function fetchJson<T>(
  provider: string,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch,
): Promise<T> {
  let res: Response;
  try {
    res = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    const reason = err instanceof Error && err.name === "TimeoutError" ? `timed out after ${timeoutMs}ms` : String(err);
    throw new ProviderError(provider, reason);
  }

  if (!res.ok) {
    throw new ProviderError(provider, `HTTP ${res.status}`, res.status);
  }

  let raw: unknown;
  try {
    raw = await res.json();
  } catch {
    throw new ProviderError(provider, "malformed JSON response", res.status);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(provider, `unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`, res.status);
  }
  return parsed.data;
}
