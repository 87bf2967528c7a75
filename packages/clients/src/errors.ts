export interface ErrorDescription {
  message: string;
  type: string;
  cause: string | undefined;
  /** e.g. "fetch failed → [Error] getaddrinfo ENOTFOUND maps.googleapis.com" */
  fullMessage: string;
  timedOut: boolean;
}

/**
 * Describe a transport error, including the full cause chain.
 * Node's fetch wraps the real failure (DNS, ECONNREFUSED, TLS) in `cause`,
 * and AbortSignal.timeout rejects with a DOMException named "TimeoutError".
 */
export function describeError(err: unknown): ErrorDescription {
  if (!(err instanceof Error)) {
    const msg = String(err);
    return { message: msg, type: typeof err, cause: undefined, fullMessage: msg, timedOut: false };
  }

  const chain = unwrapCauses(err);
  const cause = chain.length > 0 ? chain.join(" → ") : undefined;

  return {
    message: err.message,
    type: err.name || err.constructor.name,
    cause,
    fullMessage: cause ? `${err.message} → ${cause}` : err.message,
    timedOut: err.name === "TimeoutError" || err.name === "AbortError",
  };
}

function unwrapCauses(err: Error): string[] {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err.cause;

  while (current && !seen.has(current)) {
    seen.add(current);
    if (!(current instanceof Error)) {
      parts.push(String(current));
      break;
    }
    parts.push(`[${current.name}] ${current.message}`);
    current = current.cause;
  }

  return parts;
}
