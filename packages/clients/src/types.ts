export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | boolean>;

/** Result of a JSON request. `status` is null when the request never produced a usable response. */
export interface JsonResponse {
  status: number | null;
  /** Parsed body, or `{}` on transport failure */
  data: unknown;
  /** Response headers, lower-cased names */
  headers: Record<string, string>;
}

/** Result of a binary request. `bytes` is empty on transport failure. */
export interface BinaryResponse {
  status: number | null;
  bytes: Uint8Array;
  headers: Record<string, string>;
}

/** Subset of the pino logger API the clients write to. */
export interface HttpLogger {
  debug(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}
