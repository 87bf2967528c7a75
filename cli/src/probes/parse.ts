import type { z } from "zod";
import type { JsonResponse } from "@keycheck/clients";
import { noData, type ProbeAttempt } from "./types";

export type Parsed<T> = { ok: true; data: T } | { ok: false; attempt: ProbeAttempt };

/** Read the fields a probe needs. A transport failure or shape mismatch is a soft failure. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, res: JsonResponse): Parsed<z.infer<S>> {
  if (res.status === null) {
    return { ok: false, attempt: noData(null, "request failed") };
  }
  const parsed = schema.safeParse(res.data);
  if (!parsed.success) {
    return { ok: false, attempt: noData(res.status, "unexpected response shape") };
  }
  return { ok: true, data: parsed.data };
}
