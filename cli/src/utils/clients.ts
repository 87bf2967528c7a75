import { createHttpClient, createMapsClient } from "@keycheck/clients";
import type { KeycheckConfig } from "./config";
import { logger } from "./logger";

export function getMapsClient(apiKey: string, config: KeycheckConfig) {
  const http = createHttpClient({
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    backoffMs: config.backoffMs,
    proxyUrl: config.proxyUrl,
    logger: logger.child({ component: "http" }),
  });
  return createMapsClient({ apiKey, http });
}
