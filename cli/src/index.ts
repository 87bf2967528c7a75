/**
 * Check a Google Maps Platform API key against the core Maps endpoints.
 *
 * Usage: npm start
 * Prompts for the key and a place (address or "lat,lng"), runs every probe
 * and prints the endpoints that answered. Images and the batch CSV land in
 * output/<sha1(key)[0..8]>/.
 */
import "dotenv/config";
import { describeError } from "@keycheck/clients";
import { checkKey } from "./checks/check-key";
import { renderReport } from "./report/table";
import { getMapsClient } from "./utils/clients";
import { ConfigError, loadConfig, type KeycheckConfig } from "./utils/config";
import { logger } from "./utils/logger";
import { outputDirFor } from "./utils/output";
import { createProgress } from "./utils/progress";
import { askForKeyCheck } from "./utils/prompt";

function readConfig(): KeycheckConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return null;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) return 1;

  const input = await askForKeyCheck();
  if (!input) return 1;
  const { apiKey, place } = input;

  const outputDir = outputDirFor(config.outputRoot, apiKey);
  const progress = createProgress(`Checking ${place}`);

  const { outcomes, results } = await checkKey({
    client: getMapsClient(apiKey, config),
    apiKey,
    place,
    outputDir,
    onProgress: progress.update,
  });
  progress.done();

  logger.info(
    { succeeded: outcomes.size, total: results.length, outputDir },
    "key check complete"
  );
  console.log(renderReport({ apiKey, place, outcomes, color: Boolean(process.stdout.isTTY) }));
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const error = describeError(err);
    logger.error({ error: error.fullMessage }, "key check failed");
    console.error(`Key check failed: ${error.fullMessage}`);
    process.exit(1);
  }
);
