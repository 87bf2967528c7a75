import type { MapsClient } from "@keycheck/clients";
import { describeError } from "@keycheck/clients";
import { logger } from "../utils/logger";
import type { ProgressEvent } from "../utils/progress";
import {
  PROBES,
  type Endpoint,
  type Prerequisite,
  type Probe,
  type ProbeAttempt,
  type ProbeDeps,
  type ProbeOutcome,
  type ProbeResult,
  type RunContext,
} from "../probes";

const log = logger.child({ component: "check-key" });

export interface CheckKeyOptions {
  client: MapsClient;
  apiKey: string;
  place: string;
  /** Per-key artifact directory */
  outputDir: string;
  now?: () => Date;
  onProgress?: (event: ProgressEvent) => void;
  /** Defaults to the full endpoint list */
  probes?: readonly Probe[];
}

export interface CheckKeyResult {
  /** Succeeded probes only, in declared order */
  outcomes: Map<Endpoint, ProbeOutcome>;
  /** Every probe, including skipped and empty ones */
  results: ProbeResult[];
  context: RunContext;
}

function missingPrerequisites(ctx: RunContext, requires: readonly Prerequisite[]): Prerequisite[] {
  return requires.filter((name) => ctx[name] === undefined);
}

async function attempt(probe: Probe, deps: ProbeDeps, ctx: RunContext): Promise<ProbeAttempt> {
  try {
    return await probe.run(deps, ctx);
  } catch (err) {
    const error = describeError(err);
    log.error({ endpoint: probe.endpoint, error: error.fullMessage }, "probe threw");
    return { status: "no-data", http: null, reason: error.message };
  }
}

/**
 * Run every probe in order against one key and place. Probes that need
 * geocoded coordinates or a place id are skipped when geocode did not
 * produce them.
 */
export async function checkKey(options: CheckKeyOptions): Promise<CheckKeyResult> {
  const probes = options.probes ?? PROBES;
  const deps: ProbeDeps = {
    client: options.client,
    outputDir: options.outputDir,
    now: options.now ?? (() => new Date()),
  };

  let context: RunContext = { apiKey: options.apiKey, place: options.place };
  const outcomes = new Map<Endpoint, ProbeOutcome>();
  const results: ProbeResult[] = [];

  for (const [index, probe] of probes.entries()) {
    const { endpoint } = probe;
    options.onProgress?.({ endpoint, index, total: probes.length });

    const missing = missingPrerequisites(context, probe.requires);
    if (missing.length > 0) {
      log.debug({ endpoint, missing }, "probe skipped");
      results.push({ status: "not-attempted", endpoint, missing });
      continue;
    }

    const result = await attempt(probe, deps, context);

    if (result.status === "no-data") {
      log.debug({ endpoint, http: result.http, reason: result.reason }, "probe returned no data");
      results.push({ status: "no-data", endpoint, http: result.http, reason: result.reason });
      continue;
    }

    log.debug({ endpoint, http: result.outcome.http, info: result.outcome.info }, "probe succeeded");
    outcomes.set(endpoint, result.outcome);
    results.push({ status: "succeeded", endpoint, outcome: result.outcome });
    if (result.derived) {
      context = { ...context, ...result.derived };
    }
  }

  return { outcomes, results, context };
}
