import type { Endpoint, ProbeOutcome } from "../probes";
import { maskKey, redactKey } from "../utils/key";

export const ANSI = {
  green: "\u001b[92m",
  red: "\u001b[91m",
  reset: "\u001b[0m",
} as const;

const RULE = "-".repeat(60);
const NAME_WIDTH = 15;
const HTTP_WIDTH = 6;
const RAW_INDENT = " ".repeat(NAME_WIDTH + HTTP_WIDTH + 2);

export interface ReportInput {
  apiKey: string;
  place: string;
  outcomes: ReadonlyMap<Endpoint, ProbeOutcome>;
  /** Colour the HTTP column: green for 2xx, red otherwise */
  color?: boolean;
}

function httpCell(http: number | null, color: boolean): string {
  const cell = String(http ?? "").padEnd(HTTP_WIDTH);
  if (!color || http === null) return cell;
  const tint = http >= 200 && http < 300 ? ANSI.green : ANSI.red;
  return `${tint}${cell}${ANSI.reset}`;
}

export function renderReport({ apiKey, place, outcomes, color = false }: ReportInput): string {
  const lines: string[] = [
    "",
    `Key ${maskKey(apiKey)}  Place "${place}"`,
    RULE,
    `${"API".padEnd(NAME_WIDTH)}${"HTTP".padEnd(HTTP_WIDTH)}  Info`,
    RULE,
  ];

  for (const [endpoint, outcome] of outcomes) {
    const name = endpoint.slice(0, NAME_WIDTH).padEnd(NAME_WIDTH);
    lines.push(`${name}${httpCell(outcome.http, color)}  ${redactKey(outcome.info, apiKey)}`);

    if (outcome.raw === undefined) continue;
    const raw = JSON.stringify(outcome.raw, null, 2) ?? String(outcome.raw);
    for (const line of raw.split("\n")) {
      lines.push(RAW_INDENT + redactKey(line, apiKey));
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}
