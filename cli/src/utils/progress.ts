export interface ProgressEvent {
  endpoint: string;
  /** 0-based position in the probe list */
  index: number;
  total: number;
}

export interface ProgressStream {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
}

const BAR_WIDTH = 20;

export function renderProgressLine(label: string, event: ProgressEvent): string {
  const done = event.index + 1;
  const filled = Math.round((done / event.total) * BAR_WIDTH);
  const bar = "#".repeat(filled) + "-".repeat(BAR_WIDTH - filled);
  return `${label}: [${bar}] ${done}/${event.total} ${event.endpoint}`;
}

/**
 * Single-line progress bar that rewrites itself in place and is cleared on
 * `done()`. Does nothing when the stream is not a terminal.
 */
export function createProgress(label: string, stream: ProgressStream = process.stderr) {
  const enabled = Boolean(stream.isTTY);
  let lastWidth = 0;

  function update(event: ProgressEvent): void {
    if (!enabled) return;
    let line = renderProgressLine(label, event);
    if (stream.columns && line.length >= stream.columns) {
      line = line.slice(0, stream.columns - 1);
    }
    stream.write(`\r${line.padEnd(lastWidth)}`);
    lastWidth = line.length;
  }

  function done(): void {
    if (!enabled || lastWidth === 0) return;
    stream.write(`\r${" ".repeat(lastWidth)}\r`);
    lastWidth = 0;
  }

  return { update, done };
}

export type Progress = ReturnType<typeof createProgress>;
