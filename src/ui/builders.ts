import { formatElapsed, formatMissing } from "../format.js";
import type { SplitView, StopwatchSnapshot } from "../types.js";

export const TITLE = "=== Splitwatch ===";
export const CONTROLS =
  "Controls: s=start/stop | r=reset | g=split | n=nested split | h=close split | u=up | d=redraw | t=save log | q=quit";

/** Screen row of the running time line. */
export const TIME_ROW = 2;
const FIRST_SPLIT_ROW = 4;

export interface ScreenInput {
  snapshot: StopwatchSnapshot;
  /** Time spent in the active split, shown in place of its missing duration. */
  activeElapsed?: number | null;
  statusLine?: string;
}

export function buildScreen(input: ScreenInput): string[] {
  const { snapshot, activeElapsed = null, statusLine = "" } = input;
  const lines = [
    TITLE,
    `Goal  : ${snapshot.goalName || "(none)"}`,
    buildTimeLine(snapshot.elapsedSeconds),
    `Splits (${snapshot.splits.length}):`
  ];

  snapshot.splits.forEach((split, index) => {
    const live = split.id === snapshot.activeSplit ? activeElapsed : null;
    lines.push(buildSplitLine(split, index, live));
  });

  lines.push("", CONTROLS, buildStatusLine(snapshot, statusLine));
  return lines;
}

export function buildTimeLine(seconds: number): string {
  return `Time  : ${formatElapsed(seconds)}`;
}

export function splitRow(index: number): number {
  return FIRST_SPLIT_ROW + index;
}

export function buildSplitLine(split: SplitView, index: number, liveSeconds: number | null = null): string {
  const indent = "  ".repeat(split.depth);
  const number = String(index + 1).padStart(2, " ");
  const start = formatElapsed(split.start);

  if (split.end !== null) {
    return `${indent}${number}) ${start} -> ${formatElapsed(split.end)} = ${formatElapsed(split.end - split.start)}  ${split.name}`;
  }

  const duration = liveSeconds === null ? formatMissing() : formatElapsed(liveSeconds);
  const marker = liveSeconds === null ? "" : " *";
  return `${indent}${number}) ${start} -> ${formatMissing()} = ${duration}  ${split.name}${marker}`;
}

function buildStatusLine(snapshot: StopwatchSnapshot, message: string): string {
  const state = snapshot.status.toUpperCase();
  return message ? `[${state}] ${message}` : `[${state}]`;
}
