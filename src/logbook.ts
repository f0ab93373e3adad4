import { differenceInMilliseconds, format } from "date-fns";
import { StopwatchError } from "./errors.js";
import { formatElapsed } from "./format.js";
import type { LogbookStorage } from "./state/logbookStorage.js";
import type { Split, StopwatchSnapshot } from "./types.js";

const STAMP_FORMAT = "yyyy-MM-dd HH:mm";

export interface LogbookExport {
  written: boolean;
  /** Root block plus one block per closed split. */
  blocks: number;
}

type LogbookSource = Pick<StopwatchSnapshot, "goalName" | "sessionWallClockStart" | "splits">;

/**
 * Renders the session as Org entries. Returns an empty string when there is no
 * goal to file the entries under.
 *
 * The root entry's duration is the wall-clock difference between the two stamps,
 * while split durations come from the monotonic timer. The two can disagree
 * across clock adjustments.
 */
export function renderLogbook(source: LogbookSource, wallClockNow: Date): string {
  if (!source.goalName || !source.sessionWallClockStart) {
    return "";
  }

  const started = source.sessionWallClockStart;
  const total = differenceInMilliseconds(wallClockNow, started) / 1000;
  const lines = [
    ...entry(
      "*",
      source.goalName,
      `[${format(started, STAMP_FORMAT)}]--[${format(wallClockNow, STAMP_FORMAT)}] => ${formatElapsed(total)}`
    )
  ];

  for (const split of closedSplits(source.splits)) {
    lines.push(
      ...entry(
        "*".repeat(split.depth + 2),
        split.name,
        `[${formatElapsed(split.start)}]--[${formatElapsed(split.end)}] => ${formatElapsed(split.end - split.start)}`
      )
    );
  }

  return lines.join("");
}

export async function exportLogbook(
  source: LogbookSource,
  wallClockNow: Date,
  storage: LogbookStorage
): Promise<LogbookExport> {
  const text = renderLogbook(source, wallClockNow);
  if (!text) {
    return { written: false, blocks: 0 };
  }

  try {
    await storage.append(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StopwatchError("ExportIOFailure", `Could not append to the logbook: ${reason}`, { cause: error });
  }

  return { written: true, blocks: 1 + closedSplits(source.splits).length };
}

function closedSplits(splits: readonly Split[]): Array<Split & { end: number }> {
  return splits.filter((split): split is Split & { end: number } => split.end !== null);
}

function entry(stars: string, heading: string, clock: string): string[] {
  return [`${stars} ${heading}\n`, "  :LOGBOOK:\n", `  CLOCK: ${clock}\n`, "  :END:\n\n"];
}
