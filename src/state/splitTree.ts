import { v4 as uuid } from "uuid";
import { StopwatchError } from "../errors.js";
import type { Split, SplitRef } from "../types.js";

interface SplitTreeOptions {
  maxSplits?: number;
}

export const DEFAULT_MAX_SPLITS = 50;
export const MAX_NAME_BYTES = 255;

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f\u2028\u2029]+/g;

export class SplitTree {
  private readonly order: SplitRef[] = [];
  private readonly splits = new Map<SplitRef, Split>();
  readonly maxSplits: number;

  constructor(options: SplitTreeOptions = {}) {
    this.maxSplits = options.maxSplits ?? DEFAULT_MAX_SPLITS;
  }

  get size(): number {
    return this.order.length;
  }

  get isFull(): boolean {
    return this.order.length >= this.maxSplits;
  }

  openSplit(parentRef: SplitRef | null, name: string, atElapsed: number): SplitRef {
    if (this.isFull) {
      throw new StopwatchError("CapacityExceeded", `Only ${this.maxSplits} splits fit in one session.`);
    }

    const parent = parentRef === null ? null : this.requireSplit(parentRef);
    const id = uuid();
    const split: Split = {
      id,
      name: clipName(name),
      start: atElapsed,
      end: null,
      parent: parent ? parent.id : null,
      depth: parent ? parent.depth + 1 : 0
    };

    this.splits.set(id, split);
    this.order.push(id);
    return id;
  }

  closeSplit(ref: SplitRef, atElapsed: number): void {
    const split = this.requireSplit(ref);
    if (split.end !== null) {
      throw new StopwatchError("InvalidReference", `Split "${split.name}" is already closed.`);
    }
    if (atElapsed < split.start) {
      throw new StopwatchError("InvalidState", `Split "${split.name}" cannot close before it opened.`);
    }

    this.splits.set(ref, { ...split, end: atElapsed });
  }

  parentOf(ref: SplitRef): SplitRef | null {
    return this.requireSplit(ref).parent;
  }

  get(ref: SplitRef): Split | undefined {
    const split = this.splits.get(ref);
    return split ? { ...split } : undefined;
  }

  allSplits(): readonly Split[] {
    return this.order.map(id => ({ ...this.requireSplit(id) }));
  }

  clear(): void {
    this.order.length = 0;
    this.splits.clear();
  }

  private requireSplit(ref: SplitRef): Split {
    const split = this.splits.get(ref);
    if (!split) {
      throw new StopwatchError("InvalidReference", "Split not found.");
    }
    return split;
  }
}

/**
 * Flattens a name onto one line, trims it and cuts it to {@link MAX_NAME_BYTES}
 * UTF-8 bytes without splitting a character. A name is an Org heading, so line
 * breaks and other control characters become spaces.
 */
export function clipName(input: string): string {
  const trimmed = input.replace(CONTROL_CHARS, " ").trim();
  if (Buffer.byteLength(trimmed, "utf-8") <= MAX_NAME_BYTES) {
    return trimmed;
  }

  let bytes = 0;
  let clipped = "";
  for (const char of trimmed) {
    bytes += Buffer.byteLength(char, "utf-8");
    if (bytes > MAX_NAME_BYTES) {
      break;
    }
    clipped += char;
  }
  return clipped;
}
