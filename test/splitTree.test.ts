import { test } from "node:test";
import assert from "node:assert/strict";
import { StopwatchError } from "../src/errors.js";
import { MAX_NAME_BYTES, SplitTree, clipName } from "../src/state/splitTree.js";

test("openSplit appends in insertion order with depths from the parent", () => {
  const tree = new SplitTree();
  const root = tree.openSplit(null, "Outline", 0);
  const child = tree.openSplit(root, "Sources", 2);
  const grandchild = tree.openSplit(child, "Quotes", 3);
  const sibling = tree.openSplit(null, "Draft", 4);

  const splits = tree.allSplits();
  assert.deepEqual(
    splits.map(split => [split.name, split.depth, split.parent]),
    [
      ["Outline", 0, null],
      ["Sources", 1, root],
      ["Quotes", 2, child],
      ["Draft", 0, null]
    ]
  );
  assert.equal(splits[2].id, grandchild);
  assert.equal(splits[3].id, sibling);
  assert.ok(splits.every(split => split.end === null));
});

test("closeSplit records the end without touching children", () => {
  const tree = new SplitTree();
  const parent = tree.openSplit(null, "Parent", 1);
  const child = tree.openSplit(parent, "Child", 2);

  tree.closeSplit(parent, 6);

  assert.equal(tree.get(parent)?.end, 6);
  assert.equal(tree.get(child)?.end, null);
});

test("closeSplit rejects closed, unknown and backwards references", () => {
  const tree = new SplitTree();
  const ref = tree.openSplit(null, "Once", 5);

  assert.throws(() => tree.closeSplit(ref, 4), (error: unknown) => error instanceof StopwatchError && error.code === "InvalidState");
  tree.closeSplit(ref, 7);
  assert.throws(() => tree.closeSplit(ref, 9), (error: unknown) => error instanceof StopwatchError && error.code === "InvalidReference");
  assert.throws(() => tree.closeSplit("missing", 9), (error: unknown) => error instanceof StopwatchError && error.code === "InvalidReference");
  assert.equal(tree.get(ref)?.end, 7);
});

test("openSplit refuses to grow past capacity", () => {
  const tree = new SplitTree({ maxSplits: 2 });
  tree.openSplit(null, "a", 0);
  tree.openSplit(null, "b", 0);

  assert.equal(tree.isFull, true);
  assert.throws(() => tree.openSplit(null, "c", 0), (error: unknown) => error instanceof StopwatchError && error.code === "CapacityExceeded");
  assert.equal(tree.size, 2);
});

test("references stay valid as the tree grows", () => {
  const tree = new SplitTree({ maxSplits: 200 });
  const first = tree.openSplit(null, "first", 0);
  for (let i = 0; i < 150; i += 1) {
    tree.openSplit(null, `filler ${i}`, i);
  }
  assert.equal(tree.get(first)?.name, "first");
  assert.equal(tree.parentOf(first), null);
});

test("allSplits returns copies", () => {
  const tree = new SplitTree();
  const ref = tree.openSplit(null, "Stable", 0);
  const [view] = tree.allSplits();
  view.name = "Changed";
  assert.equal(tree.get(ref)?.name, "Stable");
});

test("clear empties the tree", () => {
  const tree = new SplitTree();
  const ref = tree.openSplit(null, "gone", 0);
  tree.clear();
  assert.equal(tree.size, 0);
  assert.equal(tree.get(ref), undefined);
});

test("clipName flattens line breaks and control characters", () => {
  assert.equal(clipName("first line\n** injected"), "first line ** injected");
  assert.equal(clipName("tab\there\r\nnext\u2028line"), "tab here next line");
  assert.equal(clipName("\n\nOnly\n"), "Only");
});

test("clipName trims and caps at a character boundary", () => {
  assert.equal(clipName("  Review notes \n"), "Review notes");
  assert.equal(clipName("x".repeat(300)).length, MAX_NAME_BYTES);

  const clipped = clipName("é".repeat(200));
  assert.equal(clipped, "é".repeat(127));
  assert.equal(Buffer.byteLength(clipped, "utf-8"), 254);
});
