import { test } from "node:test";
import assert from "node:assert/strict";
import { actionForKey, type KeyState } from "../src/ui/keymap.js";

const idle: KeyState = { status: "idle", activeSplit: null, splitsFull: false };
const running: KeyState = { status: "running", activeSplit: null, splitsFull: false };
const runningWithSplit: KeyState = { status: "running", activeSplit: "split-1", splitsFull: false };

test("s asks for a goal only when a new session starts", () => {
  assert.deepEqual(actionForKey({ name: "s" }, idle), {
    kind: "command",
    command: { action: "start" },
    prompt: "Enter main goal: "
  });
  assert.deepEqual(actionForKey({ name: "s" }, running), { kind: "command", command: { action: "start" } });
});

test("split keys prompt only when the split would open", () => {
  assert.deepEqual(actionForKey({ name: "g" }, running), {
    kind: "command",
    command: { action: "open_split", nested: false },
    prompt: "Enter subgoal name: "
  });
  assert.deepEqual(actionForKey({ name: "g" }, idle), {
    kind: "command",
    command: { action: "open_split", nested: false }
  });
  assert.deepEqual(actionForKey({ name: "n" }, running), {
    kind: "command",
    command: { action: "open_split", nested: true }
  });
  assert.deepEqual(actionForKey({ name: "n" }, runningWithSplit), {
    kind: "command",
    command: { action: "open_split", nested: true },
    prompt: "Enter nested subgoal name: "
  });
});

test("split keys skip the prompt once the tree is full", () => {
  const full: KeyState = { ...runningWithSplit, splitsFull: true };
  assert.deepEqual(actionForKey({ name: "g" }, full), {
    kind: "command",
    command: { action: "open_split", nested: false }
  });
  assert.deepEqual(actionForKey({ name: "n" }, full), {
    kind: "command",
    command: { action: "open_split", nested: true }
  });
});

test("remaining keys map to their commands", () => {
  assert.deepEqual(actionForKey({ name: "r" }, running), { kind: "command", command: { action: "reset" } });
  assert.deepEqual(actionForKey({ name: "h" }, running), { kind: "command", command: { action: "close_split" } });
  assert.deepEqual(actionForKey({ name: "u" }, running), { kind: "command", command: { action: "move_up" } });
  assert.deepEqual(actionForKey({ name: "t" }, idle), { kind: "command", command: { action: "save" } });
  assert.deepEqual(actionForKey({ name: "d" }, idle), { kind: "redraw" });
  assert.deepEqual(actionForKey({ name: "q" }, idle), { kind: "quit" });
  assert.deepEqual(actionForKey({ name: "c", ctrl: true }, running), { kind: "quit" });
});

test("unmapped and control keys are ignored", () => {
  assert.equal(actionForKey({ name: "x" }, running), null);
  assert.equal(actionForKey({ name: "s", ctrl: true }, running), null);
  assert.equal(actionForKey({}, running), null);
});
