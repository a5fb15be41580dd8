import test from "node:test";
import assert from "node:assert/strict";
import { UsageError, formatComponent, runCommand } from "../src/commands.js";
import { ValidationError } from "../src/errors.js";
import { SqliteComponentStore } from "../src/sqliteStore.js";
import { component } from "./helpers.js";

class TrackedStore extends SqliteComponentStore {
  closed = 0;

  constructor() {
    super(":memory:");
  }

  override close(): void {
    this.closed++;
    super.close();
  }
}

function run(argv: string[], store: TrackedStore): { lines: string[]; done: Promise<void> } {
  const lines: string[] = [];
  const done = runCommand(argv, store, { autoCategorize: false, print: (line) => lines.push(line) });
  return { lines, done };
}

test("missing arguments fail with a usage error and still close the store", async () => {
  const store = new TrackedStore();
  await assert.rejects(run(["link", "C1"], store).done, UsageError);
  assert.equal(store.closed, 1);
});

test("an unknown command fails with a usage error and closes the store", async () => {
  const store = new TrackedStore();
  await assert.rejects(run(["frobnicate"], store).done, (err: unknown) => {
    assert.ok(err instanceof UsageError);
    assert.equal(err.message, "unknown command: frobnicate");
    return true;
  });
  assert.equal(store.closed, 1);
});

test("a non-integer stock delta is rejected and the store is closed", async () => {
  const store = new TrackedStore();
  store.insertComponent({ identifier: "C1", price: 0.1 });
  await assert.rejects(run(["stock", "C1", "1.5"], store).done, ValidationError);
  assert.equal(store.closed, 1);
});

test("seed reports the standard categories it created", async () => {
  const store = new TrackedStore();
  const { lines, done } = run(["seed"], store);
  await done;
  assert.deepEqual(lines, ["Created 6 standard categories"]);
  assert.equal(store.closed, 1);
});

test("link prints the component with its new current category", async () => {
  const store = new TrackedStore();
  store.insertComponent({ identifier: "C1", price: 0.1 });
  store.createCategory({ name: "CAPACITOR" });
  const { lines, done } = run(["link", "C1", "CAPACITOR"], store);
  await done;
  assert.deepEqual(lines, [
    formatComponent(component({ id: 1, identifier: "C1", price: 0.1, categoryId: 1, categoryName: "CAPACITOR" })),
  ]);
});
