import test from "node:test";
import assert from "node:assert/strict";
import { NotFoundError } from "../src/errors.js";
import { LinkManager } from "../src/linkManager.js";
import { memoryStore } from "./helpers.js";

function setup() {
  const store = memoryStore();
  const links = new LinkManager(store);
  const part = store.insertComponent({ identifier: "IRF540", price: 0.8 });
  const transistors = store.createCategory({ name: "TRANSISTORS" });
  const power = store.createCategory({ name: "POWER" });
  return { store, links, part, transistors, power };
}

test("assignCategory links and sets the current category", () => {
  const { store, links, part, transistors } = setup();
  const updated = links.assignCategory(part.id, transistors.id);
  assert.equal(updated.categoryId, transistors.id);
  assert.equal(updated.categoryName, "TRANSISTORS");
  assert.deepEqual(
    links.categoriesFor(part.id).map((c) => c.name),
    ["TRANSISTORS"]
  );
  store.close();
});

test("assigning an existing link is a no-op", () => {
  const { store, links, part, transistors, power } = setup();
  links.assignCategory(part.id, transistors.id);
  links.assignCategory(part.id, power.id);
  const again = links.assignCategory(part.id, transistors.id);
  assert.equal(again.categoryName, "POWER");
  assert.equal(links.categoriesFor(part.id).length, 2);
  store.close();
});

test("assignCategory rejects unknown endpoints without writing", () => {
  const { store, links, part, transistors } = setup();
  assert.throws(() => links.assignCategory(part.id, 999), NotFoundError);
  assert.throws(() => links.assignCategory(999, transistors.id), NotFoundError);
  assert.deepEqual(links.categoriesFor(part.id), []);
  store.close();
});

test("unassigning the current category falls back to the lowest remaining link", () => {
  const { store, links, part, transistors, power } = setup();
  links.assignCategory(part.id, transistors.id);
  links.assignCategory(part.id, power.id);
  const after = links.unassignCategory(part.id, power.id);
  assert.equal(after.categoryName, "TRANSISTORS");
  const cleared = links.unassignCategory(part.id, transistors.id);
  assert.equal(cleared.categoryId, null);
  assert.equal(cleared.categoryName, null);
  assert.equal(links.unassignCategory(part.id, transistors.id).categoryId, null);
  store.close();
});

test("removing a category leaves no link rows and no dangling current category", () => {
  const { store, links, part, transistors, power } = setup();
  const other = store.insertComponent({ identifier: "2N2222", price: 0.1 });
  links.assignCategory(part.id, transistors.id);
  links.assignCategory(part.id, power.id);
  links.assignCategory(other.id, power.id);

  links.removeCategory(power.id);

  assert.deepEqual(links.componentsFor(power.id), []);
  assert.equal(store.findComponent("IRF540")?.categoryName, "TRANSISTORS");
  assert.equal(store.findComponent("2N2222")?.categoryId, null);
  assert.throws(() => links.removeCategory(power.id), NotFoundError);
  store.close();
});

test("removing a component removes its links", () => {
  const { store, links, part, transistors } = setup();
  links.assignCategory(part.id, transistors.id);
  links.removeComponent(part.id);
  assert.deepEqual(links.componentsFor(transistors.id), []);
  assert.throws(() => links.removeComponent(part.id), NotFoundError);
  store.close();
});
