import test from "node:test";
import assert from "node:assert/strict";
import { CatalogService } from "../src/catalog.js";
import { STANDARD_CATEGORIES } from "../src/category.js";
import { DuplicateNameError, NotFoundError, ValidationError } from "../src/errors.js";
import { memoryStore } from "./helpers.js";

function setup() {
  const store = memoryStore();
  return { store, catalog: new CatalogService(store) };
}

test("addComponent trims input and defaults price and quantity", () => {
  const { store, catalog } = setup();
  const c = catalog.addComponent({ identifier: "  LM7805 ", description: "  " });
  assert.equal(c.identifier, "LM7805");
  assert.equal(c.price, 0);
  assert.equal(c.quantity, 0);
  assert.equal(c.description, null);
  store.close();
});

test("addComponent rejects an empty identifier before touching the store", () => {
  const { store, catalog } = setup();
  assert.throws(
    () => catalog.addComponent({ identifier: "   ", price: "1" }),
    (err: unknown) => err instanceof ValidationError && err.issues[0].code === "E_IDENTIFIER_MISSING"
  );
  assert.equal(store.listComponents().length, 0);
  store.close();
});

test("addComponent rejects negative prices and fractional quantities", () => {
  const { store, catalog } = setup();
  assert.throws(() => catalog.addComponent({ identifier: "X", price: "-2" }), ValidationError);
  assert.throws(() => catalog.addComponent({ identifier: "X", price: "2", quantity: "1.5" }), ValidationError);
  store.close();
});

test("addComponent can link a category by name in the same step", () => {
  const { store, catalog } = setup();
  catalog.addCategory({ name: "DIODE" });
  const c = catalog.addComponent({ identifier: "1N4007", price: 0.05, category: "DIODE" });
  assert.equal(c.categoryName, "DIODE");
  assert.throws(() => catalog.addComponent({ identifier: "1N4148", price: 0.05, category: "NOPE" }), NotFoundError);
  // The failed add is rolled back with its category lookup
  assert.equal(store.findComponent("1N4148"), undefined);
  store.close();
});

test("editComponent applies only the provided fields", () => {
  const { store, catalog } = setup();
  catalog.addComponent({ identifier: "R1", price: "0.01", description: "1k", quantity: 10 });
  const edited = catalog.editComponent("R1", { price: "0.02", description: "" });
  assert.equal(edited.price, 0.02);
  assert.equal(edited.description, null);
  assert.equal(edited.quantity, 10);
  assert.equal(catalog.editComponent("R1", { identifier: "R1K" }).identifier, "R1K");
  assert.throws(() => catalog.editComponent("R1K", { price: "abc" }), ValidationError);
  assert.throws(() => catalog.editComponent("R1", { price: "1" }), NotFoundError);
  store.close();
});

test("adjustStock requires whole-number deltas", () => {
  const { store, catalog } = setup();
  catalog.addComponent({ identifier: "P1", price: 1, quantity: 1 });
  assert.equal(catalog.adjustStock("P1", 3).quantity, 4);
  assert.throws(() => catalog.adjustStock("P1", 0.5), ValidationError);
  store.close();
});

test("category maintenance validates names and reports collisions", () => {
  const { store, catalog } = setup();
  const cat = catalog.addCategory({ name: "  SENSORS  ", description: "temp, light" });
  assert.equal(cat.name, "SENSORS");
  assert.throws(() => catalog.addCategory({ name: "" }), ValidationError);
  assert.throws(() => catalog.addCategory({ name: "SENSORS" }), DuplicateNameError);
  assert.equal(catalog.editCategory(cat.id, { name: "SENSOR" }).name, "SENSOR");
  assert.equal(catalog.editCategory(cat.id, { description: "" }).description, null);
  assert.throws(() => catalog.editCategory(cat.id, { name: " " }), ValidationError);
  store.close();
});

test("removeComponent and removeCategory cascade through the link manager", () => {
  const { store, catalog } = setup();
  const cat = catalog.addCategory({ name: "IC" });
  const c = catalog.addComponent({ identifier: "NE555", price: 0.4, category: "IC" });
  catalog.removeCategory(cat.id);
  assert.equal(store.findComponent("NE555")?.categoryId, null);
  assert.deepEqual(store.categoriesFor(c.id), []);
  catalog.removeComponent("NE555");
  assert.equal(store.findComponent("NE555"), undefined);
  assert.throws(() => catalog.removeComponent("NE555"), NotFoundError);
  store.close();
});

test("seedStandardCategories creates only the missing ones", () => {
  const { store, catalog } = setup();
  catalog.addCategory({ name: "IC" });
  const created = catalog.seedStandardCategories();
  assert.equal(created.length, STANDARD_CATEGORIES.length - 1);
  assert.equal(catalog.seedStandardCategories().length, 0);
  assert.equal(store.listCategories().length, STANDARD_CATEGORIES.length);
  store.close();
});

test("autoCategorize creates the suggested category on first use", () => {
  const { store, catalog } = setup();
  const c = catalog.addComponent({ identifier: "C_100N", price: 0.02 });
  const categorized = catalog.autoCategorize(c);
  assert.equal(categorized.categoryName, "CAPACITOR");
  assert.equal(store.findCategoryByName("CAPACITOR")?.description, "Ceramic, film and electrolytic capacitors");
  store.close();
});
