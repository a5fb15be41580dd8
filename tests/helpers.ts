import { setLogLevel } from "../src/logger.js";
import { SqliteComponentStore } from "../src/sqliteStore.js";
import type { Component } from "../src/types.js";

setLogLevel("silent");

export function memoryStore(): SqliteComponentStore {
  return new SqliteComponentStore(":memory:");
}

export function component(overrides: Partial<Component> = {}): Component {
  return {
    id: 1,
    identifier: "R10K",
    description: null,
    price: 0.05,
    quantity: 0,
    categoryId: null,
    categoryName: null,
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}
