import Database from "better-sqlite3";
import {
  CatalogError,
  DuplicateIdentifierError,
  DuplicateNameError,
  NotFoundError,
  StoreError,
} from "./errors.js";
import { createLogger } from "./logger.js";
import type { ComponentStore } from "./store.js";
import type {
  Category,
  CategoryUpdate,
  Component,
  ComponentUpdate,
  NewCategory,
  NewComponent,
} from "./types.js";

/**
 * Module: SQLite Record Store
 * Purpose: `ComponentStore` backed by better-sqlite3.
 * Notes:
 * - Identifiers use SQLite's default BINARY collation, so uniqueness is case-sensitive.
 * - Foreign keys are enforced; link rows cascade with either endpoint.
 * - `components.category_id` caches one linked category. Every link write updates it in
 *   the same transaction: a removed current category falls back to the lowest remaining
 *   linked id, or NULL when no link is left.
 * - Timestamps are ISO-8601 UTC strings written by SQL, never by callers.
 */
const NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (${NOW}),
  updated_at TEXT NOT NULL DEFAULT (${NOW})
);
CREATE TABLE IF NOT EXISTS components (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  identifier TEXT NOT NULL UNIQUE,
  description TEXT,
  price REAL NOT NULL DEFAULT 0 CHECK (price >= 0),
  quantity INTEGER NOT NULL DEFAULT 0,
  category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
  created_at TEXT NOT NULL DEFAULT (${NOW}),
  updated_at TEXT NOT NULL DEFAULT (${NOW})
);
CREATE TABLE IF NOT EXISTS component_category (
  component_id INTEGER NOT NULL REFERENCES components(id) ON DELETE CASCADE,
  category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
  PRIMARY KEY (component_id, category_id)
);
CREATE INDEX IF NOT EXISTS idx_component_category_category ON component_category(category_id);
`;

interface ComponentRow {
  id: number;
  identifier: string;
  description: string | null;
  price: number;
  quantity: number;
  category_id: number | null;
  category_name: string | null;
  created_at: string;
  updated_at: string;
}

interface CategoryRow {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
}

const COMPONENT_SELECT = `
SELECT c.id, c.identifier, c.description, c.price, c.quantity, c.category_id,
       cat.name AS category_name, c.created_at, c.updated_at
FROM components c
LEFT JOIN categories cat ON cat.id = c.category_id`;

const CATEGORY_SELECT = "SELECT id, name, description, created_at, updated_at FROM categories";

const FALLBACK_CATEGORY = `(SELECT MIN(cc.category_id) FROM component_category cc WHERE cc.component_id = components.id)`;

const log = createLogger("store");

const toComponent = (row: ComponentRow): Component => ({
  id: row.id,
  identifier: row.identifier,
  description: row.description,
  price: row.price,
  quantity: row.quantity,
  categoryId: row.category_id,
  categoryName: row.category_name,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const toCategory = (row: CategoryRow): Category => ({
  id: row.id,
  name: row.name,
  description: row.description,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const sqliteCode = (err: unknown): string | undefined =>
  err instanceof Database.SqliteError ? err.code : undefined;

export class SqliteComponentStore implements ComponentStore {
  private readonly db: Database.Database;

  /**
   * Open (or create) the catalog database. Pass `":memory:"` for a throwaway store.
   */
  constructor(filename: string) {
    try {
      this.db = new Database(filename);
      this.db.pragma("foreign_keys = ON");
      if (filename !== ":memory:") this.db.pragma("journal_mode = WAL");
      this.db.exec(SCHEMA);
    } catch (err) {
      throw new StoreError(`cannot open catalog database: ${filename}`, err);
    }
    log.debug(`opened ${filename}`);
  }

  findComponent(identifier: string): Component | undefined {
    return this.guard("find component", () => {
      const row = this.db.prepare<[string], ComponentRow>(`${COMPONENT_SELECT} WHERE c.identifier = ?`).get(identifier);
      return row ? toComponent(row) : undefined;
    });
  }

  findComponentById(id: number): Component | undefined {
    return this.guard("find component", () => {
      const row = this.db.prepare<[number], ComponentRow>(`${COMPONENT_SELECT} WHERE c.id = ?`).get(id);
      return row ? toComponent(row) : undefined;
    });
  }

  listComponents(): Component[] {
    return this.guard("list components", () =>
      this.db.prepare<[], ComponentRow>(`${COMPONENT_SELECT} ORDER BY c.identifier`).all().map(toComponent)
    );
  }

  insertComponent(record: NewComponent): Component {
    return this.guard("insert component", () => {
      try {
        const info = this.db
          .prepare<[string, string | null, number, number]>(
            "INSERT INTO components (identifier, description, price, quantity) VALUES (?, ?, ?, ?)"
          )
          .run(record.identifier, record.description ?? null, record.price, record.quantity ?? 0);
        return this.requireComponentById(Number(info.lastInsertRowid));
      } catch (err) {
        if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") throw new DuplicateIdentifierError(record.identifier);
        throw err;
      }
    });
  }

  updateComponent(identifier: string, fields: ComponentUpdate): Component {
    return this.guard("update component", () => {
      const existing = this.findComponent(identifier);
      if (!existing) throw new NotFoundError("component", identifier);
      const next = {
        identifier: fields.identifier ?? existing.identifier,
        description: fields.description === undefined ? existing.description : fields.description,
        price: fields.price ?? existing.price,
        quantity: fields.quantity ?? existing.quantity,
      };
      try {
        this.db
          .prepare<[string, string | null, number, number, number]>(
            `UPDATE components SET identifier = ?, description = ?, price = ?, quantity = ?, updated_at = ${NOW} WHERE id = ?`
          )
          .run(next.identifier, next.description, next.price, next.quantity, existing.id);
      } catch (err) {
        if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") throw new DuplicateIdentifierError(next.identifier);
        throw err;
      }
      return this.requireComponentById(existing.id);
    });
  }

  deleteComponent(identifier: string): void {
    this.guard("delete component", () =>
      this.transaction(() => {
        const existing = this.findComponent(identifier);
        if (!existing) throw new NotFoundError("component", identifier);
        this.db.prepare<[number]>("DELETE FROM component_category WHERE component_id = ?").run(existing.id);
        this.db.prepare<[number]>("DELETE FROM components WHERE id = ?").run(existing.id);
      })
    );
  }

  adjustQuantity(identifier: string, delta: number): Component {
    return this.guard("adjust quantity", () => {
      const info = this.db
        .prepare<[number, string]>(`UPDATE components SET quantity = quantity + ?, updated_at = ${NOW} WHERE identifier = ?`)
        .run(delta, identifier);
      if (info.changes === 0) throw new NotFoundError("component", identifier);
      const updated = this.findComponent(identifier);
      if (!updated) throw new NotFoundError("component", identifier);
      return updated;
    });
  }

  findCategory(id: number): Category | undefined {
    return this.guard("find category", () => {
      const row = this.db.prepare<[number], CategoryRow>(`${CATEGORY_SELECT} WHERE id = ?`).get(id);
      return row ? toCategory(row) : undefined;
    });
  }

  findCategoryByName(name: string): Category | undefined {
    return this.guard("find category", () => {
      const row = this.db.prepare<[string], CategoryRow>(`${CATEGORY_SELECT} WHERE name = ?`).get(name);
      return row ? toCategory(row) : undefined;
    });
  }

  listCategories(): Category[] {
    return this.guard("list categories", () =>
      this.db.prepare<[], CategoryRow>(`${CATEGORY_SELECT} ORDER BY name`).all().map(toCategory)
    );
  }

  createCategory(input: NewCategory): Category {
    return this.guard("create category", () => {
      try {
        const info = this.db
          .prepare<[string, string | null]>("INSERT INTO categories (name, description) VALUES (?, ?)")
          .run(input.name, input.description ?? null);
        return this.requireCategory(Number(info.lastInsertRowid));
      } catch (err) {
        if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") throw new DuplicateNameError(input.name);
        throw err;
      }
    });
  }

  updateCategory(id: number, fields: CategoryUpdate): Category {
    return this.guard("update category", () => {
      const existing = this.requireCategory(id);
      const name = fields.name ?? existing.name;
      const description = fields.description === undefined ? existing.description : fields.description;
      try {
        this.db
          .prepare<[string, string | null, number]>(
            `UPDATE categories SET name = ?, description = ?, updated_at = ${NOW} WHERE id = ?`
          )
          .run(name, description, id);
      } catch (err) {
        if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") throw new DuplicateNameError(name);
        throw err;
      }
      return this.requireCategory(id);
    });
  }

  deleteCategory(id: number): void {
    this.guard("delete category", () =>
      this.transaction(() => {
        this.requireCategory(id);
        this.db.prepare<[number]>("DELETE FROM component_category WHERE category_id = ?").run(id);
        this.db
          .prepare<[number]>(
            `UPDATE components SET category_id = ${FALLBACK_CATEGORY}, updated_at = ${NOW} WHERE category_id = ?`
          )
          .run(id);
        this.db.prepare<[number]>("DELETE FROM categories WHERE id = ?").run(id);
      })
    );
  }

  link(componentId: number, categoryId: number): boolean {
    return this.guard("link", () =>
      this.transaction(() => {
        this.requireComponentById(componentId);
        this.requireCategory(categoryId);
        const info = this.db
          .prepare<[number, number]>("INSERT OR IGNORE INTO component_category (component_id, category_id) VALUES (?, ?)")
          .run(componentId, categoryId);
        this.db
          .prepare<[number, number]>(
            `UPDATE components SET category_id = ?, updated_at = ${NOW} WHERE id = ? AND category_id IS NULL`
          )
          .run(categoryId, componentId);
        return info.changes > 0;
      })
    );
  }

  unlink(componentId: number, categoryId: number): boolean {
    return this.guard("unlink", () =>
      this.transaction(() => {
        const info = this.db
          .prepare<[number, number]>("DELETE FROM component_category WHERE component_id = ? AND category_id = ?")
          .run(componentId, categoryId);
        this.db
          .prepare<[number, number]>(
            `UPDATE components SET category_id = ${FALLBACK_CATEGORY}, updated_at = ${NOW} WHERE id = ? AND category_id = ?`
          )
          .run(componentId, categoryId);
        return info.changes > 0;
      })
    );
  }

  categoriesFor(componentId: number): Category[] {
    return this.guard("categories for component", () =>
      this.db
        .prepare<[number], CategoryRow>(
          `SELECT cat.id, cat.name, cat.description, cat.created_at, cat.updated_at
           FROM component_category cc JOIN categories cat ON cat.id = cc.category_id
           WHERE cc.component_id = ? ORDER BY cat.id`
        )
        .all(componentId)
        .map(toCategory)
    );
  }

  componentsFor(categoryId: number): Component[] {
    return this.guard("components for category", () =>
      this.db
        .prepare<[number], ComponentRow>(
          `${COMPONENT_SELECT} JOIN component_category cc ON cc.component_id = c.id
           WHERE cc.category_id = ? ORDER BY c.id`
        )
        .all(categoryId)
        .map(toComponent)
    );
  }

  setCurrentCategory(componentId: number, categoryId: number): void {
    this.guard("set current category", () => {
      this.requireComponentById(componentId);
      const linked = this.db
        .prepare<[number, number], { n: number }>(
          "SELECT 1 AS n FROM component_category WHERE component_id = ? AND category_id = ?"
        )
        .get(componentId, categoryId);
      if (!linked) throw new NotFoundError("link", `${componentId}/${categoryId}`);
      this.db
        .prepare<[number, number]>(`UPDATE components SET category_id = ?, updated_at = ${NOW} WHERE id = ?`)
        .run(categoryId, componentId);
    });
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  private requireComponentById(id: number): Component {
    const found = this.findComponentById(id);
    if (!found) throw new NotFoundError("component", id);
    return found;
  }

  private requireCategory(id: number): Category {
    const found = this.findCategory(id);
    if (!found) throw new NotFoundError("category", id);
    return found;
  }

  // Catalog errors pass through; anything the driver throws becomes a StoreError
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof CatalogError) throw err;
      log.error(`${operation} failed`, err);
      throw new StoreError(`${operation} failed`, err);
    }
  }
}
