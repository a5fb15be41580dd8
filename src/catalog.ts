import { STANDARD_CATEGORIES, categorizeComponent } from "./category.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { LinkManager } from "./linkManager.js";
import { createLogger } from "./logger.js";
import {
  sanitizeCategoryInput,
  sanitizeCategoryName,
  sanitizeComponentInput,
  sanitizeDescription,
  sanitizeIdentifier,
  sanitizePrice,
  sanitizeQuantity,
} from "./sanitize.js";
import type { ComponentStore } from "./store.js";
import type { Category, Component, ComponentUpdate, Issue } from "./types.js";

/**
 * Module: Catalog Service
 * Purpose: Manual component and category maintenance. Input is validated here and
 * rejected with `ValidationError` before the store sees it; deletions go through the
 * link manager so links and current categories stay consistent.
 */
const log = createLogger("catalog");

export interface ComponentInput {
  identifier: unknown;
  price?: unknown;
  description?: unknown;
  quantity?: unknown;
  // Category name to link after creation
  category?: string;
}

export interface ComponentEdit {
  identifier?: unknown;
  price?: unknown;
  description?: unknown;
  quantity?: unknown;
}

export class CatalogService {
  readonly links: LinkManager;

  constructor(private readonly store: ComponentStore) {
    this.links = new LinkManager(store);
  }

  addComponent(input: ComponentInput): Component {
    const { value, issues } = sanitizeComponentInput(input);
    if (!value) throw new ValidationError(issues);
    return this.store.transaction(() => {
      const created = this.store.insertComponent(value);
      if (input.category === undefined) return created;
      const category = this.requireCategoryByName(input.category);
      return this.links.assignCategory(created.id, category.id);
    });
  }

  /**
   * Apply the provided fields only. `description: ""` clears the description.
   */
  editComponent(identifier: string, edit: ComponentEdit): Component {
    const fields: ComponentUpdate = {};
    const issues: Issue[] = [];
    if (edit.identifier !== undefined) {
      const r = sanitizeIdentifier(edit.identifier);
      issues.push(...r.issues);
      fields.identifier = r.value;
    }
    if (edit.price !== undefined) {
      const r = sanitizePrice(edit.price);
      issues.push(...r.issues);
      fields.price = r.value;
    }
    if (edit.description !== undefined) fields.description = sanitizeDescription(edit.description).value;
    if (edit.quantity !== undefined) {
      const r = sanitizeQuantity(edit.quantity);
      issues.push(...r.issues);
      fields.quantity = r.value;
    }
    if (issues.length) throw new ValidationError(issues);
    return this.store.updateComponent(identifier, fields);
  }

  removeComponent(identifier: string): void {
    this.links.removeComponent(this.requireComponent(identifier).id);
  }

  /**
   * Stock movements may take the quantity below zero; that is how shortfalls are tracked.
   */
  adjustStock(identifier: string, delta: number): Component {
    if (!Number.isInteger(delta)) {
      throw new ValidationError([{ field: "quantity", code: "E_NUM_INT", msg: "must be a whole number", level: "error" }]);
    }
    return this.store.adjustQuantity(identifier, delta);
  }

  addCategory(input: { name: unknown; description?: unknown }): Category {
    const { value, issues } = sanitizeCategoryInput(input);
    if (!value) throw new ValidationError(issues);
    return this.store.createCategory(value);
  }

  editCategory(id: number, edit: { name?: unknown; description?: unknown }): Category {
    let name: string | undefined;
    if (edit.name !== undefined) {
      const r = sanitizeCategoryName(edit.name);
      if (r.value === undefined) throw new ValidationError(r.issues);
      name = r.value;
    }
    const description = edit.description === undefined ? undefined : sanitizeDescription(edit.description).value;
    return this.store.updateCategory(id, { name, description });
  }

  removeCategory(id: number): void {
    this.links.removeCategory(id);
  }

  /**
   * Return the named category, creating it when missing.
   */
  ensureCategory(name: string, description?: string | null): Category {
    const existing = this.store.findCategoryByName(name);
    if (existing) return existing;
    log.info(`creating category ${name}`);
    return this.addCategory({ name, description });
  }

  /**
   * Create any standard category that does not exist yet. Returns the created ones.
   */
  seedStandardCategories(): Category[] {
    return this.store.transaction(() =>
      STANDARD_CATEGORIES.filter((c) => !this.store.findCategoryByName(c.name)).map((c) =>
        this.store.createCategory({ name: c.name, description: c.description })
      )
    );
  }

  /**
   * Link a component to the standard category its identifier/description suggest.
   */
  autoCategorize(component: Component): Component {
    const name = categorizeComponent(component.identifier, component.description);
    const standard = STANDARD_CATEGORIES.find((c) => c.name === name);
    const category = this.ensureCategory(name, standard?.description);
    return this.links.assignCategory(component.id, category.id);
  }

  requireComponent(identifier: string): Component {
    const found = this.store.findComponent(identifier);
    if (!found) throw new NotFoundError("component", identifier);
    return found;
  }

  requireCategoryByName(name: string): Category {
    const found = this.store.findCategoryByName(name.trim());
    if (!found) throw new NotFoundError("category", name);
    return found;
  }
}
