import { NotFoundError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ComponentStore } from "./store.js";
import type { Category, Component } from "./types.js";

/**
 * Module: Link Manager
 * Purpose: Keep component↔category links and each component's current category in step.
 * Design:
 * - The link table is the source of truth. The store keeps `components.category_id` in
 *   step with it on every link write, falling back to the lowest remaining linked id.
 * - Assigning a category additionally makes it current.
 */
const log = createLogger("links");

export class LinkManager {
  constructor(private readonly store: ComponentStore) {}

  /**
   * Link a component to a category and make it the current category. Linking an existing
   * pair changes nothing. Returns the refreshed component.
   */
  assignCategory(componentId: number, categoryId: number): Component {
    return this.store.transaction(() => {
      const component = this.requireComponent(componentId);
      this.requireCategory(categoryId);
      const created = this.store.link(componentId, categoryId);
      if (!created && component.categoryId !== null) return component;
      if (component.categoryId !== categoryId) this.store.setCurrentCategory(componentId, categoryId);
      log.debug(`linked component ${component.identifier} to category ${categoryId}`);
      return this.requireComponent(componentId);
    });
  }

  /**
   * Remove a link if present. Falls back to another linked category when the removed one
   * was current.
   */
  unassignCategory(componentId: number, categoryId: number): Component {
    return this.store.transaction(() => {
      this.requireComponent(componentId);
      this.store.unlink(componentId, categoryId);
      return this.requireComponent(componentId);
    });
  }

  removeComponent(componentId: number): void {
    const component = this.requireComponent(componentId);
    this.store.deleteComponent(component.identifier);
    log.debug(`removed component ${component.identifier}`);
  }

  /**
   * Delete a category with its links. Components that showed it as current fall back to
   * another linked category, or to unset.
   */
  removeCategory(categoryId: number): void {
    this.requireCategory(categoryId);
    this.store.deleteCategory(categoryId);
    log.debug(`removed category ${categoryId}`);
  }

  categoriesFor(componentId: number): Category[] {
    return this.store.categoriesFor(componentId);
  }

  componentsFor(categoryId: number): Component[] {
    return this.store.componentsFor(categoryId);
  }

  private requireComponent(id: number): Component {
    const found = this.store.findComponentById(id);
    if (!found) throw new NotFoundError("component", id);
    return found;
  }

  private requireCategory(id: number): Category {
    const found = this.store.findCategory(id);
    if (!found) throw new NotFoundError("category", id);
    return found;
  }
}
