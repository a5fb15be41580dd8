import type {
  Category,
  CategoryUpdate,
  Component,
  ComponentUpdate,
  NewCategory,
  NewComponent,
} from "./types.js";

/**
 * Module: Record Store Contract
 * Purpose: The persistence operations the reconciliation engine, link manager and
 * catalog service rely on. Implementations set every timestamp themselves.
 *
 * Failure contract:
 * - `NotFoundError` for updates/deletes addressing a missing row.
 * - `DuplicateIdentifierError` / `DuplicateNameError` for uniqueness collisions.
 * - `StoreError` for any other driver or constraint failure.
 */
export interface ComponentStore {
  findComponent(identifier: string): Component | undefined;
  findComponentById(id: number): Component | undefined;
  // Ordered by identifier
  listComponents(): Component[];
  insertComponent(record: NewComponent): Component;
  updateComponent(identifier: string, fields: ComponentUpdate): Component;
  // Removes the component's links in the same transaction
  deleteComponent(identifier: string): void;
  adjustQuantity(identifier: string, delta: number): Component;

  findCategory(id: number): Category | undefined;
  findCategoryByName(name: string): Category | undefined;
  // Ordered by name
  listCategories(): Category[];
  createCategory(input: NewCategory): Category;
  updateCategory(id: number, fields: CategoryUpdate): Category;
  // Removes the category's links in the same transaction; members that showed it as
  // current fall back to their lowest remaining linked category id, or none
  deleteCategory(id: number): void;

  // Both idempotent; `link` returns false when the pair already existed.
  // `link` makes the category current when the component has none; `unlink` of the
  // current category applies the same fallback as `deleteCategory`.
  link(componentId: number, categoryId: number): boolean;
  unlink(componentId: number, categoryId: number): boolean;
  categoriesFor(componentId: number): Category[];
  componentsFor(categoryId: number): Component[];
  // The category must already be linked to the component
  setCurrentCategory(componentId: number, categoryId: number): void;

  transaction<T>(fn: () => T): T;
  close(): void;
}
