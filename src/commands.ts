import { CatalogService } from "./catalog.js";
import { CatalogError, ValidationError } from "./errors.js";
import { importComponentsFile } from "./importDriver.js";
import type { ComponentStore } from "./store.js";
import type { Category, Component } from "./types.js";

/**
 * Module: Catalog Commands
 * Purpose: The `catalog` command set, run against an open store. The store is closed
 * when the command finishes, whether it succeeded or not.
 */
export const USAGE = `Usage: catalog <command> [args]

Commands:
  import <file>                          Import components from a CSV/XLSX file
  components                             List components
  categories                             List categories
  add-component <id> <price> [desc]      Add a component
  add-category <name> [desc]             Add a category
  link <identifier> <category>           Assign a category to a component
  unlink <identifier> <category>         Remove a category from a component
  component-categories <identifier>      Show the categories of a component
  category-components <category>         Show the components in a category
  delete-component <identifier>          Delete a component and its links
  delete-category <category>             Delete a category and its links
  stock <identifier> <delta>             Adjust the stock quantity
  seed                                   Create the standard categories

Environment: CATALOG_DB_PATH, CATALOG_LOG_LEVEL, CATALOG_AUTO_CATEGORIZE`;

export class UsageError extends CatalogError {
  constructor(message: string) {
    super("E_USAGE", message);
  }
}

export interface CommandContext {
  autoCategorize: boolean;
  print: (line: string) => void;
}

export const formatComponent = (c: Component): string =>
  `${String(c.id).padEnd(4)} | ${c.identifier.padEnd(15)} | $${c.price.toFixed(2).padEnd(8)} | qty ${String(c.quantity).padEnd(5)} | ${(c.categoryName ?? "-").padEnd(16)} | ${c.description ?? "No description"}`;

export const formatCategory = (c: Category): string =>
  `${String(c.id).padEnd(4)} | ${c.name.padEnd(16)} | ${c.description ?? "No description"}`;

function need(command: string, args: string[], count: number): string[] {
  if (args.length < count) throw new UsageError(`missing arguments for ${command}`);
  return args;
}

export async function runCommand(argv: string[], store: ComponentStore, ctx: CommandContext): Promise<void> {
  try {
    await dispatch(argv, store, ctx);
  } finally {
    store.close();
  }
}

async function dispatch(argv: string[], store: ComponentStore, { autoCategorize, print }: CommandContext): Promise<void> {
  const [command = "", ...args] = argv;
  const catalog = new CatalogService(store);

  switch (command) {
    case "import": {
      const [file] = need(command, args, 1);
      const summary = await importComponentsFile(file, store, { autoCategorize });
      print(`New components imported: ${summary.inserted}`);
      print(`Existing components updated: ${summary.overwritten}`);
      print(`Unchanged (lower price or nothing new): ${summary.unchanged}`);
      print(`Rows skipped: ${summary.skipped}`);
      return;
    }
    case "components": {
      const components = store.listComponents();
      print(`${components.length} components`);
      components.forEach((c) => print(formatComponent(c)));
      return;
    }
    case "categories": {
      const categories = store.listCategories();
      print(`${categories.length} categories`);
      categories.forEach((c) => print(formatCategory(c)));
      return;
    }
    case "add-component": {
      const [identifier, price, ...desc] = need(command, args, 2);
      const created = catalog.addComponent({ identifier, price, description: desc.join(" ") });
      print(`Component added with ID ${created.id}`);
      return;
    }
    case "add-category": {
      const [name, ...desc] = need(command, args, 1);
      const created = catalog.addCategory({ name, description: desc.join(" ") });
      print(`Category added with ID ${created.id}`);
      return;
    }
    case "link":
    case "unlink": {
      const [identifier, name] = need(command, args, 2);
      const component = catalog.requireComponent(identifier);
      const category = catalog.requireCategoryByName(name);
      const updated =
        command === "link"
          ? catalog.links.assignCategory(component.id, category.id)
          : catalog.links.unassignCategory(component.id, category.id);
      print(formatComponent(updated));
      return;
    }
    case "component-categories": {
      const [identifier] = need(command, args, 1);
      const categories = catalog.links.categoriesFor(catalog.requireComponent(identifier).id);
      if (!categories.length) print(`No categories for ${identifier}`);
      categories.forEach((c) => print(formatCategory(c)));
      return;
    }
    case "category-components": {
      const [name] = need(command, args, 1);
      const components = catalog.links.componentsFor(catalog.requireCategoryByName(name).id);
      if (!components.length) print(`No components in ${name}`);
      components.forEach((c) => print(formatComponent(c)));
      return;
    }
    case "delete-component": {
      const [identifier] = need(command, args, 1);
      catalog.removeComponent(identifier);
      print(`Deleted ${identifier}`);
      return;
    }
    case "delete-category": {
      const [name] = need(command, args, 1);
      catalog.removeCategory(catalog.requireCategoryByName(name).id);
      print(`Deleted category ${name}`);
      return;
    }
    case "stock": {
      const [identifier, delta] = need(command, args, 2);
      const n = Number(delta);
      if (!Number.isInteger(n)) {
        throw new ValidationError([{ field: "delta", code: "E_NUM_INT", msg: "must be a whole number", level: "error" }]);
      }
      print(formatComponent(catalog.adjustStock(identifier, n)));
      return;
    }
    case "seed": {
      const created = catalog.seedStandardCategories();
      print(`Created ${created.length} standard categories`);
      return;
    }
    default:
      throw new UsageError(`unknown command: ${command}`);
  }
}
