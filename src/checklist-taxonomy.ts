// Sales Call Scorecard - Checklist Taxonomy
//
// Immutable, versioned definition of the evaluation framework. Every
// computation receives a taxonomy explicitly (or reads TaxonomyProvider once at
// the start of a stage); nothing reads a module-level global.

import { readFile } from "node:fs/promises";
import { ValidationError } from "./errors.js";
import type { ChecklistCategory, ChecklistItem, ItemDefinition, TaxonomyDefinition } from "./types.js";

export class ChecklistTaxonomy {
  readonly version: string;
  private readonly categories: readonly ChecklistCategory[];
  private readonly items: readonly ChecklistItem[];
  private readonly itemsById: ReadonlyMap<number, ChecklistItem>;
  private readonly categoriesById: ReadonlyMap<number, ChecklistCategory>;
  private readonly active: readonly ChecklistItem[];

  private constructor(version: string, categories: ChecklistCategory[], items: ChecklistItem[]) {
    this.version = version;
    this.categories = Object.freeze([...categories].sort((a, b) => a.order - b.order));
    this.categoriesById = new Map(this.categories.map((c) => [c.id, c]));
    this.items = Object.freeze(items);
    this.itemsById = new Map(items.map((i) => [i.id, i]));

    const activeCategoryIds = new Set(this.categories.filter((c) => c.active).map((c) => c.id));
    this.active = Object.freeze(
      items
        .filter((i) => i.active && activeCategoryIds.has(i.categoryId))
        .sort((a, b) => {
          const ca = this.categoriesById.get(a.categoryId)?.order ?? 0;
          const cb = this.categoriesById.get(b.categoryId)?.order ?? 0;
          return ca - cb || a.ordinal - b.ordinal;
        }),
    );
  }

  /**
   * Build a taxonomy from a raw definition. Points are derived from the item
   * weight and its category's maxScore.
   *
   * @throws ValidationError on duplicate ids, dangling category references or
   *   non-positive weights / max scores.
   */
  static fromDefinition(def: TaxonomyDefinition): ChecklistTaxonomy {
    const categories: ChecklistCategory[] = [];
    const seenCategories = new Set<number>();
    for (const c of def.categories) {
      if (seenCategories.has(c.id)) {
        throw new ValidationError(`Duplicate category id ${c.id}`);
      }
      if (!(c.maxScore > 0)) {
        throw new ValidationError(`Category ${c.id} must have a positive maxScore`);
      }
      seenCategories.add(c.id);
      categories.push({ ...c, active: c.active ?? true });
    }

    const maxById = new Map(categories.map((c) => [c.id, c.maxScore]));
    const items: ChecklistItem[] = [];
    const seenItems = new Set<number>();
    for (const i of def.items) {
      if (seenItems.has(i.id)) {
        throw new ValidationError(`Duplicate item id ${i.id}`);
      }
      const max = maxById.get(i.categoryId);
      if (max === undefined) {
        throw new ValidationError(`Item ${i.id} references unknown category ${i.categoryId}`);
      }
      if (!(i.weight > 0)) {
        throw new ValidationError(`Item ${i.id} must have a positive weight`);
      }
      seenItems.add(i.id);
      items.push({ ...i, points: i.weight * max, active: i.active ?? true });
    }

    return new ChecklistTaxonomy(def.version, categories, items);
  }

  /** Active items ordered by category order, then ordinal. */
  activeItems(): readonly ChecklistItem[] {
    return this.active;
  }

  /** Active categories that still hold at least one active item, by order. */
  activeCategories(): readonly ChecklistCategory[] {
    const used = new Set(this.active.map((i) => i.categoryId));
    return this.categories.filter((c) => c.active && used.has(c.id));
  }

  /** Sum of active items' points. Not assumed to be 100. */
  totalMaxScore(): number {
    return this.active.reduce((sum, item) => sum + item.points, 0);
  }

  /** Effective max for a category: the sum of its active items' points. */
  categoryMaxScore(categoryId: number): number {
    return this.itemsInCategory(categoryId).reduce((sum, item) => sum + item.points, 0);
  }

  itemsInCategory(categoryId: number): readonly ChecklistItem[] {
    return this.active.filter((i) => i.categoryId === categoryId);
  }

  /** Looks up any item, active or not. */
  getItem(itemId: number): ChecklistItem | undefined {
    return this.itemsById.get(itemId);
  }

  getCategory(categoryId: number): ChecklistCategory | undefined {
    return this.categoriesById.get(categoryId);
  }

  /** Category of any known item. */
  categoryOf(itemId: number): ChecklistCategory | undefined {
    const item = this.itemsById.get(itemId);
    return item ? this.categoriesById.get(item.categoryId) : undefined;
  }

  isActive(itemId: number): boolean {
    return this.active.some((i) => i.id === itemId);
  }

  /** Item definitions in the shape the analysis prompt needs. */
  itemDefinitions(): ItemDefinition[] {
    return this.active.map((i) => ({
      id: i.id,
      category: this.categoriesById.get(i.categoryId)?.name ?? "",
      title: i.title,
      definition: i.definition,
    }));
  }

  /** Every item ever defined, including deactivated ones. */
  allItems(): readonly ChecklistItem[] {
    return this.items;
  }
}

// ─── Loading ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`${where}: "${key}" must be a number`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new ValidationError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
  const value = obj[key];
  return typeof value === "boolean" ? value : undefined;
}

function optionalString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  return typeof value === "string" ? value : "";
}

/** Validate the shape of a parsed checklist JSON document. */
export function parseTaxonomyDefinition(raw: unknown): TaxonomyDefinition {
  if (!isRecord(raw)) {
    throw new ValidationError("Taxonomy definition must be an object");
  }
  if (!Array.isArray(raw.categories) || !Array.isArray(raw.items)) {
    throw new ValidationError('Taxonomy definition needs "categories" and "items" arrays');
  }

  const categories = raw.categories.map((c: unknown, index: number) => {
    const where = `categories[${index}]`;
    if (!isRecord(c)) throw new ValidationError(`${where} must be an object`);
    return {
      id: requireNumber(c, "id", where),
      name: requireString(c, "name", where),
      description: optionalString(c, "description"),
      order: requireNumber(c, "order", where),
      weight: typeof c.weight === "number" ? requireNumber(c, "weight", where) : 1,
      maxScore: requireNumber(c, "maxScore", where),
      active: optionalBoolean(c, "active"),
    };
  });

  const items = raw.items.map((i: unknown, index: number) => {
    const where = `items[${index}]`;
    if (!isRecord(i)) throw new ValidationError(`${where} must be an object`);
    return {
      id: requireNumber(i, "id", where),
      categoryId: requireNumber(i, "categoryId", where),
      ordinal: requireNumber(i, "ordinal", where),
      title: requireString(i, "title", where),
      definition: optionalString(i, "definition"),
      weight: requireNumber(i, "weight", where),
      active: optionalBoolean(i, "active"),
    };
  });

  return {
    version: typeof raw.version === "string" ? raw.version : "unversioned",
    categories,
    items,
  };
}

export async function loadTaxonomy(path: string): Promise<ChecklistTaxonomy> {
  const text = await readFile(path, "utf-8");
  return ChecklistTaxonomy.fromDefinition(parseTaxonomyDefinition(JSON.parse(text)));
}

// ─── Provider ───────────────────────────────────────────────────────────────────

/**
 * Holds the current taxonomy. Pipeline stages call `current()` once when they
 * start and use that instance throughout, so a `refresh()` only affects stages
 * that start afterwards.
 */
export class TaxonomyProvider {
  private taxonomy: ChecklistTaxonomy;

  constructor(initial: ChecklistTaxonomy) {
    this.taxonomy = initial;
  }

  current(): ChecklistTaxonomy {
    return this.taxonomy;
  }

  refresh(next: ChecklistTaxonomy): void {
    this.taxonomy = next;
  }
}
