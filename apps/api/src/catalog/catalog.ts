/**
 * Catalog source
 *
 * The catalog is produced elsewhere (a crawler writes it to a JSON file); the
 * engine only reads it when it (re)builds the index.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../config/index.js';

function slugify(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

export const CatalogItemSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().trim().min(1, 'Item name is required'),
    description: z.string().default(''),
    type: z.string().default('Unknown'),
    url: z.string().default(''),
  })
  .transform((item) => ({
    id: item.id ?? (item.url || slugify(item.name)),
    name: item.name,
    description: item.description,
    type: item.type,
    url: item.url,
  }));

export const CatalogSchema = z.array(CatalogItemSchema);

export type CatalogItem = Readonly<z.output<typeof CatalogItemSchema>>;

export interface CatalogSource {
  /**
   * Current list of items. An unreadable catalog yields an empty list.
   */
  loadItems(): Promise<CatalogItem[]>;
}

/**
 * Text the item is embedded from: name, description and type tag.
 */
export function itemToEmbeddingText(item: CatalogItem): string {
  return `${item.name} ${item.description} ${item.type}`;
}

export class JsonFileCatalog implements CatalogSource {
  constructor(private readonly filePath: string) {}

  async loadItems(): Promise<CatalogItem[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : error, path: this.filePath }, 'Catalog file not readable');
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : error, path: this.filePath }, 'Catalog file is not valid JSON');
      return [];
    }

    if (!Array.isArray(parsed)) {
      logger.error({ path: this.filePath }, 'Catalog file does not hold an array of items');
      return [];
    }

    const items = dedupeById(parseCatalogEntries(parsed, this.filePath));
    logger.info({ path: this.filePath, items: items.length }, 'Catalog loaded');
    return items;
  }
}

export class InMemoryCatalog implements CatalogSource {
  constructor(private readonly items: CatalogItem[]) {}

  async loadItems(): Promise<CatalogItem[]> {
    return [...this.items];
  }
}

/**
 * Validate entries one at a time so a bad row costs only itself. An item
 * whose name leaves nothing to slug is keyed by its row number.
 */
export function parseCatalogEntries(entries: readonly unknown[], source = 'catalog'): CatalogItem[] {
  const items: CatalogItem[] = [];

  entries.forEach((entry, row) => {
    const result = CatalogItemSchema.safeParse(entry);
    if (!result.success) {
      logger.warn({
        source,
        row,
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '<item>'}: ${issue.message}`),
      }, 'Skipping invalid catalog item');
      return;
    }
    items.push(result.data.id ? result.data : { ...result.data, id: `item-${row + 1}` });
  });

  return items;
}

function dedupeById(items: CatalogItem[]): CatalogItem[] {
  const seen = new Set<string>();
  const unique: CatalogItem[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    unique.push(item);
  }
  return unique;
}
