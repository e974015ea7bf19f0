import { cloneItem, type Item } from "./scheduler.js";

/**
 * Storage collaborator. The engine never calls it; callers load a
 * collection before a session and save every item a grade returns.
 */
export interface ItemStore {
  listItems(collectionId: string): Item[];
  getItem(id: string): Item | undefined;
  saveItem(item: Item): void;
  // Insert or replace, all or nothing
  upsertItems(items: readonly Item[]): number;
  close(): void;
}

export class InMemoryItemStore implements ItemStore {
  private readonly items = new Map<string, Item>();

  constructor(seed: readonly Item[] = []) {
    this.upsertItems(seed);
  }

  listItems(collectionId: string): Item[] {
    return [...this.items.values()].filter((item) => item.collectionId === collectionId).map(cloneItem);
  }

  getItem(id: string): Item | undefined {
    const item = this.items.get(id);
    return item ? cloneItem(item) : undefined;
  }

  saveItem(item: Item): void {
    this.items.set(item.id, cloneItem(item));
  }

  upsertItems(items: readonly Item[]): number {
    for (const item of items) {
      this.saveItem(item);
    }
    return items.length;
  }

  close(): void {
    this.items.clear();
  }
}
