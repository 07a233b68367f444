/**
 * Memory Item Repository Implementation
 *
 * Data access for reviewable content. Also serves as the engine's
 * ContentStore: an item exists while it has not been soft-deleted.
 */

import { randomUUID } from 'node:crypto';
import { eq, and, isNull, asc } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { memoryItems } from '../schema';
import { runStoreCall } from '../sqlite-errors';
import type { MemoryItem } from '@/core/models';
import type { ContentStore } from '@/core/stores';
import type { Repository } from './base';

export interface CreateMemoryItemInput {
  /** Defaults to a generated 'mem_<uuid>' */
  id?: string;
  content: string;
  createdAt?: Date;
}

export interface UpdateMemoryItemInput {
  content?: string;
}

function mapToDomain(row: typeof memoryItems.$inferSelect): MemoryItem {
  return {
    id: row.id,
    content: row.content,
    createdAt: row.createdAt,
    deletedAt: row.deletedAt,
  };
}

/**
 * @example
 * ```typescript
 * const items = new MemoryItemRepository(db);
 * const item = await items.create({ content: 'Mitochondria produce ATP' });
 * await items.itemExists(item.id); // true
 * ```
 */
export class MemoryItemRepository
  implements Repository<MemoryItem, CreateMemoryItemInput, UpdateMemoryItemInput>, ContentStore
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<MemoryItem | null> {
    return runStoreCall('findItem', () => {
      const row = this.db.select().from(memoryItems).where(eq(memoryItems.id, id)).get();
      return row ? mapToDomain(row) : null;
    });
  }

  /**
   * Live items, oldest first.
   */
  async findAll(): Promise<MemoryItem[]> {
    return runStoreCall('listItems', () =>
      this.db
        .select()
        .from(memoryItems)
        .where(isNull(memoryItems.deletedAt))
        .orderBy(asc(memoryItems.createdAt), asc(memoryItems.id))
        .all()
        .map(mapToDomain)
    );
  }

  async create(input: CreateMemoryItemInput): Promise<MemoryItem> {
    const row: typeof memoryItems.$inferInsert = {
      id: input.id ?? `mem_${randomUUID()}`,
      content: input.content,
      createdAt: input.createdAt ?? new Date(),
      deletedAt: null,
    };

    return runStoreCall('createItem', () =>
      mapToDomain(this.db.insert(memoryItems).values(row).returning().get())
    );
  }

  /**
   * @throws Error if the item does not exist or was deleted
   */
  async update(id: string, input: UpdateMemoryItemInput): Promise<MemoryItem> {
    return runStoreCall('updateItem', () => {
      const live = and(eq(memoryItems.id, id), isNull(memoryItems.deletedAt));
      const updated =
        input.content === undefined
          ? this.db.select().from(memoryItems).where(live).get()
          : this.db.update(memoryItems).set({ content: input.content }).where(live).returning().get();
      if (!updated) {
        throw new Error(`MemoryItem with id '${id}' not found`);
      }
      return mapToDomain(updated);
    });
  }

  /**
   * Soft-deletes the item; its row stays for history.
   *
   * @throws Error if the item does not exist or was already deleted
   */
  async delete(id: string, deletedAt: Date = new Date()): Promise<void> {
    await runStoreCall('deleteItem', () => {
      const result = this.db
        .update(memoryItems)
        .set({ deletedAt })
        .where(and(eq(memoryItems.id, id), isNull(memoryItems.deletedAt)))
        .run();
      if (result.changes === 0) {
        throw new Error(`MemoryItem with id '${id}' not found`);
      }
    });
  }

  async itemExists(itemId: string): Promise<boolean> {
    return runStoreCall('itemExists', () => {
      const row = this.db
        .select({ id: memoryItems.id })
        .from(memoryItems)
        .where(and(eq(memoryItems.id, itemId), isNull(memoryItems.deletedAt)))
        .get();
      return row !== undefined;
    });
  }
}
