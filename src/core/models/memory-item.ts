/**
 * MemoryItem Domain Type
 *
 * A reviewable piece of content. The engine only needs to know whether an
 * item exists; the shipped SQLite content store keeps the content itself so
 * the CLI can be used end to end.
 */
export interface MemoryItem {
  /** Unique identifier ('mem_<uuid>' when generated) */
  id: string;

  /** The text to be remembered */
  content: string;

  createdAt: Date;

  /** Set when the item is deleted; deleted items no longer exist for scheduling */
  deletedAt: Date | null;
}
