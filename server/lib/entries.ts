import type { AppDatabase } from "@server/db/client";
import { entry, type Entry, type NewEntry } from "@server/db/schema";
import { and, asc, desc, eq, gt, lt } from "drizzle-orm";

export type EntryChanges = Partial<
  Omit<NewEntry, "id" | "userId" | "createdAt">
>;

export interface EntryStore {
  add(data: NewEntry): Promise<Entry | null>;
  update(id: number, changes: EntryChanges): Promise<Entry>;
  delete(id: number): Promise<void>;
  get(id: number): Promise<Entry | null>;
  /** Only returns the entry when `userId` owns it. */
  getUserEntry(id: number, userId: number): Promise<Entry | null>;
  getByUser(userId: number, limit: number): Promise<Entry[]>;
  /**
   * Public entries citing `isbn`, newest first. A `before` of 0 starts from
   * the newest entry.
   */
  findByIsbn(isbn: string, before: number, limit: number): Promise<Entry[]>;
  /** `before` cursor of the page after the one ending at `lastId`, or null. */
  getOlderByIsbn(isbn: string, lastId: number): Promise<number | null>;
  /**
   * `before` cursor of the page preceding the one starting at `firstId`.
   * 0 means that page is the newest one; null means there is none.
   */
  getNewerByIsbn(
    isbn: string,
    firstId: number,
    limit: number,
  ): Promise<number | null>;
}

function isbnStream(isbn: string) {
  return and(eq(entry.isbn, isbn), eq(entry.visibility, "public"));
}

export function createEntryStore(db: AppDatabase): EntryStore {
  return {
    async add(data) {
      try {
        const created = db.insert(entry).values(data).returning().get();
        return created ?? null;
      } catch (error) {
        console.error("Failed to add entry:", error);
        return null;
      }
    },

    async update(id, changes) {
      const updated = db
        .update(entry)
        .set(changes)
        .where(eq(entry.id, id))
        .returning()
        .get();

      if (!updated) {
        throw new Error(`Entry ${id} not found`);
      }
      return updated;
    },

    async delete(id) {
      db.delete(entry).where(eq(entry.id, id)).run();
    },

    async get(id) {
      return db.select().from(entry).where(eq(entry.id, id)).get() ?? null;
    },

    async getUserEntry(id, userId) {
      return (
        db
          .select()
          .from(entry)
          .where(and(eq(entry.id, id), eq(entry.userId, userId)))
          .get() ?? null
      );
    },

    async getByUser(userId, limit) {
      return db
        .select()
        .from(entry)
        .where(eq(entry.userId, userId))
        .orderBy(desc(entry.id))
        .limit(limit)
        .all();
    },

    async findByIsbn(isbn, before, limit) {
      const conditions = [isbnStream(isbn)];
      if (before > 0) {
        conditions.push(lt(entry.id, before));
      }

      return db
        .select()
        .from(entry)
        .where(and(...conditions))
        .orderBy(desc(entry.id))
        .limit(limit)
        .all();
    },

    async getOlderByIsbn(isbn, lastId) {
      if (lastId <= 0) {
        return null;
      }

      const older = db
        .select({ id: entry.id })
        .from(entry)
        .where(and(isbnStream(isbn), lt(entry.id, lastId)))
        .orderBy(desc(entry.id))
        .limit(1)
        .get();

      return older ? lastId : null;
    },

    async getNewerByIsbn(isbn, firstId, limit) {
      if (firstId <= 0) {
        return null;
      }

      // One row past the newer page tells us whether it is the newest page.
      const newer = db
        .select({ id: entry.id })
        .from(entry)
        .where(and(isbnStream(isbn), gt(entry.id, firstId)))
        .orderBy(asc(entry.id))
        .limit(limit + 1)
        .all();

      if (newer.length === 0) {
        return null;
      }
      return newer.length > limit ? newer[limit].id : 0;
    },
  };
}
