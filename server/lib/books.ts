import type { AppDatabase } from "@server/db/client";
import { book } from "@server/db/schema";
import { sql } from "drizzle-orm";

export interface BookStore {
  addOrIncrement(data: { isbn: string }): Promise<void>;
}

export function createBookStore(db: AppDatabase): BookStore {
  return {
    async addOrIncrement({ isbn }) {
      const now = new Date();

      // Insert or bump in one statement.
      db.insert(book)
        .values({ isbn, entryCount: 1, createdAt: now, updatedAt: now })
        .onConflictDoUpdate({
          target: book.isbn,
          set: {
            entryCount: sql`${book.entryCount} + 1`,
            updatedAt: now,
          },
        })
        .run();
    },
  };
}
