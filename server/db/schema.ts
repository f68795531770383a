import { relations, sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const READ_STATUSES = ["to-read", "reading", "finished"] as const;

export type ReadStatus = (typeof READ_STATUSES)[number];

/**
 * Profiles of signed-in users.
 * `profileSlug` names the user's public pages and their cache files, so it is
 * restricted to URL and filename safe characters when the user is created.
 */
export const user = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  profileSlug: text("profile_slug").notNull().unique(),
  name: text("name"),
  url: text("url"),
  micropubEndpoint: text("micropub_endpoint"),
  accessToken: text("access_token"),
  tokenScope: text("token_scope").notNull().default(""), // space-separated
  supportedVisibility: text("supported_visibility", { mode: "json" }).$type<
    string[]
  >(),
  lastMicropubResponse: text("last_micropub_response"),
  createdAt: integer("created_at", { mode: "timestamp_ms" })
    .default(sql`(cast(unixepoch('subsec') * 1000 as integer))`)
    .notNull(),
});

/**
 * One record of a user reading a book or article.
 * `canonicalUrl` is only written once the user's site accepted the post.
 */
export const entry = sqliteTable(
  "entries",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id")
      .notNull()
      .references(() => user.id, { onDelete: "cascade" }),
    readStatus: text("read_status", { enum: READ_STATUSES }).notNull(),
    title: text("title").notNull(),
    authors: text("authors").notNull().default(""),
    isbn: text("isbn").notNull().default(""), // ISBN-13 or empty
    doi: text("doi").notNull().default(""),
    category: text("category").notNull().default(""), // comma-separated tags
    visibility: text("visibility").notNull().default("public"),
    published: text("published"), // naive datetime as submitted
    tzOffset: integer("tz_offset").notNull().default(0),
    micropubResponse: text("micropub_response"),
    micropubSuccess: integer("micropub_success", { mode: "boolean" })
      .default(false)
      .notNull(),
    canonicalUrl: text("canonical_url"),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsec') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    index("idx_entries_user").on(t.userId, t.id),
    index("idx_entries_isbn").on(t.isbn, t.id),
  ],
);

/**
 * Books cited by entries, keyed by ISBN-13.
 * `entryCount` grows by one for every new entry citing the ISBN.
 */
export const book = sqliteTable("books", {
  isbn: text("isbn").primaryKey(),
  entryCount: integer("entry_count").notNull().default(1),
  createdAt: integer("created_at", { mode: "timestamp_ms" })
    .default(sql`(cast(unixepoch('subsec') * 1000 as integer))`)
    .notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" })
    .default(sql`(cast(unixepoch('subsec') * 1000 as integer))`)
    .notNull(),
});

export const userRelations = relations(user, ({ many }) => ({
  entries: many(entry),
}));

export const entryRelations = relations(entry, ({ one }) => ({
  user: one(user, {
    fields: [entry.userId],
    references: [user.id],
  }),
}));

export type User = typeof user.$inferSelect;
export type NewUser = typeof user.$inferInsert;
export type Entry = typeof entry.$inferSelect;
export type NewEntry = typeof entry.$inferInsert;
