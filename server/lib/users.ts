import type { AppDatabase } from "@server/db/client";
import { user, type NewUser, type User } from "@server/db/schema";
import { eq } from "drizzle-orm";

export type UserChanges = Partial<Omit<NewUser, "id" | "createdAt">>;

export interface UserStore {
  add(data: NewUser): Promise<User>;
  get(id: number): Promise<User | null>;
  getBySlug(profileSlug: string): Promise<User | null>;
  update(id: number, changes: UserChanges): Promise<User>;
}

const PROFILE_SLUG = /^[a-z0-9][a-z0-9._-]*$/i;

export function isSafeProfileSlug(slug: string): boolean {
  return PROFILE_SLUG.test(slug) && !slug.includes("..");
}

export function createUserStore(db: AppDatabase): UserStore {
  return {
    async add(data) {
      if (!isSafeProfileSlug(data.profileSlug)) {
        throw new Error(`Invalid profile slug: ${data.profileSlug}`);
      }
      const created = db.insert(user).values(data).returning().get();
      if (!created) {
        throw new Error(`User ${data.profileSlug} was not created`);
      }
      return created;
    },

    async get(id) {
      return db.select().from(user).where(eq(user.id, id)).get() ?? null;
    },

    async getBySlug(profileSlug) {
      return (
        db.select().from(user).where(eq(user.profileSlug, profileSlug)).get() ??
        null
      );
    },

    async update(id, changes) {
      const updated = db
        .update(user)
        .set(changes)
        .where(eq(user.id, id))
        .returning()
        .get();

      if (!updated) {
        throw new Error(`User ${id} not found`);
      }
      return updated;
    },
  };
}

/**
 * Whether the user's Micropub token was granted the `delete` scope.
 */
export function hasMicropubDelete(tokenScope: string): boolean {
  return tokenScope.split(/\s+/).includes("delete");
}

export function getVisibilityOptions(profile: User): string[] {
  const supported = profile.supportedVisibility ?? [];
  return supported.length > 0 ? supported : ["public"];
}
