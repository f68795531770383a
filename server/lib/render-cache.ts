import type { Entry, User } from "@server/db/schema";
import type { EntryStore } from "@server/lib/entries";
import { isSafeProfileSlug, type UserStore } from "@server/lib/users";
import type { Html } from "@server/views/layout";
import { readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

export type CacheResult =
  | { ok: true; path: string }
  | { ok: false; reason: string };

export interface RenderCache {
  cacheEntry(id: number): Promise<CacheResult>;
  uncacheEntry(id: number): Promise<CacheResult>;
  readCachedEntry(profileSlug: string, id: number): Promise<string | null>;
}

export type RenderEntry = (
  entry: Entry,
  profile: User,
  isCaching: boolean,
) => Html;

export type RenderCacheOptions = {
  cacheDir: string;
  entries: EntryStore;
  users: UserStore;
  render: RenderEntry;
};

/**
 * `<cacheDir>/<profileSlug>-<id>.html`. The id is the only hyphen-free
 * numeric suffix, so distinct (slug, id) pairs never share a file.
 */
export function cacheFilePath(
  cacheDir: string,
  profileSlug: string,
  id: number,
): string {
  if (!isSafeProfileSlug(profileSlug)) {
    throw new Error(`Unsafe profile slug: ${profileSlug}`);
  }
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Invalid entry id: ${id}`);
  }
  return path.join(cacheDir, `${profileSlug}-${id}.html`);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Pre-rendered public entry fragments on disk. Every failure is logged and
 * returned as `{ ok: false }`; nothing here throws to the caller.
 */
export function createRenderCache(options: RenderCacheOptions): RenderCache {
  const { cacheDir, entries, users, render } = options;

  async function locate(
    id: number,
  ): Promise<{ entry: Entry; profile: User; filePath: string }> {
    const entry = await entries.get(id);
    if (!entry) {
      throw new Error("Could not load entry");
    }

    const profile = await users.get(entry.userId);
    if (!profile) {
      throw new Error("Could not load user");
    }

    return {
      entry,
      profile,
      filePath: cacheFilePath(cacheDir, profile.profileSlug, id),
    };
  }

  return {
    async cacheEntry(id) {
      try {
        const { entry, profile, filePath } = await locate(id);
        const src = await render(entry, profile, true);
        await writeFile(filePath, src.toString().trim(), "utf8");
        return { ok: true, path: filePath };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`Error caching entry ${id}: ${reason}`);
        return { ok: false, reason };
      }
    },

    async uncacheEntry(id) {
      try {
        const { filePath } = await locate(id);
        await rm(filePath, { force: true });
        return { ok: true, path: filePath };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`Error un-caching entry ${id}: ${reason}`);
        return { ok: false, reason };
      }
    },

    async readCachedEntry(profileSlug, id) {
      try {
        return await readFile(cacheFilePath(cacheDir, profileSlug, id), "utf8");
      } catch (error) {
        if (!isMissingFile(error)) {
          console.warn(`Could not read cached entry ${id}:`, error);
        }
        return null;
      }
    },
  };
}
