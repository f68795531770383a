import type { Entry, User } from "@server/db/schema";
import type { BookStore } from "@server/lib/books";
import type { EntryChanges, EntryStore } from "@server/lib/entries";
import { toIsbn13 } from "@server/lib/isbn";
import type {
  MicropubResponse,
  PublisherClient,
} from "@server/lib/micropub-client";
import {
  buildPublishRequest,
  normalizeSeparatedString,
} from "@server/lib/micropub-request";
import { entryPath, profilePath } from "@server/lib/paths";
import type { RenderCache } from "@server/lib/render-cache";
import type { UserStore } from "@server/lib/users";
import {
  DELETE_POST_FIELDS,
  parseNewPost,
  validateDeletePost,
  validatePostRequest,
  type FormFields,
} from "@server/lib/validation";

/**
 * Collaborators every post handler works with. Passed explicitly so tests can
 * swap any of them.
 */
export type Deps = {
  entries: EntryStore;
  books: BookStore;
  users: UserStore;
  publisher: PublisherClient;
  cache: RenderCache;
};

export const ISBN_PAGE_SIZE = 2;

export type CreatePostResult =
  | { status: "invalid-request" }
  | { status: "invalid"; errors: string[] }
  | { status: "failed" }
  | { status: "created"; entry: Entry; redirectUrl: string };

export type RetryPostResult =
  | { status: "not-found" }
  | { status: "already-published"; canonicalUrl: string }
  | { status: "endpoint-unsupported" }
  | { status: "attempted"; entry: Entry; redirectUrl: string };

export type DeletePostResult =
  | { status: "invalid-request" }
  | { status: "invalid"; errors: string[]; entry: Entry | null }
  | { status: "not-found" }
  | { status: "deleted"; redirectUrl: string };

export type IsbnStream = {
  isbn: string;
  before: number;
  entries: Entry[];
  olderId: number | null;
  newerId: number | null;
};

async function postToEndpoint(
  publisher: PublisherClient,
  ...args: Parameters<PublisherClient["post"]>
): Promise<MicropubResponse> {
  try {
    return await publisher.post(...args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Micropub request to ${args[0]} failed:`, message);
    return { status: 0, body: "", headers: {}, error: message };
  }
}

/**
 * The `Location` a Micropub endpoint answered with, when it is an absolute
 * http(s) URL that can be linked from public pages.
 */
export function toCanonicalUrl(location: string | undefined): string | null {
  if (!location) {
    return null;
  }
  if (!URL.canParse(location)) {
    console.warn(`Ignoring unparseable Micropub Location: ${location}`);
    return null;
  }

  const { protocol } = new URL(location);
  if (protocol !== "http:" && protocol !== "https:") {
    console.warn(`Ignoring ${protocol} Micropub Location: ${location}`);
    return null;
  }
  return location;
}

/**
 * Sends the entry to the user's Micropub endpoint and records the outcome.
 *
 * An http(s) `Location` header marks the entry published; anything else
 * leaves it retryable with the raw response stored. Entries that already have a
 * canonical URL are returned untouched.
 *
 * Two overlapping calls for the same entry can both reach the endpoint;
 * there is no lock around the request.
 */
export async function publishEntry(
  deps: Deps,
  profile: User,
  entry: Entry,
): Promise<Entry> {
  if (entry.canonicalUrl || !profile.micropubEndpoint) {
    return entry;
  }

  const response = await postToEndpoint(
    deps.publisher,
    profile.micropubEndpoint,
    buildPublishRequest(entry),
    profile.accessToken ?? "",
    true,
  );
  const responseBody = response.body.trim();

  await deps.users.update(profile.id, { lastMicropubResponse: responseBody });

  const changes: EntryChanges = { micropubResponse: responseBody };
  const location = toCanonicalUrl(response.headers["Location"]?.[0]);
  if (location) {
    changes.canonicalUrl = location;
    changes.micropubSuccess = true;
  }

  const updated = await deps.entries.update(entry.id, changes);
  if (updated.canonicalUrl) {
    // Refresh the public copy so it links to the syndicated post.
    await deps.cache.cacheEntry(updated.id);
  }
  return updated;
}

export async function createPost(
  deps: Deps,
  profile: User,
  data: FormFields,
): Promise<CreatePostResult> {
  if (!validatePostRequest(data)) {
    return { status: "invalid-request" };
  }

  const parsed = parseNewPost(data);
  if (!parsed.success) {
    return { status: "invalid", errors: parsed.errors };
  }
  const input = parsed.data;

  // Book linkage follows the ISBN field alone, whatever the DOI says.
  const isbn = input.isbn ? toIsbn13(input.isbn) : null;
  if (isbn) {
    await deps.books.addOrIncrement({ isbn });
  }

  const entry = await deps.entries.add({
    userId: profile.id,
    readStatus: input.read_status,
    title: input.title,
    authors: input.authors,
    isbn: isbn ?? "",
    doi: input.doi,
    category: normalizeSeparatedString(input.category),
    visibility: input.visibility || "public",
    published: input.published || null,
    tzOffset: input.tz_offset,
  });

  if (!entry) {
    return { status: "failed" };
  }

  await deps.cache.cacheEntry(entry.id);

  const localUrl = entryPath(profile.profileSlug, entry.id);
  if (!profile.micropubEndpoint) {
    return { status: "created", entry, redirectUrl: localUrl };
  }

  const published = await publishEntry(deps, profile, entry);
  return {
    status: "created",
    entry: published,
    redirectUrl: published.canonicalUrl ?? localUrl,
  };
}

export async function retryPost(
  deps: Deps,
  profile: User,
  entryId: number,
): Promise<RetryPostResult> {
  const entry = await deps.entries.getUserEntry(entryId, profile.id);
  if (!entry) {
    return { status: "not-found" };
  }

  if (entry.canonicalUrl) {
    return { status: "already-published", canonicalUrl: entry.canonicalUrl };
  }

  if (!profile.micropubEndpoint) {
    return { status: "endpoint-unsupported" };
  }

  const published = await publishEntry(deps, profile, entry);
  return {
    status: "attempted",
    entry: published,
    redirectUrl:
      published.canonicalUrl ?? entryPath(profile.profileSlug, entry.id),
  };
}

function parseEntryId(value: string | undefined): number {
  const id = Number.parseInt(value ?? "", 10);
  return Number.isInteger(id) && id > 0 ? id : 0;
}

/**
 * Deletes an entry the user owns. When the user opts in and the entry has a
 * canonical URL, a Micropub delete goes out first; its response is only
 * recorded on the user and never stops the local delete.
 */
export async function deletePost(
  deps: Deps,
  profile: User,
  data: FormFields,
): Promise<DeletePostResult> {
  if (!validatePostRequest(data, DELETE_POST_FIELDS)) {
    return { status: "invalid-request" };
  }

  const entryId = parseEntryId(data.id);
  const errors = validateDeletePost(data);
  if (errors.length > 0) {
    const entry = entryId
      ? await deps.entries.getUserEntry(entryId, profile.id)
      : null;
    return { status: "invalid", errors, entry };
  }

  const entry = entryId
    ? await deps.entries.getUserEntry(entryId, profile.id)
    : null;
  if (!entry) {
    return { status: "not-found" };
  }

  if (
    profile.micropubEndpoint &&
    data.mp_delete === "yes" &&
    entry.canonicalUrl
  ) {
    const response = await postToEndpoint(
      deps.publisher,
      profile.micropubEndpoint,
      { action: "delete", url: entry.canonicalUrl },
      profile.accessToken ?? "",
    );
    await deps.users.update(profile.id, {
      lastMicropubResponse: response.body.trim(),
    });
  }

  await deps.cache.uncacheEntry(entry.id);
  await deps.entries.delete(entry.id);

  return { status: "deleted", redirectUrl: profilePath(profile.profileSlug) };
}

export async function getIsbnStream(
  entries: EntryStore,
  isbn: string,
  before: number,
): Promise<IsbnStream> {
  const page = await entries.findByIsbn(isbn, before, ISBN_PAGE_SIZE);

  const firstId = page.at(0)?.id ?? 0;
  const lastId = page.at(-1)?.id ?? 0;

  const olderId = await entries.getOlderByIsbn(isbn, lastId);
  const newerId = await entries.getNewerByIsbn(isbn, firstId, ISBN_PAGE_SIZE);

  return { isbn, before, entries: page, olderId, newerId };
}
