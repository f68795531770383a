import { zValidator } from "@hono/zod-validator";
import { READ_STATUSES, type User } from "@server/db/schema";
import {
  requireUser,
  sessionMiddleware,
  signedInUser,
  type AppEnv,
} from "@server/lib/middleware/require-auth";
import {
  createPost,
  deletePost,
  getIsbnStream,
  retryPost,
  type Deps,
} from "@server/lib/posts";
import { parseReadOf } from "@server/lib/micropub-request";
import { getVisibilityOptions, hasMicropubDelete } from "@server/lib/users";
import type { FormFields } from "@server/lib/validation";
import {
  entryFragment,
  entryPage,
  isbnPage,
  profilePage,
  type IsbnPageProps,
} from "@server/views/entry";
import { deletePage, newPostPage } from "@server/views/forms";
import { statusPage } from "@server/views/layout";
import { Hono } from "hono";
import { html, raw } from "hono/html";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";

export type AppOptions = {
  deps: Deps;
  sessionSecret: string;
  sessionCookie?: string;
};

const PROFILE_PAGE_SIZE = 50;

const newPostQuerySchema = z.object({
  "read-status": z.string().optional(),
  title: z.string().optional(),
  authors: z.string().optional(),
  isbn: z.string().optional(),
  doi: z.string().optional(),
  tags: z.string().optional(),
  "read-of": z.string().optional(),
});

const entryIdParamSchema = z.object({
  entryId: z.coerce.number().int().positive(),
});

const isbnQuerySchema = z.object({
  before: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) || 0 : 0)),
});

const notFoundPage = () =>
  statusPage("Not Found", "That page does not exist or is not yours.");

/**
 * Keeps a parsed form as plain text fields. Returns null when any field is
 * not text (e.g. an uploaded file), which no form here accepts.
 */
function toFormFields(body: Record<string, unknown>): FormFields | null {
  const fields: FormFields = {};

  for (const [key, value] of Object.entries(body)) {
    if (typeof value !== "string") {
      return null;
    }
    fields[key] = value;
  }
  return fields;
}

export function createApp({
  deps,
  sessionSecret,
  sessionCookie = "session",
}: AppOptions) {
  const app = new Hono<AppEnv>();

  app.use(
    "*",
    sessionMiddleware({
      users: deps.users,
      secret: sessionSecret,
      cookieName: sessionCookie,
    }),
  );
  app.use("/new", requireUser);
  app.use("/retry/*", requireUser);
  app.use("/delete", requireUser);
  app.use("/delete/*", requireUser);

  app.notFound((c) => c.html(notFoundPage(), 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException && error.status === 401) {
      return c.html(statusPage("Unauthorized", "Please sign in first."), 401);
    }
    console.error("Unhandled error:", error);
    return c.html(
      statusPage("Server Error", "Something went wrong. Please try again."),
      500,
    );
  });

  const entryIdValidator = zValidator(
    "param",
    entryIdParamSchema,
    (result, c) => {
      if (!result.success) {
        return c.html(notFoundPage(), 404);
      }
    },
  );

  const route = app
    .get("/new", zValidator("query", newPostQuerySchema), (c) => {
      const user = signedInUser(c.get("user"));
      const query = c.req.valid("query");

      const requested = query["read-status"]?.toLowerCase() ?? "";
      const readStatus = READ_STATUSES.find((status) => status === requested);
      const visibilityOptions = getVisibilityOptions(user);

      // A full citation replaces the separate title, authors and isbn.
      const cited = query["read-of"]
        ? parseReadOf(query["read-of"])
        : {
            title: query.title?.trim() ?? "",
            authors: query.authors?.trim() ?? "",
            uid: query.isbn?.trim() ?? "",
          };

      return c.html(
        newPostPage({
          user,
          values: {
            readStatus: readStatus ?? "to-read",
            title: cited.title,
            authors: cited.authors,
            isbn: cited.uid,
            doi: query.doi?.trim() ?? "",
            tags: query.tags?.trim() ?? "",
            visibility: visibilityOptions[0],
            published: "",
          },
          visibilityOptions,
          errors: [],
        }),
      );
    })
    .post("/new", async (c) => {
      const user = signedInUser(c.get("user"));
      const fields = toFormFields(await c.req.parseBody());
      if (!fields) {
        return c.html(statusPage("Bad Request", "Unexpected form data."), 400);
      }

      const result = await createPost(deps, user, fields);

      switch (result.status) {
        case "invalid-request":
          return c.html(
            statusPage("Bad Request", "The form contained unexpected fields."),
            400,
          );
        case "invalid":
          return c.html(
            newPostPage({
              user,
              values: {
                readStatus: fields.read_status ?? "",
                title: fields.title ?? "",
                authors: fields.authors ?? "",
                isbn: fields.isbn ?? "",
                doi: fields.doi ?? "",
                tags: fields.category ?? "",
                visibility: fields.visibility ?? "",
                published: fields.published ?? "",
              },
              visibilityOptions: getVisibilityOptions(user),
              errors: result.errors,
            }),
          );
        case "failed":
          return c.html(
            statusPage("Server Error", "The post could not be saved."),
            500,
          );
        case "created":
          return c.redirect(result.redirectUrl, 302);
      }
    })
    .get("/retry/:entryId", entryIdValidator, async (c) => {
      const user = signedInUser(c.get("user"));
      const { entryId } = c.req.valid("param");

      const result = await retryPost(deps, user, entryId);

      switch (result.status) {
        case "not-found":
          return c.html(notFoundPage(), 404);
        case "already-published":
          return c.html(
            statusPage(
              "Error",
              html`This post has already been published on your site.
                <a href="${result.canonicalUrl}" target="_blank" rel="noopener"
                  >View the post</a
                >.`,
            ),
            400,
          );
        case "endpoint-unsupported":
          return c.html(
            statusPage(
              "Micropub Error",
              "Your site does not appear to support Micropub.",
            ),
            400,
          );
        case "attempted":
          return c.redirect(result.redirectUrl, 302);
      }
    })
    .get("/delete/:entryId", entryIdValidator, async (c) => {
      const user = signedInUser(c.get("user"));
      const { entryId } = c.req.valid("param");

      const entry = await deps.entries.getUserEntry(entryId, user.id);
      if (!entry) {
        return c.html(notFoundPage(), 404);
      }

      return c.html(
        deletePage({
          entry,
          profile: user,
          errors: [],
          isMicropubPost: entry.micropubSuccess && entry.canonicalUrl !== null,
          hasMicropubDelete: hasMicropubDelete(user.tokenScope),
        }),
      );
    })
    .post("/delete", async (c) => {
      const user = signedInUser(c.get("user"));
      const fields = toFormFields(await c.req.parseBody());
      if (!fields) {
        return c.html(statusPage("Bad Request", "Unexpected form data."), 400);
      }

      const result = await deletePost(deps, user, fields);

      switch (result.status) {
        case "invalid-request":
          return c.html(
            statusPage("Bad Request", "The form contained unexpected fields."),
            400,
          );
        case "invalid":
          if (!result.entry) {
            return c.html(notFoundPage(), 404);
          }
          return c.html(
            deletePage({
              entry: result.entry,
              profile: user,
              errors: result.errors,
              isMicropubPost:
                result.entry.micropubSuccess &&
                result.entry.canonicalUrl !== null,
              hasMicropubDelete: hasMicropubDelete(user.tokenScope),
            }),
          );
        case "not-found":
          return c.html(notFoundPage(), 404);
        case "deleted":
          return c.redirect(result.redirectUrl, 302);
      }
    })
    .get("/isbn/:isbn", zValidator("query", isbnQuerySchema), async (c) => {
      const isbn = c.req.param("isbn");
      const { before } = c.req.valid("query");

      const stream = await getIsbnStream(deps.entries, isbn, before);

      const profiles = new Map<number, User | null>();
      const entries: IsbnPageProps["entries"] = [];
      for (const entry of stream.entries) {
        if (!profiles.has(entry.userId)) {
          profiles.set(entry.userId, await deps.users.get(entry.userId));
        }
        const profile = profiles.get(entry.userId);
        if (profile) {
          entries.push({ entry, profile });
        }
      }

      return c.html(
        isbnPage({
          isbn,
          entries,
          olderId: stream.olderId,
          newerId: stream.newerId,
        }),
      );
    })
    .get("/users/:slug", async (c) => {
      const profile = await deps.users.getBySlug(c.req.param("slug"));
      if (!profile) {
        return c.html(notFoundPage(), 404);
      }

      const isOwner = c.get("user")?.id === profile.id;
      const entries = (
        await deps.entries.getByUser(profile.id, PROFILE_PAGE_SIZE)
      ).filter((entry) => isOwner || entry.visibility === "public");

      return c.html(profilePage(profile, entries));
    })
    .get("/users/:slug/:entryId", entryIdValidator, async (c) => {
      const profile = await deps.users.getBySlug(c.req.param("slug"));
      const { entryId } = c.req.valid("param");

      const entry = profile ? await deps.entries.get(entryId) : null;
      if (!profile || !entry || entry.userId !== profile.id) {
        return c.html(notFoundPage(), 404);
      }

      const isOwner = c.get("user")?.id === profile.id;
      if (!isOwner && entry.visibility === "private") {
        return c.html(notFoundPage(), 404);
      }

      if (!isOwner) {
        const cached = await deps.cache.readCachedEntry(
          profile.profileSlug,
          entry.id,
        );
        if (cached !== null) {
          return c.html(entryPage(raw(cached)));
        }
      }

      return c.html(entryPage(entryFragment(entry, profile, !isOwner)));
    });

  return route;
}

export type AppType = ReturnType<typeof createApp>;
