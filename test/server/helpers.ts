import type { AppDatabase } from "@server/db/client";
import { openDatabase } from "@server/db/client";
import type { NewUser, User } from "@server/db/schema";
import { createApp } from "@server/index";
import { createBookStore } from "@server/lib/books";
import { createEntryStore } from "@server/lib/entries";
import type {
  MicropubResponse,
  PublisherClient,
} from "@server/lib/micropub-client";
import type { Deps } from "@server/lib/posts";
import { createRenderCache } from "@server/lib/render-cache";
import { createUserStore } from "@server/lib/users";
import { entryFragment } from "@server/views/entry";
import { Hono } from "hono";
import { setSignedCookie } from "hono/cookie";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { vi, type Mock } from "vitest";

export const TEST_SESSION_SECRET = "test-secret-for-sessions";

export interface TestContext {
  db: AppDatabase;
  cacheDir: string;
  deps: Deps;
  publisher: { post: Mock<PublisherClient["post"]> };
  app: ReturnType<typeof createApp>;
  cleanup: () => Promise<void>;
}

export interface TestUser {
  user: User;
  sessionCookie: string;
}

export function micropubResponse(
  overrides: Partial<MicropubResponse> = {},
): MicropubResponse {
  return { status: 202, body: "", headers: {}, ...overrides };
}

/**
 * Fresh in-memory database, temporary cache directory and a fake Micropub
 * endpoint, wired into the real app.
 */
export async function createTestContext(): Promise<TestContext> {
  const db = openDatabase(":memory:");
  const cacheDir = await mkdtemp(path.join(tmpdir(), "reading-log-cache-"));

  const entries = createEntryStore(db);
  const users = createUserStore(db);
  const publisher = {
    post: vi.fn<PublisherClient["post"]>(async () => micropubResponse()),
  };

  const deps: Deps = {
    entries,
    users,
    books: createBookStore(db),
    publisher,
    cache: createRenderCache({
      cacheDir,
      entries,
      users,
      render: entryFragment,
    }),
  };

  return {
    db,
    cacheDir,
    deps,
    publisher,
    app: createApp({ deps, sessionSecret: TEST_SESSION_SECRET }),
    cleanup: () => rm(cacheDir, { recursive: true, force: true }),
  };
}

/**
 * Issues a session cookie the same way the sign-in flow would and returns the
 * `name=value` pair for a Cookie header.
 */
export async function createSessionCookie(userId: number): Promise<string> {
  const issuer = new Hono();
  issuer.get("/", async (c) => {
    await setSignedCookie(c, "session", String(userId), TEST_SESSION_SECRET);
    return c.text("ok");
  });

  const response = await issuer.request("/");
  const setCookie = response.headers.get("set-cookie");
  if (!setCookie) {
    throw new Error("No session cookie issued");
  }
  return setCookie.split(";")[0];
}

export async function createTestUser(
  ctx: TestContext,
  overrides: Partial<NewUser> & Pick<NewUser, "profileSlug">,
): Promise<TestUser> {
  const user = await ctx.deps.users.add({
    name: overrides.profileSlug,
    url: `https://${overrides.profileSlug}.example`,
    accessToken: "test-token",
    tokenScope: "create delete",
    ...overrides,
  });

  return { user, sessionCookie: await createSessionCookie(user.id) };
}

export function postForm(
  ctx: TestContext,
  pathname: string,
  fields: Record<string, string>,
  cookie?: string,
) {
  return ctx.app.request(pathname, {
    method: "POST",
    headers: cookie ? { Cookie: cookie } : {},
    body: new URLSearchParams(fields),
  });
}

export function get(ctx: TestContext, pathname: string, cookie?: string) {
  return ctx.app.request(pathname, {
    headers: cookie ? { Cookie: cookie } : {},
  });
}
