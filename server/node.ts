import { serve } from "@hono/node-server";
import { createApp } from "@server/index";
import { openDatabase } from "@server/db/client";
import { createBookStore } from "@server/lib/books";
import { createEntryStore } from "@server/lib/entries";
import { loadConfig } from "@server/lib/env";
import { createMicropubClient } from "@server/lib/micropub-client";
import { createRenderCache } from "@server/lib/render-cache";
import { createUserStore } from "@server/lib/users";
import { entryFragment } from "@server/views/entry";
import { mkdir } from "node:fs/promises";
import path from "node:path";

const config = loadConfig();

await mkdir(path.dirname(config.DATABASE_PATH), { recursive: true });
await mkdir(config.CACHE_DIR, { recursive: true });

const db = openDatabase(config.DATABASE_PATH);
const entries = createEntryStore(db);
const users = createUserStore(db);

const app = createApp({
  deps: {
    entries,
    users,
    books: createBookStore(db),
    publisher: createMicropubClient(),
    cache: createRenderCache({
      cacheDir: config.CACHE_DIR,
      entries,
      users,
      render: entryFragment,
    }),
  },
  sessionSecret: config.SESSION_SECRET,
  sessionCookie: config.SESSION_COOKIE,
});

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log(`Server listening on http://localhost:${info.port}`);
});
