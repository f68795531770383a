import type { Entry, User } from "@server/db/schema";
import { READ_STATUS_LABELS, getCategoryArray } from "@server/lib/micropub-request";
import { entryPath, profilePath } from "@server/lib/paths";
import { html } from "hono/html";
import { layout, type Html } from "@server/views/layout";

function citation(entry: Entry): Html {
  const uid = entry.doi
    ? html` <span class="p-uid">${entry.doi}</span>`
    : entry.isbn
      ? html` <a class="p-uid" href="/isbn/${entry.isbn}">ISBN ${entry.isbn}</a>`
      : "";

  return html`<span class="p-read-of h-cite"
    ><cite class="p-name">${entry.title}</cite>${entry.authors
      ? html` by <span class="p-author">${entry.authors}</span>`
      : ""}${uid}</span
  >`;
}

/**
 * Public rendering of one entry. With `isCaching` set the owner-only
 * controls are left out, since the cached copy is served to everyone.
 */
export function entryFragment(
  entry: Entry,
  profile: User,
  isCaching: boolean,
): Html {
  const tags = getCategoryArray(entry.category);

  return html`<article class="h-entry" id="entry-${entry.id}">
  <p>
    <a class="p-author h-card" href="${profilePath(profile.profileSlug)}">${profile.name ?? profile.profileSlug}</a>
    <data class="p-read-status" value="${entry.readStatus}">${READ_STATUS_LABELS[entry.readStatus]}</data>:
    ${citation(entry)}
  </p>
  ${tags.length > 0
    ? html`<ul class="tags">${tags.map((tag) => html`<li class="p-category">${tag}</li>`)}</ul>`
    : ""}
  <footer>
    <a class="u-url" href="${entryPath(profile.profileSlug, entry.id)}">${entry.published ?? entry.createdAt.toISOString()}</a>
    ${entry.canonicalUrl
      ? html` <a class="u-syndication" href="${entry.canonicalUrl}">on ${profile.url ?? "my site"}</a>`
      : ""}
    ${isCaching
      ? ""
      : html` <a href="/delete/${entry.id}">Delete</a>${entry.canonicalUrl
          ? ""
          : html` <a href="/retry/${entry.id}">Retry publishing</a>`}`}
  </footer>
</article>`;
}

export function entryPage(body: Html): Html {
  return layout("Entry", body);
}

export function profilePage(profile: User, entries: Entry[]): Html {
  return layout(
    profile.name ?? profile.profileSlug,
    html`<h1>${profile.name ?? profile.profileSlug}</h1>
      ${entries.length === 0
        ? html`<p>Nothing here yet.</p>`
        : entries.map((entry) => entryFragment(entry, profile, true))}`,
  );
}

export type IsbnPageProps = {
  isbn: string;
  entries: Array<{ entry: Entry; profile: User }>;
  olderId: number | null;
  newerId: number | null;
};

export function isbnPage(props: IsbnPageProps): Html {
  const base = `/isbn/${encodeURIComponent(props.isbn)}`;

  return layout(
    `ISBN ${props.isbn}`,
    html`<h1>ISBN ${props.isbn}</h1>
      ${props.entries.length === 0
        ? html`<p>No one has posted about this ISBN yet.</p>`
        : props.entries.map(({ entry, profile }) =>
            entryFragment(entry, profile, true),
          )}
      <nav class="pagination">
        ${props.newerId === null
          ? ""
          : html`<a rel="prev" href="${props.newerId === 0 ? base : `${base}?before=${props.newerId}`}">Newer</a>`}
        ${props.olderId === null
          ? ""
          : html`<a rel="next" href="${base}?before=${props.olderId}">Older</a>`}
      </nav>`,
  );
}
