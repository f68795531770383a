import type { Entry, ReadStatus } from "@server/db/schema";
import { isMatch } from "date-fns";

export const READ_STATUS_LABELS: Record<ReadStatus, string> = {
  "to-read": "Want to read",
  reading: "Currently reading",
  finished: "Finished reading",
};

export type MicropubCitation = {
  type: ["h-cite"];
  properties: {
    name: [string];
    author?: [string];
    uid?: [string];
  };
};

export type MicropubCreateRequest = {
  type: ["h-entry"];
  properties: {
    summary: [string];
    "read-status": [ReadStatus];
    "read-of": [MicropubCitation];
    visibility: [string];
    published?: [string];
    category?: string[];
  };
};

export type MicropubDeleteRequest = {
  action: "delete";
  url: string;
};

export type MicropubRequest = MicropubCreateRequest | MicropubDeleteRequest;

export type PublishableEntry = Pick<
  Entry,
  | "readStatus"
  | "title"
  | "authors"
  | "isbn"
  | "doi"
  | "category"
  | "visibility"
  | "published"
  | "tzOffset"
>;

/**
 * Splits a comma-separated tag string into trimmed, non-empty, unique tags in
 * their original order.
 */
export function getCategoryArray(value: string): string[] {
  const tags = value
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag !== "");
  return [...new Set(tags)];
}

export function normalizeSeparatedString(value: string): string {
  return getCategoryArray(value).join(",");
}

const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/;

/**
 * True for a wall-clock datetime as a `datetime-local` input submits it
 * ("2024-05-01T09:30", seconds optional) that names a real calendar time.
 * Values carrying their own offset or zone are rejected.
 */
export function isNaiveDatetime(value: string): boolean {
  if (!NAIVE_DATETIME.test(value)) {
    return false;
  }
  return value.length === 16
    ? isMatch(value, "yyyy-MM-dd'T'HH:mm")
    : isMatch(value, "yyyy-MM-dd'T'HH:mm:ss");
}

/**
 * Turns a naive datetime ("2024-05-01T09:30") into an ISO 8601 timestamp with
 * an explicit offset. `offsetMinutes` follows the browser convention of
 * `Date#getTimezoneOffset()`: minutes *behind* UTC, so 300 means UTC-05:00.
 *
 * The wall-clock part is copied as submitted, never read through the
 * server's own time zone.
 */
export function getDatetimeWithOffset(
  datetime: string,
  offsetMinutes: number,
): string {
  if (!isNaiveDatetime(datetime)) {
    throw new RangeError(`Invalid datetime: ${datetime}`);
  }

  const wallClock = datetime.length === 16 ? `${datetime}:00` : datetime;
  const utcOffset = -offsetMinutes;
  const sign = utcOffset < 0 ? "-" : "+";
  const hours = String(Math.floor(Math.abs(utcOffset) / 60)).padStart(2, "0");
  const minutes = String(Math.abs(utcOffset) % 60).padStart(2, "0");

  return `${wallClock}${sign}${hours}:${minutes}`;
}

export type ReadOf = {
  title: string;
  authors: string;
  uid: string;
};

const READ_OF_ISBN = /,\s*isbn:?\s*(\S+)$/i;

/**
 * Reads a citation in the summary form ("Dune by Frank Herbert, ISBN:
 * 9780441013593") back into its parts. Missing parts come back empty.
 */
export function parseReadOf(value: string): ReadOf {
  let rest = value.trim();
  let uid = "";

  const isbn = rest.match(READ_OF_ISBN);
  if (isbn) {
    uid = isbn[1];
    rest = rest.slice(0, isbn.index ?? rest.length).trim();
  }

  const by = rest.lastIndexOf(" by ");
  if (by === -1) {
    return { title: rest, authors: "", uid };
  }
  return {
    title: rest.slice(0, by).trim(),
    authors: rest.slice(by + " by ".length).trim(),
    uid,
  };
}

/**
 * Maps an entry onto the Micropub create request sent to the user's site.
 * A DOI takes precedence over the ISBN for both the citation uid and the
 * summary suffix.
 */
export function buildPublishRequest(
  entry: PublishableEntry,
): MicropubCreateRequest {
  let summary = `${READ_STATUS_LABELS[entry.readStatus]}: ${entry.title}`;

  const cite: MicropubCitation = {
    type: ["h-cite"],
    properties: {
      name: [entry.title],
    },
  };

  if (entry.authors) {
    cite.properties.author = [entry.authors];
    summary += ` by ${entry.authors}`;
  }

  if (entry.doi) {
    const doi = entry.doi.toLowerCase().startsWith("doi:")
      ? entry.doi
      : `doi:${entry.doi}`;
    cite.properties.uid = [doi];
    summary += `, ${doi}`;
  } else if (entry.isbn) {
    cite.properties.uid = [`isbn:${entry.isbn}`];
    summary += `, ISBN: ${entry.isbn}`;
  }

  const request: MicropubCreateRequest = {
    type: ["h-entry"],
    properties: {
      summary: [summary],
      "read-status": [entry.readStatus],
      "read-of": [cite],
      visibility: [entry.visibility],
    },
  };

  if (entry.published) {
    request.properties.published = [
      getDatetimeWithOffset(entry.published, entry.tzOffset),
    ];
  }

  if (entry.category) {
    request.properties.category = getCategoryArray(entry.category);
  }

  return request;
}
