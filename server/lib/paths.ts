export function entryPath(profileSlug: string, entryId: number): string {
  return `/users/${encodeURIComponent(profileSlug)}/${entryId}`;
}

export function profilePath(profileSlug: string): string {
  return `/users/${encodeURIComponent(profileSlug)}`;
}
