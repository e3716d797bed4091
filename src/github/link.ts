const ENTRY = /<([^>]*)>([^<]*)/g;
const REL = /\brel\s*=\s*"?([^";,]+)"?/;

/**
 * Extracts the page number of the `rel="next"` entry of a `link` header,
 * e.g. `<https://api.github.com/orgs/acme/repos?page=2>; rel="next", <...>; rel="last"`.
 * Returns null when the header is absent or advertises no next page.
 */
export function parseNextPage(header: string | number | undefined): number | null {
  if (typeof header !== "string" || !header) {
    return null;
  }
  for (const [, url, params] of header.matchAll(ENTRY)) {
    const rels = REL.exec(params)?.[1]?.trim().split(/\s+/) ?? [];
    if (!rels.includes("next")) {
      continue;
    }
    const page = new URL(url, "https://localhost").searchParams.get("page");
    const value = page === null ? NaN : Number(page);
    return Number.isInteger(value) && value > 0 ? value : null;
  }
  return null;
}
