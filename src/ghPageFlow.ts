import { pageFlow } from "sflow";

export type PageParams = { page: number; per_page: number };

/**
 * Helper to paginate through GitHub API endpoints that support pagination.
 * Stops after the first page holding fewer than `per_page` items.
 *
 * @example
 * const members = await ghPageFlow((page) => gh.orgs.listMembers({ org: "acme", ...page })).toArray();
 *
 * @see https://docs.github.com/en/rest/guides/traversing-with-pagination
 */
export function ghPageFlow<Item>(
  fetchPage: (params: PageParams) => Promise<{ data: Item[] }>,
  { per_page = 100, startPage = 1 } = {},
) {
  return pageFlow(startPage, async (page: number) => {
    const { data } = await fetchPage({ page, per_page });

    return { data, next: data.length >= per_page ? page + 1 : null };
  }).flat();
}
