import type { EnrichedUser, TimeRange } from "./types";
import { formatTimestamp, startOfUtcYear } from "./utils/timestamp";

export const DEFAULT_START_YEAR = 2014;

export type RankedContributor = { user: EnrichedUser; count: number };

/**
 * Count each user's commits strictly inside the range, most commits first,
 * equal counts by login. Users without commits in range are left out.
 */
export function countContributions(users: Iterable<EnrichedUser>, { from, to }: TimeRange): RankedContributor[] {
  const ranked: RankedContributor[] = [];
  for (const user of users) {
    const count = user.times.filter((t) => t.getTime() > from.getTime() && t.getTime() < to.getTime()).length;
    if (count) ranked.push({ user, count });
  }
  return ranked.sort(
    (a, b) => b.count - a.count || (a.user.login < b.user.login ? -1 : a.user.login > b.user.login ? 1 : 0),
  );
}

export function formatContributors(users: Iterable<EnrichedUser>, range: TimeRange) {
  const ranked = countContributions(users, range);
  const total = ranked.reduce((sum, { count }) => sum + count, 0);
  const links = ranked.map(({ user, count }) => `[${user.name}](${user.url}) (${count})`);
  return `${ranked.length} contributors, ${total} commits\n\n` + links.join(", ");
}

export function formatContributorsReport({
  users,
  organization,
  repos,
  now = new Date(),
  startYear = DEFAULT_START_YEAR,
}: {
  users: Map<string, EnrichedUser>;
  organization: string;
  repos: string[];
  now?: Date;
  startYear?: number;
}) {
  const all = [...users.values()];
  const fromRepos = repos.map((repo) => `[${repo}](https://github.com/${organization}/${repo})`);

  let out = `
Last generated at ${formatTimestamp(now)}.

Contributions from: ${fromRepos.join(", ")}.

# All-Time External Contributors

${formatContributors(all, { from: startOfUtcYear(startYear), to: now })}

# By Year
`;
  for (let year = now.getUTCFullYear(); year >= startYear; year--) {
    out += `## ${year}

${formatContributors(all, { from: startOfUtcYear(year), to: startOfUtcYear(year + 1) })}

`;
  }
  return out;
}
