import pMap from "p-map";
import { ghRequest } from "./errors";
import type { GhRest } from "./gh";
import { createLogger } from "./logger";
import type { ContributionRecord, EnrichedUser } from "./types";
import { parseTimestamp } from "./utils/timestamp";

const logger = createLogger("enricher");

export const DEFAULT_LOOKUP_CONCURRENCY = 20;

/**
 * Look up the profile of every contributor, at most `concurrency` at a time,
 * then drop blocklisted logins and internal names.
 *
 * Resolves only after every lookup succeeded; the first failure rejects.
 */
export async function enrichContributors(
  record: ContributionRecord,
  {
    gh,
    blocklist,
    internalNames,
    concurrency = DEFAULT_LOOKUP_CONCURRENCY,
  }: {
    gh: GhRest;
    blocklist: ReadonlySet<string>;
    internalNames: ReadonlySet<string>;
    concurrency?: number;
  },
): Promise<Map<string, EnrichedUser>> {
  const contributors = Object.entries(record).map(([login, times]) => ({ login, times: times.map(parseTimestamp) }));

  const enriched = await pMap(
    contributors,
    async ({ login, times }): Promise<EnrichedUser> => {
      logger.info(`Looking up ${login}`);
      const { data } = await ghRequest(`GET USER ${login}`, gh.users.getByUsername({ username: login }));
      return { login, name: data.name || login, url: data.html_url, times };
    },
    { concurrency },
  );

  const users = new Map<string, EnrichedUser>();
  for (const user of enriched) {
    if (blocklist.has(user.login)) {
      logger.debug(`Drop blocklisted ${user.login}`);
      continue;
    }
    if (internalNames.has(user.name)) {
      logger.debug(`Drop internal name ${user.name} (${user.login})`);
      continue;
    }
    users.set(user.login, user);
  }
  return users;
}
