import { z } from "zod";
import { ghRequest, inputFailure } from "./errors";
import type { GhRest } from "./gh";
import { ghPageFlow } from "./ghPageFlow";
import { createLogger } from "./logger";
import type { ContributionRecord, FilterSet } from "./types";
import { formatTimestamp } from "./utils/timestamp";

const logger = createLogger("collector");

export const DEFAULT_MERGE_MESSAGE_PREFIX = "Merge pull request ";

const zCommitSummary = z.object({
  sha: z.string(),
  parents: z.object({ sha: z.string() }).array(),
  author: z.object({ login: z.string().optional() }).nullable(),
  commit: z.object({
    message: z.string(),
    author: z
      .object({
        name: z.string().optional(),
        email: z.string().optional(),
        date: z.string().optional(),
      })
      .nullable(),
  }),
});
export type CommitSummary = z.infer<typeof zCommitSummary>;

export type CommitExclusionReason =
  | "root-commit"
  | "no-login"
  | "organization-member"
  | "merge-commit"
  | "internal-name"
  | "internal-email"
  | "internal-domain";

/**
 * Why a commit does not count as an external contribution, or null if it does.
 * Root commits never count, whoever authored them.
 */
export function commitExclusionReason(
  commit: CommitSummary,
  {
    filters,
    members,
    mergeMessagePrefix = DEFAULT_MERGE_MESSAGE_PREFIX,
  }: { filters: FilterSet; members: ReadonlySet<string>; mergeMessagePrefix?: string },
): CommitExclusionReason | null {
  const login = commit.author?.login ?? "";
  const name = commit.commit.author?.name ?? "";
  const email = commit.commit.author?.email ?? "";

  if (commit.parents.length === 0) return "root-commit";
  if (!login) return "no-login";
  if (members.has(login)) return "organization-member";
  if (commit.commit.message.startsWith(mergeMessagePrefix)) return "merge-commit";
  if (filters.names.has(name)) return "internal-name";
  if (filters.emails.has(email)) return "internal-email";
  if (email.includes(filters.internalDomain)) return "internal-domain";
  return null;
}

export async function collectExternalContributions({
  gh,
  organization,
  repos,
  filters,
  members,
  mergeMessagePrefix = DEFAULT_MERGE_MESSAGE_PREFIX,
  since,
  until,
}: {
  gh: GhRest;
  organization: string;
  repos: string[];
  filters: FilterSet;
  members: ReadonlySet<string>;
  mergeMessagePrefix?: string;
  since?: Date;
  until?: Date;
}): Promise<ContributionRecord> {
  const record = new Map<string, string[]>();

  for (const repo of repos) {
    logger.info(`Looking at repo ${organization}/${repo}`);
    const commits = ghPageFlow((page) =>
      gh.repos.listCommits({
        owner: organization,
        repo,
        since: since && formatTimestamp(since),
        until: until && formatTimestamp(until),
        ...page,
      }),
    ).map((data) => zCommitSummary.parse(data));

    await ghRequest(
      `LIST COMMITS OF ${organization}/${repo}`,
      commits
        .forEach((commit) => {
          const reason = commitExclusionReason(commit, { filters, members, mergeMessagePrefix });
          if (reason) {
            logger.debug(`Skip commit ${commit.sha}: ${reason}`);
            return;
          }
          const login = commit.author?.login ?? "";
          const email = commit.commit.author?.email ?? "";
          const date = commit.commit.author?.date;
          if (!date || Number.isNaN(Date.parse(date))) {
            throw inputFailure(`Commit ${organization}/${repo}@${commit.sha} has no valid author date`);
          }
          const timestamp = formatTimestamp(new Date(date));
          logger.info(`Found commit by ${login} (${email}) on ${timestamp}`);
          const times = record.get(login) ?? [];
          times.push(timestamp);
          record.set(login, times);
        })
        .run(),
    );
  }

  return Object.fromEntries(record);
}
