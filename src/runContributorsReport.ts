import { writeFile } from "fs/promises";
import { collectExternalContributions } from "./collectExternalContributions";
import type { ContributorsReportConfig } from "./config";
import { loadContributionsCheckpoint, saveContributionsCheckpoint } from "./contributionsCheckpoint";
import { enrichContributors } from "./enrichContributors";
import { inputFailure } from "./errors";
import { fetchFilterSet } from "./fetchFilterSet";
import { fetchOrganizationMembers, fetchOrganizationRepos } from "./fetchOrganization";
import { formatContributorsReport } from "./formatContributorsReport";
import type { GhRest } from "./gh";
import { createLogger } from "./logger";

const logger = createLogger("report");

/**
 * Collect (unless `useCheckpoint`), checkpoint, enrich and render the report.
 * Writes `config.output` and resolves with the report text.
 */
export async function runContributorsReport(
  config: ContributorsReportConfig,
  { gh, now = new Date() }: { gh: GhRest; now?: Date },
) {
  const repos = config.allRepos ? await fetchOrganizationRepos(gh, config.organization) : config.repos;
  const filters = await fetchFilterSet(gh, config);

  if (!config.useCheckpoint) {
    const members = await fetchOrganizationMembers(gh, config.organization);
    logger.info(`${members.size} members in ${config.organization}, ${filters.emails.size} internal emails`);
    const record = await collectExternalContributions({
      gh,
      organization: config.organization,
      repos,
      filters,
      members,
      mergeMessagePrefix: config.mergeMessagePrefix,
      since: config.since,
      until: config.until,
    });
    await saveContributionsCheckpoint(config.checkpointFile, record);
  }

  const record = await loadContributionsCheckpoint(config.checkpointFile);
  const users = await enrichContributors(record, {
    gh,
    blocklist: filters.blocklist,
    internalNames: filters.names,
    concurrency: config.concurrency,
  });
  const report = formatContributorsReport({
    users,
    organization: config.organization,
    repos,
    now,
    startYear: config.startYear,
  });

  await writeFile(config.output, report).catch((error: unknown) => {
    throw inputFailure(`Cannot write report ${config.output}`, error);
  });
  logger.info(`Output to ${JSON.stringify(config.output)}`);
  return report;
}
