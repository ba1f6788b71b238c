import { ghRequest } from "./errors";
import type { GhRest } from "./gh";
import { ghPageFlow } from "./ghPageFlow";

export async function fetchOrganizationMembers(gh: GhRest, org: string) {
  const members = await ghRequest(
    `LIST MEMBERS OF ${org}`,
    ghPageFlow((page) => gh.orgs.listMembers({ org, ...page })).toArray(),
  );
  return new Set(members.map((member) => member.login));
}

export async function fetchOrganizationRepos(gh: GhRest, org: string) {
  const repos = await ghRequest(
    `LIST REPOS OF ${org}`,
    ghPageFlow((page) => gh.repos.listForOrg({ org, ...page })).toArray(),
  );
  return repos.map((repo) => repo.name);
}
