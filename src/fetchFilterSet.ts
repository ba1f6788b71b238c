import { z } from "zod";
import { ghRequest, ReportFailure } from "./errors";
import type { GhRest } from "./gh";
import { parseAuthorsRoster } from "./parseAuthorsRoster";
import type { FilterSet } from "./types";

const zFileContent = z.object({
  type: z.literal("file"),
  encoding: z.string(),
  content: z.string(),
});

export async function fetchAuthorsRoster(gh: GhRest, { owner, repo, path }: { owner: string; repo: string; path: string }) {
  const { data } = await ghRequest(`GET ${owner}/${repo}/${path}`, gh.repos.getContent({ owner, repo, path }));
  const file = zFileContent.safeParse(data);
  if (!file.success) throw new ReportFailure("api", `${owner}/${repo}/${path} is not a file`);
  const { encoding, content } = file.data;
  if (encoding !== "base64") throw new ReportFailure("api", `${owner}/${repo}/${path} has unsupported encoding ${encoding}`);
  return Buffer.from(content, "base64").toString("utf8");
}

export async function fetchFilterSet(
  gh: GhRest,
  config: {
    authorsOrganization: string;
    authorsRepo: string;
    authorsPath: string;
    internalDomain: string;
    commentMarker: string;
    blocklist: string[];
  },
): Promise<FilterSet> {
  const text = await fetchAuthorsRoster(gh, {
    owner: config.authorsOrganization,
    repo: config.authorsRepo,
    path: config.authorsPath,
  });
  const { emails, names } = parseAuthorsRoster(text, config);
  return { emails, names, blocklist: new Set(config.blocklist), internalDomain: config.internalDomain };
}
