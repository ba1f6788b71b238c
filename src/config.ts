import { readFile } from "fs/promises";
import type { ParsedArgs } from "minimist";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_MERGE_MESSAGE_PREFIX } from "./collectExternalContributions";
import { DEFAULT_LOOKUP_CONCURRENCY } from "./enrichContributors";
import { inputFailure } from "./errors";
import { DEFAULT_START_YEAR } from "./formatContributorsReport";
import { parseBlocklist } from "./parseAuthorsRoster";

export const DEFAULT_CONFIG_FILE = "contributors.config.yaml";

export const zContributorsReportConfig = z
  .object({
    organization: z.string().min(1),
    authorsOrganization: z.string().min(1).optional(),
    authorsRepo: z.string().min(1),
    authorsPath: z.string().min(1).default("AUTHORS"),
    internalDomain: z.string().min(1),
    commentMarker: z.string().min(1).default("#"),
    repos: z.string().min(1).array().default([]),
    allRepos: z.boolean().default(false),
    blocklist: z.string().min(1).array().default([]),
    checkpointFile: z.string().min(1).default("intermediate_output.json"),
    output: z.string().min(1).default("output.md"),
    useCheckpoint: z.boolean().default(false),
    since: z.coerce.date().optional(),
    until: z.coerce.date().optional(),
    concurrency: z.coerce.number().int().positive().default(DEFAULT_LOOKUP_CONCURRENCY),
    startYear: z.coerce.number().int().min(1970).default(DEFAULT_START_YEAR),
    mergeMessagePrefix: z.string().min(1).default(DEFAULT_MERGE_MESSAGE_PREFIX),
  })
  .strict()
  .refine((config) => config.allRepos || config.repos.length > 0, {
    message: "Either list repos or set allRepos",
    path: ["repos"],
  })
  .transform(({ authorsOrganization, ...config }) => ({
    ...config,
    authorsOrganization: authorsOrganization ?? config.organization,
  }));

export type ContributorsReportConfig = z.infer<typeof zContributorsReportConfig>;

export const zEnv = z.object({
  GH_TOKEN: z.string({ required_error: "Missing env.GH_TOKEN from https://github.com/settings/tokens?type=beta" }).min(1),
});

export async function readConfigFile(file: string, { optional = false } = {}): Promise<unknown> {
  const text = await readFile(file, "utf8").catch((error: unknown) => {
    if (optional && error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw inputFailure(`Cannot read config ${file}`, error);
  });
  if (text === null) return {};
  try {
    return YAML.parse(text) ?? {};
  } catch (error) {
    throw inputFailure(`Config ${file} is not valid YAML`, error);
  }
}

const splitList = (csv: string) => [...parseBlocklist(csv)];

const stringFlag = (argv: ParsedArgs, name: string): string | undefined => {
  const value: unknown = argv[name];
  return typeof value === "string" && value !== "" ? value : undefined;
};
const trueFlag = (argv: ParsedArgs, name: string): true | undefined => (argv[name] === true ? true : undefined);

/** Command line flags override the config file. */
export function resolveContributorsReportConfig(fileConfig: unknown, argv: ParsedArgs): ContributorsReportConfig {
  const repos = stringFlag(argv, "repos");
  const blocklist = stringFlag(argv, "blocklist");
  const overrides = {
    organization: stringFlag(argv, "organization"),
    authorsOrganization: stringFlag(argv, "authors-organization"),
    authorsRepo: stringFlag(argv, "authors-repo"),
    authorsPath: stringFlag(argv, "authors-path"),
    internalDomain: stringFlag(argv, "internal-domain"),
    repos: repos === undefined ? undefined : splitList(repos),
    allRepos: trueFlag(argv, "all-repos"),
    blocklist: blocklist === undefined ? undefined : splitList(blocklist),
    checkpointFile: stringFlag(argv, "checkpoint"),
    output: stringFlag(argv, "output"),
    useCheckpoint: trueFlag(argv, "use-checkpoint"),
    since: stringFlag(argv, "since"),
    until: stringFlag(argv, "until"),
    concurrency: stringFlag(argv, "concurrency"),
    startYear: stringFlag(argv, "start-year"),
  };
  const definedOverrides = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));

  const base = z.record(z.string(), z.unknown()).safeParse(fileConfig);
  if (!base.success) throw inputFailure("Config file must be a mapping", base.error);

  const parsed = zContributorsReportConfig.safeParse({ ...base.data, ...definedOverrides });
  if (!parsed.success) throw inputFailure("Invalid configuration", parsed.error);
  return parsed.data;
}
