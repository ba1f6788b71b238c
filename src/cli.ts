import minimist from "minimist";
import { DEFAULT_CONFIG_FILE, readConfigFile, resolveContributorsReportConfig, zEnv } from "./config";
import { inputFailure, ReportFailure } from "./errors";
import { createGh } from "./gh";
import { createLogger } from "./logger";
import { runContributorsReport } from "./runContributorsReport";

const logger = createLogger("cli");

export const USAGE = `
  contributors-report [--config contributors.config.yaml] [options]

  --organization <org>              organization to look under
  --authors-organization <org>      owner of the AUTHORS roster repo (default: organization)
  --authors-repo <repo>             repo holding the AUTHORS roster
  --authors-path <path>             roster path inside the repo (default: AUTHORS)
  --internal-domain <substring>     email substring marking internal authors, e.g. @acme.dev
  --repos <a,b,c>                   repos to look at, comma separated
  --all-repos                       look at every repo of the organization
  --blocklist <a,b,c>               logins to exclude, comma separated
  --checkpoint <file>               collected contributions (default: intermediate_output.json)
  --output <file>                   report file (default: output.md)
  --use-checkpoint                  render from the checkpoint instead of collecting again
  --since <date> --until <date>     only collect commits in this range
  --concurrency <n>                 parallel profile lookups (default: 20)
  --start-year <year>               first year of the report (default: 2014)

  env.GH_TOKEN                      GitHub token
`.trim();

/** Run the report from command line arguments; resolves with the process exit code. */
export async function runCli(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const argv = minimist(args, {
    string: [
      "config",
      "organization",
      "authors-organization",
      "authors-repo",
      "authors-path",
      "internal-domain",
      "repos",
      "blocklist",
      "checkpoint",
      "output",
      "since",
      "until",
      "concurrency",
      "start-year",
    ],
    boolean: ["all-repos", "use-checkpoint", "help"],
  });
  if (argv.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const configFile = typeof argv.config === "string" && argv.config ? argv.config : undefined;
    const fileConfig = await readConfigFile(configFile ?? DEFAULT_CONFIG_FILE, { optional: !configFile });
    const config = resolveContributorsReportConfig(fileConfig, argv);
    const parsedEnv = zEnv.safeParse(env);
    if (!parsedEnv.success) throw inputFailure("Missing env.GH_TOKEN", parsedEnv.error);

    const report = await runContributorsReport(config, { gh: createGh(parsedEnv.data.GH_TOKEN) });
    console.log(report);
    return 0;
  } catch (error) {
    if (!(error instanceof ReportFailure)) throw error;
    logger.error(`[${error.kind}] ${error.message}`);
    return 1;
  }
}
