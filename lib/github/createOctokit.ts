import { Octokit } from "octokit";

export type OctokitOptions = {
  auth: string;
  maxRateLimitRetries?: number;
};

/**
 * Creates an Octokit instance with rate limit throttling.
 * Failed requests are not retried: a failure aborts the report run.
 */
export function createOctokit({ auth, maxRateLimitRetries = 3 }: OctokitOptions) {
  return new Octokit({
    auth,
    throttle: {
      onRateLimit: (
        retryAfter: number,
        options: { method: string; url: string },
        octokit: Octokit,
        retryCount: number,
      ) => {
        octokit.log.warn(`Request quota exhausted for request ${options.method} ${options.url}`);
        if (retryCount < maxRateLimitRetries) {
          octokit.log.info(`Retrying after ${retryAfter} seconds!`);
          return true;
        }
        return false;
      },
      onSecondaryRateLimit: (retryAfter: number, options: { method: string; url: string }, octokit: Octokit) => {
        octokit.log.warn(`SecondaryRateLimit detected for request ${options.method} ${options.url}`);
        return false;
      },
    },
    retry: { enabled: false },
  });
}
