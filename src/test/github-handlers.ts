import { delay, http, HttpResponse } from "msw";

const GITHUB_API_BASE = "https://api.github.com";

export type FakeCommit = {
  sha: string;
  login?: string; // absent: commit not linked to a GitHub account
  name: string;
  email: string;
  date: string;
  message: string;
  parents?: string[]; // defaults to one parent
};

export type FakeUser = { login: string; name: string | null };

/**
 * In-memory GitHub state served by the handlers below.
 * Tests fill it in; msw-setup resets it after each test.
 */
export type GithubFixture = {
  members: Record<string, string[]>; // org => logins
  repos: Record<string, string[]>; // org => repo names
  commits: Record<string, FakeCommit[]>; // "owner/repo" => newest first
  users: Record<string, FakeUser>;
  contents: Record<string, string>; // "owner/repo/path" => utf8 text
  userLookupDelayMs: number;
  userLookups: { active: number; peak: number; total: number };
};

const createGithubFixture = (): GithubFixture => ({
  members: {},
  repos: {},
  commits: {},
  users: {},
  contents: {},
  userLookupDelayMs: 0,
  userLookups: { active: 0, peak: 0, total: 0 },
});

export const githubFixture: GithubFixture = createGithubFixture();

export function resetGithubFixture() {
  Object.assign(githubFixture, createGithubFixture());
}

const notFound = () =>
  HttpResponse.json({ message: "Not Found", documentation_url: "https://docs.github.com/rest" }, { status: 404 });

function paginate<T>(request: Request, items: T[]) {
  const url = new URL(request.url);
  const page = Number(url.searchParams.get("page") ?? 1);
  const perPage = Number(url.searchParams.get("per_page") ?? 30);
  return items.slice((page - 1) * perPage, page * perPage);
}

const toGithubCommit = (owner: string, repo: string, commit: FakeCommit) => ({
  sha: commit.sha,
  url: `${GITHUB_API_BASE}/repos/${owner}/${repo}/commits/${commit.sha}`,
  html_url: `https://github.com/${owner}/${repo}/commit/${commit.sha}`,
  commit: {
    author: { name: commit.name, email: commit.email, date: commit.date },
    committer: { name: commit.name, email: commit.email, date: commit.date },
    message: commit.message,
  },
  author: commit.login === undefined ? null : { login: commit.login, id: 1, type: "User" },
  committer: null,
  parents: (commit.parents ?? [`${commit.sha}~1`]).map((sha) => ({ sha, url: "" })),
});

/**
 * MSW handlers for the GitHub endpoints the report reads.
 * Use owner/org "error-500" to simulate a server failure.
 */
export const githubHandlers = [
  // GET /orgs/:org/members
  http.get(`${GITHUB_API_BASE}/orgs/:org/members`, ({ params, request }) => {
    const org = String(params.org);
    if (org === "error-500") return HttpResponse.json({ message: "Server Error" }, { status: 500 });
    const members = githubFixture.members[org];
    if (!members) return notFound();
    return HttpResponse.json(paginate(request, members).map((login, id) => ({ login, id, type: "User" })));
  }),

  // GET /orgs/:org/repos
  http.get(`${GITHUB_API_BASE}/orgs/:org/repos`, ({ params, request }) => {
    const org = String(params.org);
    const repos = githubFixture.repos[org];
    if (!repos) return notFound();
    return HttpResponse.json(
      paginate(request, repos).map((name, id) => ({ id, name, full_name: `${org}/${name}` })),
    );
  }),

  // GET /repos/:owner/:repo/contents/:path
  http.get(`${GITHUB_API_BASE}/repos/:owner/:repo/contents/:path`, ({ params }) => {
    const key = `${params.owner}/${params.repo}/${params.path}`;
    const text = githubFixture.contents[key];
    if (text === undefined) return notFound();
    return HttpResponse.json({
      type: "file",
      encoding: "base64",
      name: String(params.path),
      path: String(params.path),
      content: Buffer.from(text, "utf8").toString("base64"),
    });
  }),

  // GET /repos/:owner/:repo/commits, honours since/until
  http.get(`${GITHUB_API_BASE}/repos/:owner/:repo/commits`, ({ params, request }) => {
    const owner = String(params.owner);
    const repo = String(params.repo);
    if (owner === "error-500") return HttpResponse.json({ message: "Server Error" }, { status: 500 });
    const commits = githubFixture.commits[`${owner}/${repo}`];
    if (!commits) return notFound();
    const url = new URL(request.url);
    const since = url.searchParams.get("since");
    const until = url.searchParams.get("until");
    const inRange = commits.filter(
      (commit) =>
        (!since || Date.parse(commit.date) >= Date.parse(since)) &&
        (!until || Date.parse(commit.date) <= Date.parse(until)),
    );
    return HttpResponse.json(paginate(request, inRange).map((commit) => toGithubCommit(owner, repo, commit)));
  }),

  // GET /users/:username, counts concurrent lookups
  http.get(`${GITHUB_API_BASE}/users/:username`, async ({ params }) => {
    const lookups = githubFixture.userLookups;
    lookups.active++;
    lookups.total++;
    lookups.peak = Math.max(lookups.peak, lookups.active);
    try {
      await delay(githubFixture.userLookupDelayMs);
      const user = githubFixture.users[String(params.username)];
      if (!user) return notFound();
      return HttpResponse.json({
        login: user.login,
        id: 1,
        type: "User",
        name: user.name,
        html_url: `https://github.com/${user.login}`,
      });
    } finally {
      lookups.active--;
    }
  }),
];
