import { http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import { createGh } from "@/src/gh";
import { githubFixture } from "@/src/test/github-handlers";
import { server } from "@/src/test/msw-setup";
import { fetchAuthorsRoster, fetchFilterSet } from "./fetchFilterSet";

const gh = createGh("test-token");

describe("fetchAuthorsRoster", () => {
  it("should decode the roster file", async () => {
    githubFixture.contents["acme/main/AUTHORS"] = "Zoë Example <zoe@acme.dev>\n";
    expect(await fetchAuthorsRoster(gh, { owner: "acme", repo: "main", path: "AUTHORS" })).toBe(
      "Zoë Example <zoe@acme.dev>\n",
    );
  });

  it("should fail when the path is a directory", async () => {
    server.use(
      http.get("https://api.github.com/repos/:owner/:repo/contents/:path", () =>
        HttpResponse.json([{ type: "file", name: "a", path: "docs/a" }]),
      ),
    );
    await expect(fetchAuthorsRoster(gh, { owner: "acme", repo: "main", path: "docs" })).rejects.toMatchObject({
      kind: "api",
      message: "acme/main/docs is not a file",
    });
  });

  it("should fail when the file is missing", async () => {
    await expect(fetchAuthorsRoster(gh, { owner: "acme", repo: "main", path: "AUTHORS" })).rejects.toMatchObject({
      kind: "api",
    });
  });
});

describe("fetchFilterSet", () => {
  it("should combine the roster with the blocklist", async () => {
    githubFixture.contents["acme/main/AUTHORS"] = [
      "# Ann Former <former@acme.dev>",
      "Ann Staff <ann@acme.dev>",
      "Visitor <visitor@example.org>",
    ].join("\n");

    const filters = await fetchFilterSet(gh, {
      authorsOrganization: "acme",
      authorsRepo: "main",
      authorsPath: "AUTHORS",
      internalDomain: "@acme.dev",
      commentMarker: "#",
      blocklist: ["spammer"],
    });

    expect(filters).toEqual({
      emails: new Set(["ann@acme.dev"]),
      names: new Set(["Ann Staff"]),
      blocklist: new Set(["spammer"]),
      internalDomain: "@acme.dev",
    });
  });
});
