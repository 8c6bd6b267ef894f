import { createOctokit, GitHubCodeHost } from "../src/github/codeHost.js";

interface Recorded {
  method: string;
  path: string;
  authorization: string | null;
  body: unknown;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

const COMMENTS_PATH = "/repos/octocat/hello-world/issues/123/comments";
const target = { owner: "octocat", repo: "hello-world", pullRequest: 123 };

function fakeGitHub(): { fetch: typeof fetch; requests: Recorded[] } {
  const requests: Recorded[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? "GET";
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;
    requests.push({
      method,
      path: url.pathname,
      authorization: new Headers(init?.headers).get("authorization"),
      body,
    });

    const route = `${method} ${url.pathname}`;
    switch (route) {
      case "GET /user":
        return jsonResponse({ login: "ci-bot", id: 1 });
      case `GET ${COMMENTS_PATH}`:
        return jsonResponse([
          {
            id: 7,
            body: "[//]: # (stage=build)\nold",
            html_url: "https://github.com/octocat/hello-world/pull/123#issuecomment-7",
            user: { login: "ci-bot" },
          },
          {
            id: 8,
            body: null,
            html_url: "https://github.com/octocat/hello-world/pull/123#issuecomment-8",
            user: null,
          },
        ]);
      case `POST ${COMMENTS_PATH}`:
        return jsonResponse(
          {
            id: 9,
            body: "new comment",
            html_url: "https://github.com/octocat/hello-world/pull/123#issuecomment-9",
            user: { login: "ci-bot" },
          },
          201,
        );
      case "DELETE /repos/octocat/hello-world/issues/comments/7":
        return new Response(null, { status: 204 });
      default:
        return jsonResponse({ message: "Not Found" }, 404);
    }
  };
  return { fetch: fetchImpl, requests };
}

describe("GitHubCodeHost", () => {
  it("reads the authenticated user", async () => {
    const gh = fakeGitHub();
    const host = new GitHubCodeHost(createOctokit("test-token", gh.fetch));

    await expect(host.currentUser()).resolves.toEqual({ login: "ci-bot" });
    expect(gh.requests[0].method).toBe("GET");
    expect(gh.requests[0].path).toBe("/user");
    expect(gh.requests[0].authorization).toBe("token test-token");
  });

  it("lists pull request comments, tolerating deleted users and empty bodies", async () => {
    const gh = fakeGitHub();
    const host = new GitHubCodeHost(createOctokit("test-token", gh.fetch));

    await expect(host.listComments(target)).resolves.toEqual([
      {
        id: 7,
        author: "ci-bot",
        body: "[//]: # (stage=build)\nold",
        url: "https://github.com/octocat/hello-world/pull/123#issuecomment-7",
      },
      {
        id: 8,
        author: "",
        body: "",
        url: "https://github.com/octocat/hello-world/pull/123#issuecomment-8",
      },
    ]);
    expect(gh.requests).toHaveLength(1);
  });

  it("creates a comment with the rendered body", async () => {
    const gh = fakeGitHub();
    const host = new GitHubCodeHost(createOctokit("test-token", gh.fetch));

    const created = await host.createComment(target, "new comment");

    expect(created).toEqual({
      id: 9,
      author: "ci-bot",
      body: "new comment",
      url: "https://github.com/octocat/hello-world/pull/123#issuecomment-9",
    });
    expect(gh.requests[0]).toMatchObject({ method: "POST", path: COMMENTS_PATH, body: { body: "new comment" } });
  });

  it("deletes a comment by id", async () => {
    const gh = fakeGitHub();
    const host = new GitHubCodeHost(createOctokit("test-token", gh.fetch));

    await expect(host.deleteComment("octocat", "hello-world", 7)).resolves.toBeUndefined();
    expect(gh.requests[0]).toMatchObject({
      method: "DELETE",
      path: "/repos/octocat/hello-world/issues/comments/7",
    });
  });

  it("surfaces API errors to the caller", async () => {
    const gh = fakeGitHub();
    const host = new GitHubCodeHost(createOctokit("test-token", gh.fetch));

    await expect(host.deleteComment("octocat", "hello-world", 99)).rejects.toMatchObject({ status: 404 });
  });
});
