import { expect, test } from "@jest/globals";
import { Octokit } from "@octokit/rest";
import { RemoteIndexError } from "../lib/errors.js";
import { GitHubGlue, RequestError, splitRepository } from "../lib/github-glue.js";
import { RemoteArtifactIndex } from "../lib/remote-artifact-index.js";
import { TestLogger } from "./test-lib.js";

interface IRecordedRequest {
    method: string;
    url: string;
    body?: unknown;
    page?: unknown;
    state?: unknown;
    signal?: unknown;
}

interface ITestResponse {
    status?: number;
    data: unknown;
}

const silent = {
    debug: (): void => {},
    error: (): void => {},
    info: (): void => {},
    warn: (): void => {},
};

/**
 * Answers the REST calls via `respond()` instead of talking to GitHub. The
 * requests are identified by their route, e.g. `GET /repos/{owner}/{repo}/pulls`.
 */
class GitHubProxy extends GitHubGlue {
    public readonly requests: IRecordedRequest[] = [];

    public constructor(
        respond: (route: string, request: IRecordedRequest) => ITestResponse | Promise<ITestResponse> | undefined,
        requestTimeout?: number,
    ) {
        super("example/project", requestTimeout);
        this.client = new Octokit({ log: silent });
        this.client.hook.wrap("request", async (_request, options) => {
            const request: IRecordedRequest = {
                body: options.body,
                method: options.method,
                page: options.page,
                signal: options.request?.signal,
                state: options.state,
                url: options.url,
            };
            this.requests.push(request);
            const response = await respond(`${options.method} ${options.url}`, request);
            if (!response) {
                throw new Error(`Unexpected request: ${options.method} ${options.url}`);
            }
            const status = response.status || 200;
            if (status >= 400) {
                throw new RequestError(`HTTP ${status}`, status, {
                    request: { headers: {}, method: options.method, url: options.url },
                });
            }
            return { data: response.data, headers: {}, status, url: options.url };
        });
        this.authenticated = true;
    }
}

function routes(responses: { [route: string]: ITestResponse }): (route: string) => ITestResponse | undefined {
    return (route) => responses[route];
}

/** A response that only ever comes as the abort of the request. */
function untilAborted(request: IRecordedRequest): Promise<ITestResponse> {
    return new Promise((_resolve, reject) => {
        const signal = request.signal;
        if (!(signal instanceof AbortSignal)) {
            reject(new Error("request without an abort signal"));
            return;
        }
        signal.addEventListener("abort", () => reject(signal.reason));
    });
}

function pull(number: number, title: string, headRepository: string | null): unknown {
    return {
        head: { ref: `${number}`, repo: headRepository ? { full_name: headRepository } : null },
        html_url: `https://github.com/example/project/pull/${number}`,
        number,
        state: "open",
        title,
    };
}

test("repositories are given as OWNER/REPO", () => {
    expect(splitRepository("example/project")).toEqual({ owner: "example", repo: "project" });
    expect(() => splitRepository("example")).toThrow("Invalid repository 'example' (expected OWNER/REPO)");
});

test("all pages of pull requests are listed", async () => {
    const firstPage = Array.from({ length: 100 }, (_, i) =>
        pull(i + 1, `[PW_S_ID:${i + 1}] series`, "example/project"),
    );
    const github = new GitHubProxy((route, request) => {
        if (route !== "GET /repos/{owner}/{repo}/pulls") {
            return undefined;
        }
        return { data: request.page === 1 ? firstPage : [pull(101, "[PW_S_ID:101] last", null)] };
    });

    const pulls = await github.listOpenPullRequests();
    expect(pulls.length).toEqual(101);
    expect(pulls[0]).toEqual({
        headRef: "1",
        headRepository: "example/project",
        kind: "pull-request",
        number: 1,
        state: "open",
        title: "[PW_S_ID:1] series",
        url: "https://github.com/example/project/pull/1",
    });
    expect(pulls[100]).toEqual({
        headRef: "101",
        kind: "pull-request",
        number: 101,
        state: "open",
        title: "[PW_S_ID:101] last",
        url: "https://github.com/example/project/pull/101",
    });
    expect(github.requests.map((e) => `${e.page} ${e.state}`)).toEqual(["1 open", "2 open"]);
    expect(github.requests.map((e) => e.signal instanceof AbortSignal)).toEqual([true, true]);
    expect(github.requests[1].signal).toBe(github.requests[0].signal);
});

test("a listing that takes too long ends the run", async () => {
    const github = new GitHubProxy((_route, request) => untilAborted(request), 50);

    const fetching = RemoteArtifactIndex.fetch(github, new TestLogger());
    await expect(fetching).rejects.toThrow(RemoteIndexError);
    await expect(fetching).rejects.toThrow(/^Could not list open pull requests of example\/project: /);
    expect(github.requests.map((e) => e.url)).toEqual(["/repos/{owner}/{repo}/pulls"]);
});

test("the issue listing leaves out pull requests", async () => {
    const github = new GitHubProxy(
        routes({
            "GET /repos/{owner}/{repo}/issues": {
                data: [
                    {
                        html_url: "https://github.com/example/project/issues/3",
                        number: 3,
                        state: "open",
                        title: "[PW_S_ID:3] three",
                    },
                    {
                        html_url: "https://github.com/example/project/pull/4",
                        number: 4,
                        pull_request: { url: "https://api.github.com/repos/example/project/pulls/4" },
                        state: "open",
                        title: "[PW_S_ID:4] four",
                    },
                ],
            },
        }),
    );

    expect((await github.listOpenIssues()).map((e) => `${e.kind} #${e.number}`)).toEqual(["issue #3"]);
});

test("pull requests are created so that maintainers can modify them", async () => {
    const github = new GitHubProxy(
        routes({
            "POST /repos/{owner}/{repo}/pulls": { data: pull(5, "[PW_S_ID:5] five", "example/project"), status: 201 },
        }),
    );

    const created = await github.createPullRequest({
        base: "master",
        body: "Body.",
        head: "5",
        title: "[PW_S_ID:5] five",
    });
    expect(created).toEqual({
        headRef: "5",
        headRepository: "example/project",
        kind: "pull-request",
        number: 5,
        state: "open",
        title: "[PW_S_ID:5] five",
        url: "https://github.com/example/project/pull/5",
    });
});

test("closing comments first, then closes", async () => {
    const github = new GitHubProxy(
        routes({
            "PATCH /repos/{owner}/{repo}/issues/{issue_number}": { data: {} },
            "POST /repos/{owner}/{repo}/issues/{issue_number}/comments": {
                data: { html_url: "https://github.com/example/project/issues/6#issuecomment-1", id: 1 },
                status: 201,
            },
        }),
    );

    await github.closeIssue(6, "Gone.");
    expect(github.requests).toEqual([
        { body: "Gone.", method: "POST", url: "/repos/{owner}/{repo}/issues/{issue_number}/comments" },
        { method: "PATCH", state: "closed", url: "/repos/{owner}/{repo}/issues/{issue_number}" },
    ]);
});

test("deleting a branch that is already gone is not an error", async () => {
    const deleteRef = (status: number): GitHubProxy =>
        new GitHubProxy(routes({ "DELETE /repos/{owner}/{repo}/git/refs/{ref}": { data: {}, status } }));

    expect(await deleteRef(422).deleteBranch("7")).toBe(false);
    expect(await deleteRef(204).deleteBranch("7")).toBe(true);
    await expect(deleteRef(403).deleteBranch("7")).rejects.toThrow("HTTP 403");
});

test("changes need a token", async () => {
    const github = new GitHubGlue("example/project");
    await expect(github.createIssue({ body: "", title: "x" })).rejects.toThrow(
        "Need a GitHub token for example/project",
    );
});
