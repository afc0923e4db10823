import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { IHostingService, IIssueRequest, IPullRequestRequest, IRemoteArtifact } from "./hosting-service.js";
export { RequestError } from "@octokit/request-error";

export const defaultRequestTimeout = 60000;
const perPage = 100; // the maximum GitHub allows

export function splitRepository(repository: string): { owner: string; repo: string } {
    const match = repository.match(/^([^/\s]+)\/([^/\s]+)$/);
    if (!match) {
        throw new Error(`Invalid repository '${repository}' (expected OWNER/REPO)`);
    }
    return { owner: match[1], repo: match[2] };
}

export class GitHubGlue implements IHostingService {
    public readonly repository: string;
    protected client: Octokit = new Octokit(); // add { log: console } to debug
    protected authenticated = false;
    protected owner: string;
    protected repo: string;
    protected requestTimeout: number;
    private token: string | undefined;

    public constructor(repository: string, requestTimeout = defaultRequestTimeout) {
        const { owner, repo } = splitRepository(repository);
        this.owner = owner;
        this.repo = repo;
        this.repository = repository;
        this.requestTimeout = requestTimeout;
    }

    public setAccessToken(token: string): void {
        this.token = token;
        this.authenticated = false;
    }

    // The listings work without a token for public repositories, albeit with a much lower rate limit

    public async listOpenPullRequests(): Promise<IRemoteArtifact[]> {
        await this.ensureAuthenticated(false);
        const pulls = await this.listAllPages((page, signal) =>
            this.client.rest.pulls.list({
                owner: this.owner,
                page,
                per_page: perPage,
                repo: this.repo,
                request: { signal },
                state: "open",
            }),
        );

        return pulls.map((pr): IRemoteArtifact => ({
            headRef: pr.head.ref,
            headRepository: pr.head.repo?.full_name,
            kind: "pull-request",
            number: pr.number,
            state: pr.state === "closed" ? "closed" : "open",
            title: pr.title,
            url: pr.html_url,
        }));
    }

    /**
     * List the open issues, *excluding* pull requests (which GitHub's REST API
     * considers to be issues, too).
     */
    public async listOpenIssues(): Promise<IRemoteArtifact[]> {
        await this.ensureAuthenticated(false);
        const issues = await this.listAllPages((page, signal) =>
            this.client.rest.issues.listForRepo({
                owner: this.owner,
                page,
                per_page: perPage,
                repo: this.repo,
                request: { signal },
                state: "open",
            }),
        );

        return issues
            .filter((issue) => !issue.pull_request)
            .map((issue): IRemoteArtifact => ({
                kind: "issue",
                number: issue.number,
                state: issue.state === "closed" ? "closed" : "open",
                title: issue.title,
                url: issue.html_url,
            }));
    }

    public async createPullRequest(request: IPullRequestRequest): Promise<IRemoteArtifact> {
        await this.ensureAuthenticated();
        const response = await this.client.rest.pulls.create({
            base: request.base,
            body: request.body,
            head: request.head,
            maintainer_can_modify: true,
            owner: this.owner,
            repo: this.repo,
            title: request.title,
        });
        return {
            headRef: response.data.head.ref,
            headRepository: response.data.head.repo?.full_name,
            kind: "pull-request",
            number: response.data.number,
            state: "open",
            title: response.data.title,
            url: response.data.html_url,
        };
    }

    public async closePullRequest(pullRequestNumber: number, comment?: string): Promise<void> {
        await this.ensureAuthenticated();
        if (comment) {
            await this.addComment(pullRequestNumber, comment);
        }
        await this.client.rest.pulls.update({
            owner: this.owner,
            pull_number: pullRequestNumber,
            repo: this.repo,
            state: "closed",
        });
    }

    public async deleteBranch(branch: string): Promise<boolean> {
        await this.ensureAuthenticated();
        try {
            await this.client.rest.git.deleteRef({
                owner: this.owner,
                ref: `heads/${branch}`,
                repo: this.repo,
            });
        } catch (e) {
            // GitHub answers 422 "Reference does not exist"
            if (e instanceof RequestError && (e.status === 422 || e.status === 404)) {
                return false;
            }
            throw e;
        }
        return true;
    }

    public async createIssue(request: IIssueRequest): Promise<IRemoteArtifact> {
        await this.ensureAuthenticated();
        const response = await this.client.rest.issues.create({
            body: request.body,
            owner: this.owner,
            repo: this.repo,
            title: request.title,
        });
        return {
            kind: "issue",
            number: response.data.number,
            state: "open",
            title: response.data.title,
            url: response.data.html_url,
        };
    }

    public async closeIssue(issueNumber: number, comment?: string): Promise<void> {
        await this.ensureAuthenticated();
        if (comment) {
            await this.addComment(issueNumber, comment);
        }
        await this.client.rest.issues.update({
            issue_number: issueNumber,
            owner: this.owner,
            repo: this.repo,
            state: "closed",
        });
    }

    /**
     * Add a comment to a Pull Request or issue.
     *
     * @returns the comment ID and the URL to the comment
     */
    public async addComment(issueNumber: number, comment: string): Promise<{ id: number; url: string }> {
        await this.ensureAuthenticated();
        const status = await this.client.rest.issues.createComment({
            body: comment,
            issue_number: issueNumber,
            owner: this.owner,
            repo: this.repo,
        });
        return {
            id: status.data.id,
            url: status.data.html_url,
        };
    }

    /**
     * Fetch page after page until a short one arrives. The timeout covers the
     * whole listing, not the individual request.
     */
    protected async listAllPages<T>(
        list: (page: number, signal: AbortSignal) => Promise<{ data: T[] }>,
    ): Promise<T[]> {
        const signal = AbortSignal.timeout(this.requestTimeout);
        const result: T[] = [];
        for (let page = 1; ; page++) {
            const response = await list(page, signal);
            result.push(...response.data);
            if (response.data.length < perPage) {
                return result;
            }
        }
    }

    protected async ensureAuthenticated(required = true): Promise<void> {
        if (this.authenticated) {
            return;
        }
        if (!this.token) {
            if (required) {
                throw new Error(`Need a GitHub token for ${this.repository}`);
            }
            return;
        }
        this.client = new Octokit({ auth: this.token }); // add log: console to debug
        this.authenticated = true;
    }
}
