export type RemoteArtifactKind = "pull-request" | "issue";

/**
 * A pull request or an issue on the hosting service.
 */
export interface IRemoteArtifact {
    kind: RemoteArtifactKind;
    number: number;
    title: string;
    state: "open" | "closed";
    url: string;
    headRef?: string; // pull requests only: the branch name
    headRepository?: string; // pull requests only: `owner/repo` of the head branch, if it still exists
}

export interface IPullRequestRequest {
    title: string;
    body: string;
    base: string;
    head: string;
}

export interface IIssueRequest {
    title: string;
    body: string;
}

/**
 * The operations the reconciler needs from the hosting service, on one
 * repository. All listings are complete, i.e. every page has been fetched.
 */
export interface IHostingService {
    readonly repository: string; // `owner/repo`
    listOpenPullRequests(): Promise<IRemoteArtifact[]>;
    listOpenIssues(): Promise<IRemoteArtifact[]>;
    createPullRequest(request: IPullRequestRequest): Promise<IRemoteArtifact>;
    closePullRequest(pullRequestNumber: number, comment?: string): Promise<void>;
    /** @returns false if the branch did not exist (any more) */
    deleteBranch(branch: string): Promise<boolean>;
    createIssue(request: IIssueRequest): Promise<IRemoteArtifact>;
    closeIssue(issueNumber: number, comment?: string): Promise<void>;
}
