import { RemoteIndexError } from "./errors.js";
import { IHostingService, IRemoteArtifact } from "./hosting-service.js";
import { consoleLogger, ILogger } from "./logger.js";

/**
 * Marks the titles of pull requests and issues that represent a patch
 * series, e.g. `[PW_S_ID:12345] Add frobnicator support`. Titles without it
 * belong to somebody else and are never touched.
 */
export const seriesTitlePrefix = "PW_S_ID";

export function formatTitle(seriesId: number, name: string): string {
    return `[${seriesTitlePrefix}:${seriesId}] ${name}`;
}

const leadingMarkerRegex = new RegExp(`^\\s*\\[${seriesTitlePrefix}:(\\d+)\\]`, "i");

/**
 * Parse the series ID from the leading `[PW_S_ID:<id>]` of a title.
 *
 * @returns the series ID, or undefined if the title does not start with the marker
 */
export function extractSeriesId(title: string): number | undefined {
    const match = title.match(leadingMarkerRegex);
    return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Whether any of the artifacts mentions `PW_S_ID:<id>` (case-insensitively)
 * in its title. `PW_S_ID:12` does not match `PW_S_ID:123`.
 */
export function findBySeriesId(artifacts: readonly IRemoteArtifact[], seriesId: number): boolean {
    const token = new RegExp(`${seriesTitlePrefix}:${seriesId}(?!\\d)`, "i");
    return artifacts.some((artifact) => token.test(artifact.title));
}

/**
 * The open pull requests and issues of the target repository, as they were
 * when the run started, plus whatever the run created since.
 */
export class RemoteArtifactIndex {
    /**
     * @throws {RemoteIndexError} if either listing fails; a partial index
     *         could lead to duplicate pull requests
     */
    public static async fetch(hosting: IHostingService, logger: ILogger = consoleLogger): Promise<RemoteArtifactIndex> {
        logger.time("list open pull requests");
        let pullRequests: IRemoteArtifact[];
        try {
            pullRequests = await hosting.listOpenPullRequests();
        } catch (reason) {
            throw new RemoteIndexError(`pull requests of ${hosting.repository}`, reason);
        }
        logger.timeEnd("list open pull requests");
        logger.log(`Read all pull requests: Total = ${pullRequests.length}`);

        logger.time("list open issues");
        let issues: IRemoteArtifact[];
        try {
            issues = await hosting.listOpenIssues();
        } catch (reason) {
            throw new RemoteIndexError(`issues of ${hosting.repository}`, reason);
        }
        logger.timeEnd("list open issues");
        logger.log(`Read all issues: Total = ${issues.length}`);

        return new RemoteArtifactIndex(pullRequests, issues);
    }

    private readonly openPullRequests: IRemoteArtifact[];
    private readonly openIssues: IRemoteArtifact[];

    public constructor(pullRequests: IRemoteArtifact[], issues: IRemoteArtifact[]) {
        this.openPullRequests = [...pullRequests];
        this.openIssues = [...issues];
    }

    public get pullRequests(): readonly IRemoteArtifact[] {
        return this.openPullRequests;
    }

    public get issues(): readonly IRemoteArtifact[] {
        return this.openIssues;
    }

    public hasPullRequest(seriesId: number): boolean {
        return findBySeriesId(this.openPullRequests, seriesId);
    }

    public hasIssue(seriesId: number): boolean {
        return findBySeriesId(this.openIssues, seriesId);
    }

    public record(artifact: IRemoteArtifact): void {
        (artifact.kind === "pull-request" ? this.openPullRequests : this.openIssues).push(artifact);
    }

    public forget(artifact: IRemoteArtifact): void {
        const list = artifact.kind === "pull-request" ? this.openPullRequests : this.openIssues;
        const index = list.findIndex((entry) => entry.number === artifact.number);
        if (index >= 0) {
            list.splice(index, 1);
        }
    }
}
