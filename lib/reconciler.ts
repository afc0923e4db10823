import * as fs from "fs";
import { promisify } from "util";
import { ApplyEngine, ApplyOutcome } from "./apply-engine.js";
import { ExecaCommandRunner, ICommandRunner } from "./command-runner.js";
import { isFatalError } from "./errors.js";
import { GitWorkTree } from "./git.js";
import { GitHubGlue } from "./github-glue.js";
import { IHostingService, IRemoteArtifact, RemoteArtifactKind } from "./hosting-service.js";
import { consoleLogger, ILogger } from "./logger.js";
import { ISMTPOptions, MailTransportFactory, Notifier } from "./notifier.js";
import { extractCommitMessageBody } from "./patch-mail.js";
import { extractSeriesId, formatTitle, RemoteArtifactIndex } from "./remote-artifact-index.js";
import { ISeries } from "./series-metadata.js";
import { ISeriesEntry, SeriesRepository } from "./series-repository.js";
import { ISyncConfig } from "./sync-config.js";

const sleep = promisify(setTimeout);

export type SkipReason =
    | "missing-metadata"
    | "invalid-metadata"
    | "empty-series"
    | "filtered"
    | "pull-request-exists"
    | "issue-exists";

/**
 * What happened to one entry of the series collection.
 */
export type SeriesOutcome =
    | { kind: "skipped"; entry: string; seriesId?: number; reason: SkipReason }
    | { kind: "pull-request-created"; entry: string; seriesId: number; number: number; url: string }
    | { kind: "would-create-pull-request"; entry: string; seriesId: number } // dry run
    | { kind: "apply-failed"; entry: string; seriesId: number; patchIndex: number; issue?: number }
    | {
          kind: "branch-create-failed" | "push-failed" | "remote-create-failed" | "error";
          entry: string;
          seriesId: number;
          detail: string;
      };

export interface IClosedArtifact {
    kind: RemoteArtifactKind;
    number: number;
    seriesId: number;
    branchDeleted?: boolean;
}

export interface ISyncSummary {
    dryRun: boolean;
    outcomes: SeriesOutcome[];
    closed: IClosedArtifact[];
}

export interface IReconcilerOptions {
    baseBranch: string;
    remote?: string; // defaults to `origin`
    dryRun?: boolean;
    delayAfterPush?: number; // milliseconds; GitHub needs a moment before it accepts a PR for a new branch
}

/**
 * Everything a run operates on. There is no module state: two reconcilers
 * with different contexts do not interfere (as long as they do not share a
 * work tree).
 */
export interface IReconcilerContext {
    repository: SeriesRepository;
    workTree: GitWorkTree;
    hosting: IHostingService;
    notifier: Notifier;
    options: IReconcilerOptions;
    logger?: ILogger;
}

export interface ISyncSecrets {
    githubToken?: string;
    smtp?: Partial<ISMTPOptions>;
}

/**
 * Wire up the production implementations for a configuration.
 */
export function createReconcilerContext(
    config: ISyncConfig,
    secrets: ISyncSecrets,
    logger: ILogger = consoleLogger,
    runner: ICommandRunner = new ExecaCommandRunner(logger),
    transportFactory?: MailTransportFactory,
): IReconcilerContext {
    const hosting = new GitHubGlue(config.repository, config.requestTimeout);
    if (secrets.githubToken) {
        hosting.setAccessToken(secrets.githubToken);
    }
    const notifier = new Notifier(
        {
            baseBranch: config.baseBranch,
            cc: config.mail.cc,
            dryRun: config.dryRun,
            repository: config.repository,
            sender: config.mail.sender,
            smtp: secrets.smtp,
        },
        logger,
        transportFactory,
    );
    return {
        hosting,
        logger,
        notifier,
        options: {
            baseBranch: config.baseBranch,
            delayAfterPush: config.delayAfterPush,
            dryRun: config.dryRun,
            remote: config.remote,
        },
        repository: new SeriesRepository(config.seriesPath, { exclude: config.exclude, include: config.include }),
        workTree: new GitWorkTree(runner, config.workDir),
    };
}

function errorMessage(reason: unknown): string {
    return reason instanceof Error ? reason.message : String(reason);
}

/**
 * Makes the open pull requests and issues of the target repository mirror the
 * local patch series:
 *
 * - a series that applies cleanly gets a branch and a pull request,
 * - a series that does not apply gets a tracking issue (and its submitter a mail),
 * - a pull request or issue whose series is gone is closed.
 *
 * The title marker (see `formatTitle()`) is the only state; running twice in
 * a row does not change anything the second time.
 */
export class Reconciler {
    protected readonly context: IReconcilerContext;
    protected readonly engine: ApplyEngine;
    protected readonly logger: ILogger;
    protected readonly remote: string;
    protected readonly dryRun: boolean;

    public constructor(context: IReconcilerContext) {
        this.context = context;
        this.logger = context.logger || consoleLogger;
        this.engine = new ApplyEngine(context.workTree, context.options.baseBranch, this.logger);
        this.remote = context.options.remote || "origin";
        this.dryRun = !!context.options.dryRun;
    }

    /**
     * @throws {Error} only for problems that make the whole run pointless
     *         (see `isFatalError()`)
     */
    public async run(): Promise<ISyncSummary> {
        await this.engine.ensureBaseBranch();
        const index = await RemoteArtifactIndex.fetch(this.context.hosting, this.logger);
        await this.engine.returnToBase();

        const localSeriesIds = new Set<number>();
        const outcomes: SeriesOutcome[] = [];
        for await (const entry of this.context.repository.entries()) {
            this.logger.log(`\n>> Series Path: ${entry.handle.path}`);
            outcomes.push(await this.reconcileEntry(entry, index, localSeriesIds));
        }

        const closed = await this.cleanup(index, localSeriesIds);
        return { closed, dryRun: this.dryRun, outcomes };
    }

    protected async reconcileEntry(
        entry: ISeriesEntry,
        index: RemoteArtifactIndex,
        localSeriesIds: Set<number>,
    ): Promise<SeriesOutcome> {
        const { handle, result } = entry;
        switch (result.kind) {
            case "missing-metadata":
            case "invalid-metadata":
                // the directory is named after the series; do not close its PR just because the JSON is broken
                if (handle.name.match(/^\d+$/)) {
                    localSeriesIds.add(parseInt(handle.name, 10));
                }
                this.logger.warn(`ERROR: ${result.reason}`);
                return { entry: handle.name, kind: "skipped", reason: result.kind };
            case "empty-series":
            case "filtered":
                localSeriesIds.add(result.seriesId);
                this.logger.warn(`Skipping series ${result.seriesId}: ${result.reason}`);
                return { entry: handle.name, kind: "skipped", reason: result.kind, seriesId: result.seriesId };
            case "loaded":
                localSeriesIds.add(result.series.id);
                try {
                    return await this.reconcileSeries(result.series, index);
                } catch (reason) {
                    if (isFatalError(reason)) {
                        throw reason;
                    }
                    this.logger.warn(`ERROR: series ${result.series.id} failed: ${errorMessage(reason)}`);
                    await this.engine.returnToBase();
                    return {
                        detail: errorMessage(reason),
                        entry: handle.name,
                        kind: "error",
                        seriesId: result.series.id,
                    };
                }
        }
    }

    protected async reconcileSeries(series: ISeries, index: RemoteArtifactIndex): Promise<SeriesOutcome> {
        const entry = series.handle.name;
        this.logger.log(`Series id: ${series.id}`);

        if (index.hasPullRequest(series.id)) {
            this.logger.log("PR already exists. Skip creating PR");
            return { entry, kind: "skipped", reason: "pull-request-exists", seriesId: series.id };
        }
        if (index.hasIssue(series.id)) {
            this.logger.log("Issue already exists (the series did not apply previously). Skip creating PR");
            return { entry, kind: "skipped", reason: "issue-exists", seriesId: series.id };
        }

        const outcome = await this.engine.apply(series);
        switch (outcome.state) {
            case "branch-create-failed":
                this.logger.warn(`ERROR: could not create branch ${outcome.branch}:\n${outcome.diagnostics.stderr}`);
                await this.engine.returnToBase();
                return {
                    detail: outcome.diagnostics.stderr,
                    entry,
                    kind: "branch-create-failed",
                    seriesId: series.id,
                };
            case "apply-failed":
                return await this.reportApplyFailure(series, outcome, index);
            case "applied":
                return await this.publish(series, outcome.branch, index);
        }
    }

    protected async reportApplyFailure(
        series: ISeries,
        outcome: Extract<ApplyOutcome, { state: "apply-failed" }>,
        index: RemoteArtifactIndex,
    ): Promise<SeriesOutcome> {
        const entry = series.handle.name;
        this.logger.warn(`ERROR: Failed to apply patch ${outcome.patchIndex + 1} of series ${series.id}.`);
        await this.engine.discard(outcome.branch);

        const report = await this.context.notifier.notifyApplyFailure(
            series,
            outcome.patchPath,
            outcome.diagnostics,
            outcome.patchIndex,
        );

        const request = {
            body: this.context.notifier.formatFailureReport(report),
            title: formatTitle(series.id, series.name),
        };
        if (this.dryRun) {
            this.logger.log(`Dry run: would create issue '${request.title}'`);
            return { entry, kind: "apply-failed", patchIndex: outcome.patchIndex, seriesId: series.id };
        }

        try {
            const issue = await this.context.hosting.createIssue(request);
            index.record(issue);
            this.logger.log(`Created issue #${issue.number}: ${issue.url}`);
            return {
                entry,
                issue: issue.number,
                kind: "apply-failed",
                patchIndex: outcome.patchIndex,
                seriesId: series.id,
            };
        } catch (reason) {
            if (isFatalError(reason)) {
                throw reason;
            }
            this.logger.warn(`ERROR: failed to create issue for series ${series.id}: ${errorMessage(reason)}`);
            return { entry, kind: "apply-failed", patchIndex: outcome.patchIndex, seriesId: series.id };
        }
    }

    protected async publish(series: ISeries, branch: string, index: RemoteArtifactIndex): Promise<SeriesOutcome> {
        const entry = series.handle.name;
        const request = {
            base: this.context.options.baseBranch,
            body: await this.generatePullRequestBody(series),
            head: branch,
            title: formatTitle(series.id, series.name),
        };

        if (this.dryRun) {
            this.logger.log(`Dry run: would push ${branch} and open '${request.title}'`);
            await this.engine.discard(branch);
            return { entry, kind: "would-create-pull-request", seriesId: series.id };
        }

        const push = await this.context.workTree.push(this.remote, branch);
        if (push.exitCode) {
            this.logger.warn(`ERROR: Failed to push ${branch} error=${push.exitCode}:\n${push.stderr}`);
            // a stale local branch would make the next run fail at `checkout -b`
            await this.engine.discard(branch);
            return { detail: push.stderr, entry, kind: "push-failed", seriesId: series.id };
        }

        if (this.context.options.delayAfterPush) {
            await sleep(this.context.options.delayAfterPush);
        }

        let outcome: SeriesOutcome;
        try {
            const pullRequest = await this.context.hosting.createPullRequest(request);
            index.record(pullRequest);
            this.logger.log(`Created pull request #${pullRequest.number}: ${pullRequest.url}`);
            outcome = {
                entry,
                kind: "pull-request-created",
                number: pullRequest.number,
                seriesId: series.id,
                url: pullRequest.url,
            };
        } catch (reason) {
            if (isFatalError(reason)) {
                throw reason;
            }
            this.logger.warn(
                `ERROR: failed to create pull request for series ${series.id}; ` +
                    `deleting the pushed branch ${branch}: ${errorMessage(reason)}`,
            );
            const deletion = await this.context.workTree.deleteRemoteBranch(this.remote, branch);
            if (deletion.exitCode) {
                this.logger.warn(
                    `ERROR: branch ${branch} was pushed to ${this.remote} without a pull request ` +
                        `and could not be deleted:\n${deletion.stderr}`,
                );
            }
            await this.engine.discard(branch);
            return { detail: errorMessage(reason), entry, kind: "remote-create-failed", seriesId: series.id };
        }

        await this.engine.returnToBase();
        return outcome;
    }

    /**
     * The body of the pull request: the cover letter if there is one,
     * otherwise the commit message of the first patch.
     */
    public async generatePullRequestBody(series: ISeries): Promise<string> {
        const source = series.coverLetterPath || series.patchPaths[0];
        this.logger.log(`Patch File: ${source}`);
        return extractCommitMessageBody(await fs.promises.readFile(source, "utf-8"));
    }

    /**
     * Close the pull requests and issues whose series is no longer part of the
     * local collection. Artifacts without the title marker are left alone.
     */
    protected async cleanup(index: RemoteArtifactIndex, localSeriesIds: Set<number>): Promise<IClosedArtifact[]> {
        const closed: IClosedArtifact[] = [];
        for (const artifact of [...index.pullRequests, ...index.issues]) {
            const seriesId = extractSeriesId(artifact.title);
            if (seriesId === undefined || localSeriesIds.has(seriesId)) {
                continue;
            }

            try {
                closed.push(await this.close(artifact, seriesId));
                index.forget(artifact);
            } catch (reason) {
                if (isFatalError(reason)) {
                    throw reason;
                }
                this.logger.warn(`ERROR: could not close ${artifact.url}: ${errorMessage(reason)}`);
            }
        }
        return closed;
    }

    protected async close(artifact: IRemoteArtifact, seriesId: number): Promise<IClosedArtifact> {
        const comment = `Series ${seriesId} is no longer pending; closing.`;
        const closed: IClosedArtifact = { kind: artifact.kind, number: artifact.number, seriesId };

        if (this.dryRun) {
            this.logger.log(`Dry run: would close ${artifact.kind} #${artifact.number} (${artifact.title})`);
            return closed;
        }

        if (artifact.kind === "issue") {
            await this.context.hosting.closeIssue(artifact.number, comment);
            this.logger.log(`Closed issue #${artifact.number} of series ${seriesId}`);
            return closed;
        }

        await this.context.hosting.closePullRequest(artifact.number, comment);
        this.logger.log(`Closed pull request #${artifact.number} of series ${seriesId}`);
        // branches of pull requests from forks are not ours to delete
        if (
            artifact.headRef &&
            artifact.headRepository?.toLowerCase() === this.context.hosting.repository.toLowerCase()
        ) {
            closed.branchDeleted = await this.context.hosting.deleteBranch(artifact.headRef);
        }
        return closed;
    }
}
