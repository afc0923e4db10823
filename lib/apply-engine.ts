import { ICommandResult } from "./command-runner.js";
import { BaseBranchMissingError, WorkTreeError } from "./errors.js";
import { GitWorkTree } from "./git.js";
import { consoleLogger, ILogger } from "./logger.js";
import { ISeries } from "./series-metadata.js";

export type ApplyState = "start" | "branch-created" | "applying" | "applied" | "apply-failed";

export interface IApplyDiagnostics {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type ApplyOutcome =
    | { state: "applied"; branch: string; patchCount: number }
    | { state: "branch-create-failed"; branch: string; diagnostics: IApplyDiagnostics }
    | {
          state: "apply-failed";
          branch: string;
          patchIndex: number; // zero-based
          patchPath: string;
          diagnostics: IApplyDiagnostics;
      };

function diagnosticsOf(result: ICommandResult): IApplyDiagnostics {
    return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
}

export function seriesBranchName(series: ISeries): string {
    return `${series.id}`;
}

/**
 * Turns a patch series into a branch: `start -> branch-created -> applying
 * -> applied | apply-failed`.
 *
 * The patches are applied in order, in a single `git am` session, so that a
 * failure rolls back *all* of them: patch N may well depend on patch N-1, and
 * a partially applied series is not worth reviewing.
 */
export class ApplyEngine {
    public readonly baseBranch: string;
    protected readonly workTree: GitWorkTree;
    protected readonly logger: ILogger;

    public constructor(workTree: GitWorkTree, baseBranch: string, logger: ILogger = consoleLogger) {
        this.workTree = workTree;
        this.baseBranch = baseBranch;
        this.logger = logger;
    }

    /**
     * @throws {BaseBranchMissingError} if the base branch does not exist
     */
    public async ensureBaseBranch(): Promise<void> {
        if (!(await this.workTree.commitExists(this.baseBranch))) {
            throw new BaseBranchMissingError(this.baseBranch, this.workTree.workDir);
        }
    }

    /**
     * Check out the base branch again.
     *
     * @throws {WorkTreeError} if that is not possible: continuing on whatever
     *         branch happens to be checked out would mix up series
     */
    public async returnToBase(): Promise<void> {
        const result = await this.workTree.checkout(this.baseBranch);
        if (result.exitCode) {
            throw new WorkTreeError(`Could not check out '${this.baseBranch}':\n${result.stderr}`);
        }
    }

    public async apply(series: ISeries): Promise<ApplyOutcome> {
        const branch = seriesBranchName(series);
        let state: ApplyState = "start";
        const transition = (next: ApplyState): void => {
            this.logger.log(`series ${series.id}: ${state} -> ${next}`);
            state = next;
        };

        const checkout = await this.workTree.checkout(this.baseBranch);
        if (checkout.exitCode) {
            return { state: "branch-create-failed", branch, diagnostics: diagnosticsOf(checkout) };
        }
        const create = await this.workTree.createBranch(branch);
        if (create.exitCode) {
            await this.returnToBase();
            return { state: "branch-create-failed", branch, diagnostics: diagnosticsOf(create) };
        }
        transition("branch-created");

        transition("applying");
        const am = await this.workTree.am(series.patchPaths);
        if (!am.exitCode) {
            transition("applied");
            return { state: "applied", branch, patchCount: series.patchPaths.length };
        }

        const patchIndex = await this.determineFailingPatch(am, series.patchPaths.length);
        const abort = await this.workTree.amAbort();
        if (abort.exitCode) {
            this.logger.warn(`series ${series.id}: 'git am --abort' failed:\n${abort.stderr}`);
        }
        transition("apply-failed");
        return {
            state: "apply-failed",
            branch,
            patchIndex,
            patchPath: series.patchPaths[patchIndex],
            diagnostics: diagnosticsOf(am),
        };
    }

    /**
     * Forget about a series branch that was not pushed.
     */
    public async discard(branch: string): Promise<void> {
        await this.returnToBase();
        const result = await this.workTree.deleteBranch(branch);
        if (result.exitCode) {
            this.logger.warn(`Could not delete branch '${branch}':\n${result.stderr}`);
        }
    }

    /**
     * `git am` reports "Patch failed at 0002 <subject>"; failing that, the
     * number of commits that did get applied is the index of the culprit.
     */
    protected async determineFailingPatch(am: ICommandResult, patchCount: number): Promise<number> {
        const match = `${am.stdout}\n${am.stderr}`.match(/Patch failed at (\d+)/);
        let index: number | undefined = match ? parseInt(match[1], 10) - 1 : undefined;
        if (index === undefined) {
            index = await this.workTree.revListCount(`${this.baseBranch}..HEAD`);
        }
        return Math.min(Math.max(index || 0, 0), patchCount - 1);
    }
}
