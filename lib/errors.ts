/**
 * Errors that end a synchronization run.
 *
 * Anything that only affects a single series is reported as an outcome value
 * instead (see `apply-engine.ts` and `reconciler.ts`).
 */

/** The command could not be started at all, e.g. because `git` is not in the `PATH`. */
export class LaunchError extends Error {
    public readonly command: string;

    public constructor(command: string, reason: string) {
        super(`Could not launch '${command}': ${reason}`);
        this.name = "LaunchError";
        this.command = command;
    }
}

export class BaseBranchMissingError extends Error {
    public readonly branch: string;

    public constructor(branch: string, workDir: string) {
        super(`Base branch '${branch}' not found in '${workDir}'`);
        this.name = "BaseBranchMissingError";
        this.branch = branch;
    }
}

/** Listing the open pull requests or issues failed; reconciling against a partial index is not safe. */
export class RemoteIndexError extends Error {
    public constructor(what: string, reason: unknown) {
        super(`Could not list open ${what}: ${reason instanceof Error ? reason.message : String(reason)}`);
        this.name = "RemoteIndexError";
    }
}

/** Without the series directory every pull request would look obsolete. */
export class SeriesPathError extends Error {
    public readonly seriesPath: string;

    public constructor(seriesPath: string) {
        super(`Series path '${seriesPath}' is not a directory`);
        this.name = "SeriesPathError";
        this.seriesPath = seriesPath;
    }
}

/** The work tree could not be brought back to the base branch. */
export class WorkTreeError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = "WorkTreeError";
    }
}

export function isFatalError(error: unknown): boolean {
    return (
        error instanceof LaunchError ||
        error instanceof BaseBranchMissingError ||
        error instanceof RemoteIndexError ||
        error instanceof SeriesPathError ||
        error instanceof WorkTreeError
    );
}
