import { ICommandOptions, ICommandResult, ICommandRunner } from "./command-runner.js";

// For convenience, let's add helpers to call Git:

export interface IGitOptions {
    workDir?: string;
    trimTrailingNewline?: boolean; // defaults to true
    env?: NodeJS.ProcessEnv;
}

function trimTrailingNewline(str: string): string {
    return str.replace(/\r?\n$/, "");
}

/**
 * The Git operations needed to turn a patch series into a branch.
 *
 * Every method reports failures through the exit code of the returned
 * `ICommandResult` (or `undefined`/`false` for the query helpers); only a
 * missing `git` executable throws.
 */
export class GitWorkTree {
    public readonly workDir: string;
    protected readonly runner: ICommandRunner;
    protected readonly env?: NodeJS.ProcessEnv;

    public constructor(runner: ICommandRunner, workDir = ".", env?: NodeJS.ProcessEnv) {
        this.runner = runner;
        this.workDir = workDir;
        this.env = env;
    }

    public async git(args: string[], options?: IGitOptions): Promise<ICommandResult> {
        const runOptions: ICommandOptions = {
            env: options?.env || this.env,
            workDir: options?.workDir || this.workDir,
        };
        const result = await this.runner.run("git", args, runOptions);
        if (options?.trimTrailingNewline === false) {
            return result;
        }
        return { ...result, stdout: trimTrailingNewline(result.stdout) };
    }

    public async checkout(branch: string): Promise<ICommandResult> {
        return await this.git(["checkout", branch]);
    }

    public async createBranch(branch: string): Promise<ICommandResult> {
        return await this.git(["checkout", "-b", branch]);
    }

    public async deleteBranch(branch: string): Promise<ICommandResult> {
        return await this.git(["branch", "-D", branch]);
    }

    public async am(patchFiles: string[]): Promise<ICommandResult> {
        return await this.git(["am", "--", ...patchFiles]);
    }

    public async amAbort(): Promise<ICommandResult> {
        return await this.git(["am", "--abort"]);
    }

    public async push(remote: string, branch: string): Promise<ICommandResult> {
        return await this.git(["push", remote, branch]);
    }

    public async deleteRemoteBranch(remote: string, branch: string): Promise<ICommandResult> {
        return await this.git(["push", remote, "--delete", branch]);
    }

    /**
     * Call `git rev-parse --verify` to verify an object name.
     *
     * @param argument the name referring to a Git object
     * @returns the full object name, or undefined
     */
    public async revParse(argument: string): Promise<string | undefined> {
        const result = await this.git(["rev-parse", "--verify", "-q", argument]);
        return result.exitCode ? undefined : result.stdout;
    }

    /**
     * Call `git rev-list --count` to count the commits in a range.
     *
     * @returns the number of commits, or undefined if the range is invalid
     */
    public async revListCount(range: string): Promise<number | undefined> {
        const result = await this.git(["rev-list", "--count", range]);
        if (result.exitCode) {
            return undefined;
        }
        return parseInt(result.stdout, 10);
    }

    public async commitExists(commit: string): Promise<boolean> {
        return (await this.revParse(`${commit}^{commit}`)) !== undefined;
    }

    public async config(key: string): Promise<string | undefined> {
        const result = await this.git(["config", key]);
        if (result.exitCode !== 0) {
            return undefined;
        }
        return result.stdout;
    }
}
