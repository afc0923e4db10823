import execa from "execa";
import { LaunchError } from "./errors.js";
import { consoleLogger, ILogger } from "./logger.js";

export interface ICommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface ICommandOptions {
    workDir?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Runs external commands (`git`, mostly).
 *
 * A nonzero exit is *not* an error: the caller inspects `exitCode`. Only a
 * command that cannot be started at all results in a `LaunchError`.
 */
export interface ICommandRunner {
    run(command: string, args: string[], options?: ICommandOptions): Promise<ICommandResult>;
}

export class ExecaCommandRunner implements ICommandRunner {
    protected readonly logger: ILogger;

    public constructor(logger: ILogger = consoleLogger) {
        this.logger = logger;
    }

    public async run(command: string, args: string[], options?: ICommandOptions): Promise<ICommandResult> {
        const workDir = options?.workDir || ".";
        this.logger.log(`cmd: ${[command, ...args].join(" ")} (in '${workDir}')`);

        let result: execa.ExecaReturnValue;
        try {
            result = await execa(command, args, { cwd: workDir, env: options?.env, reject: false });
        } catch (reason) {
            // execa rejects even with `reject: false` when `spawn()` throws synchronously
            throw new LaunchError(command, reason instanceof Error ? reason.message : String(reason));
        }

        if (typeof result.exitCode !== "number") {
            if (!result.signal) {
                throw new LaunchError(command, result instanceof Error ? result.message : "process did not start");
            }
            return {
                exitCode: -1,
                stdout: result.stdout,
                stderr: `${result.stderr}\nterminated by ${result.signal}`.trim(),
            };
        }

        return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
    }
}
