import * as core from "@actions/core";
import { ExecaCommandRunner, ICommandRunner } from "./command-runner.js";
import { ILogger } from "./logger.js";
import { createReconcilerContext, ISyncSummary, Reconciler } from "./reconciler.js";
import { defaultConfig, lintConfig, makeConfig, requireGitHubToken } from "./sync-config.js";

/**
 * Routes the progress messages to the workflow log.
 */
export class ActionLogger implements ILogger {
    private readonly timers = new Map<string, number>();

    public log(message: string): void {
        core.info(message);
    }

    public warn(message: string): void {
        core.warning(message);
    }

    public time(label: string): void {
        this.timers.set(label, Date.now());
    }

    public timeEnd(label: string): void {
        const start = this.timers.get(label);
        if (start !== undefined) {
            this.timers.delete(label);
            core.info(`${label}: ${Date.now() - start}ms`);
        }
    }
}

/**
 * Configure the Git committer information; `git am` refuses to work without it.
 */
export function configureCommitter(actor: string | undefined): void {
    const name = actor || "patch-series-sync";
    process.env.GIT_CONFIG_PARAMETERS = [
        process.env.GIT_CONFIG_PARAMETERS,
        `'user.name=${name}'`,
        `'user.email=${name}@users.noreply.github.com'`,
    ]
        .filter((e) => e)
        .join(" ");
}

/**
 * The GitHub Action: synchronize the series in `series-path` with the
 * repository the workflow runs in.
 */
export async function handleAction(runner?: ICommandRunner): Promise<ISyncSummary> {
    const repository = process.env.GITHUB_REPOSITORY;
    if (!repository) {
        throw new Error("GITHUB_REPOSITORY is not set; is this running in a GitHub workflow?");
    }

    const config = makeConfig(undefined, {
        baseBranch: core.getInput("base-branch") || undefined,
        dryRun: core.getInput("dry-run") ? core.getBooleanInput("dry-run") : undefined,
        repository,
        seriesPath: core.getInput("series-path") || undefined,
        workDir: process.env.GITHUB_WORKSPACE || defaultConfig.workDir,
    });
    lintConfig(config);

    const token = requireGitHubToken(core.getInput("repo-token") || undefined, config, "set the 'repo-token' input");
    if (token) {
        core.setSecret(token);
    }

    configureCommitter(process.env.GITHUB_ACTOR);

    const smtpPass = core.getInput("smtp-pass");
    if (smtpPass) {
        core.setSecret(smtpPass);
    }

    const logger = new ActionLogger();
    const context = createReconcilerContext(
        config,
        {
            githubToken: token,
            smtp: {
                smtpHost: core.getInput("smtp-host") || undefined,
                smtpOpts: core.getInput("smtp-opts") || undefined,
                smtpPass: smtpPass || undefined,
                smtpUser: core.getInput("smtp-user") || undefined,
            },
        },
        logger,
        runner || new ExecaCommandRunner(logger),
    );

    const summary = await new Reconciler(context).run();
    core.setOutput("created", summary.outcomes.filter((e) => e.kind === "pull-request-created").length);
    core.setOutput("pending", summary.outcomes.filter((e) => e.kind === "would-create-pull-request").length);
    core.setOutput("failed", summary.outcomes.filter((e) => e.kind === "apply-failed").length);
    core.setOutput("closed", summary.closed.length);
    return summary;
}
