#!/usr/bin/env node

import { Command } from "commander";
import { ExecaCommandRunner } from "../lib/command-runner.js";
import { GitWorkTree } from "../lib/git.js";
import { toPrettyJSON } from "../lib/json-util.js";
import { createReconcilerContext, Reconciler } from "../lib/reconciler.js";
import {
    getGitHubToken,
    getSMTPOptions,
    lintConfig,
    loadConfigFile,
    makeConfig,
    requireGitHubToken,
} from "../lib/sync-config.js";

const commander = new Command();

commander
    .version("1.0.0")
    .description("Create pull requests (or, for series that do not apply, issues) from local patch series")
    .option("-s, --series-path <directory>", "The directory containing one sub-directory per series")
    .option("-r, --base-repo <owner/repo>", "The GitHub repository to open pull requests and issues in")
    .option("-b, --base-branch <branch>", "The branch to apply the series to (default: master)")
    .option("-w, --work-dir <directory>", "The Git work tree to apply the series in (default: .)")
    .option("-c, --config <file>", "Read defaults from this JSON file")
    .option("-i, --include <regex>", "Only handle series whose name matches")
    .option("-e, --exclude <regex>", "Do not handle series whose name matches")
    .option("--dry-run", "Do not push, create or close anything")
    .parse(process.argv);

interface ICommanderOptions {
    seriesPath: string | undefined;
    baseRepo: string | undefined;
    baseBranch: string | undefined;
    workDir: string | undefined;
    config: string | undefined;
    include: string | undefined;
    exclude: string | undefined;
    dryRun: boolean | undefined;
}

const commandOptions = commander.opts<ICommanderOptions>();

(async (): Promise<void> => {
    const file = commandOptions.config ? await loadConfigFile(commandOptions.config) : undefined;
    const config = makeConfig(file, {
        baseBranch: commandOptions.baseBranch,
        dryRun: commandOptions.dryRun,
        exclude: commandOptions.exclude,
        include: commandOptions.include,
        repository: commandOptions.baseRepo,
        seriesPath: commandOptions.seriesPath,
        workDir: commandOptions.workDir,
    });
    lintConfig(config);

    const runner = new ExecaCommandRunner();
    const workTree = new GitWorkTree(runner, config.workDir);
    const githubToken = requireGitHubToken(
        await getGitHubToken(workTree),
        config,
        "set PATCHSYNC_GITHUBTOKEN, GITHUB_TOKEN or patchsync.githubToken",
    );
    const context = createReconcilerContext(
        config,
        { githubToken, smtp: await getSMTPOptions(workTree) },
        console,
        runner,
    );

    const summary = await new Reconciler(context).run();
    console.log(toPrettyJSON(summary));
})().catch((reason: Error) => {
    console.log(`Caught error ${reason}:\n${reason.stack}\n`);
    process.stderr.write(`Caught error ${reason}:\n${reason.stack}\n`);
    process.exit(1);
});
