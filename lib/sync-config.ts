import * as fs from "fs";
import path from "path";
import { z } from "zod";
import { GitWorkTree } from "./git.js";
import { defaultRequestTimeout, splitRepository } from "./github-glue.js";
import { fromJSON } from "./json-util.js";
import { ISMTPOptions } from "./notifier.js";

export interface IMailConfig {
    sender?: string; // display name of the notification mails
    cc: string[]; // always copied on notification mails
}

export interface ISyncConfig {
    repository: string; // `OWNER/REPO` of the pull requests and issues
    baseBranch: string;
    seriesPath: string;
    workDir: string; // the Git work tree the series are applied in
    remote: string;
    include?: string; // only series whose name matches
    exclude?: string; // no series whose name matches
    dryRun: boolean;
    delayAfterPush: number; // milliseconds
    requestTimeout: number; // milliseconds
    mail: IMailConfig;
}

export const defaultConfig: Omit<ISyncConfig, "repository"> = {
    baseBranch: "master",
    delayAfterPush: 1000,
    dryRun: false,
    mail: { cc: [] },
    remote: "origin",
    requestTimeout: defaultRequestTimeout,
    seriesPath: "./series",
    workDir: ".",
};

const ConfigFileSchema = z
    .object({
        repository: z.string().optional(),
        baseBranch: z.string().optional(),
        seriesPath: z.string().optional(),
        workDir: z.string().optional(),
        remote: z.string().optional(),
        include: z.string().optional(),
        exclude: z.string().optional(),
        dryRun: z.boolean().optional(),
        delayAfterPush: z.number().int().nonnegative().optional(),
        requestTimeout: z.number().int().positive().optional(),
        mail: z
            .object({
                sender: z.string().optional(),
                cc: z.array(z.string()).optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ConfigOverrides = Omit<ConfigFile, "mail">;

/**
 * Read a JSON configuration file. Relative paths inside it are taken as
 * relative to the file's directory.
 */
export async function loadConfigFile(file: string): Promise<ConfigFile> {
    const fileName = path.resolve(file);
    const contents = await fs.promises.readFile(fileName, "utf-8");
    let config: ConfigFile;
    try {
        config = fromJSON(contents, ConfigFileSchema);
    } catch (reason) {
        throw new Error(
            `Invalid configuration in ${fileName}: ${reason instanceof Error ? reason.message : String(reason)}`,
        );
    }

    const dir = path.dirname(fileName);
    for (const key of ["seriesPath", "workDir"] as const) {
        const value = config[key];
        if (value !== undefined) {
            config[key] = path.resolve(dir, value);
        }
    }
    return config;
}

/**
 * Layer the defaults, the configuration file (if any) and the command-line
 * options, in that order.
 */
export function makeConfig(file: ConfigFile | undefined, overrides: ConfigOverrides): ISyncConfig {
    const repository = overrides.repository ?? file?.repository;
    if (!repository) {
        throw new Error("No repository configured (expected OWNER/REPO)");
    }
    return {
        baseBranch: overrides.baseBranch ?? file?.baseBranch ?? defaultConfig.baseBranch,
        delayAfterPush: overrides.delayAfterPush ?? file?.delayAfterPush ?? defaultConfig.delayAfterPush,
        dryRun: overrides.dryRun ?? file?.dryRun ?? defaultConfig.dryRun,
        exclude: overrides.exclude ?? file?.exclude,
        include: overrides.include ?? file?.include,
        mail: { cc: file?.mail?.cc ?? defaultConfig.mail.cc, sender: file?.mail?.sender },
        remote: overrides.remote ?? file?.remote ?? defaultConfig.remote,
        repository,
        requestTimeout: overrides.requestTimeout ?? file?.requestTimeout ?? defaultConfig.requestTimeout,
        seriesPath: overrides.seriesPath ?? file?.seriesPath ?? defaultConfig.seriesPath,
        workDir: overrides.workDir ?? file?.workDir ?? defaultConfig.workDir,
    };
}

/**
 * @throws {Error} if the configuration cannot possibly work
 */
export function lintConfig(config: ISyncConfig): void {
    const { owner, repo } = splitRepository(config.repository);
    if (!owner.match(/^[a-z\d](?:[a-z\d]|-(?=[a-z\d])){0,38}$/i)) {
        throw new Error(`Invalid owner '${owner}' in '${config.repository}'`);
    }
    if (!repo.match(/^[\w.-]+$/)) {
        throw new Error(`Invalid repository name '${repo}' in '${config.repository}'`);
    }
    if (!config.baseBranch || config.baseBranch.startsWith("-") || config.baseBranch.match(/\.\.|[\s~^:?*[\\]/)) {
        throw new Error(`Invalid base branch '${config.baseBranch}'`);
    }
    for (const [key, value] of Object.entries({ exclude: config.exclude, include: config.include })) {
        if (value === undefined) {
            continue;
        }
        try {
            new RegExp(value, "i");
        } catch (reason) {
            throw new Error(
                `Invalid '${key}' expression '${value}': ${reason instanceof Error ? reason.message : String(reason)}`,
            );
        }
    }
}

export const configKeyPrefix = "patchsync";

/**
 * Look up a setting in the environment (`PATCHSYNC_<KEY>`), then in the Git
 * config (`patchsync.<key>`).
 */
export async function getVar(key: string, workTree: GitWorkTree): Promise<string | undefined> {
    const envVar = `${configKeyPrefix}_${key}`.toUpperCase();
    return process.env[envVar] ? process.env[envVar] : await workTree.config(`${configKeyPrefix}.${key}`);
}

export async function getGitHubToken(workTree: GitWorkTree): Promise<string | undefined> {
    return (await getVar("githubToken", workTree)) || process.env.GITHUB_TOKEN || undefined;
}

/**
 * Without a token no pull request or issue can be created, and a series that
 * does not apply would have its submitter mailed on every run.
 *
 * @param where tells the user how to provide a token
 * @throws {Error} if there is no token and this is not a dry run
 */
export function requireGitHubToken(
    token: string | undefined,
    config: ISyncConfig,
    where: string,
): string | undefined {
    if (!token && !config.dryRun) {
        throw new Error(`No GitHub token found (${where}); only a dry run works without one`);
    }
    return token;
}

export async function getSMTPOptions(workTree: GitWorkTree): Promise<Partial<ISMTPOptions>> {
    return {
        smtpHost: await getVar("smtpHost", workTree),
        smtpOpts: await getVar("smtpOpts", workTree),
        smtpPass: await getVar("smtpPass", workTree),
        smtpUser: await getVar("smtpUser", workTree),
    };
}
