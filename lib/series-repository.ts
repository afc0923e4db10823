import * as fs from "fs";
import path from "path";
import { ZodError } from "zod";
import { SeriesPathError } from "./errors.js";
import { isDirectory, isFile, listDirectory } from "./fs-util.js";
import { fromJSON } from "./json-util.js";
import { ISeries, ISeriesHandle, ISeriesMetadata, SeriesMetadataSchema } from "./series-metadata.js";

export const seriesMetadataFileName = "series.json";
export const coverLetterFileName = "cover_letter";
export const patchesDirectoryName = "patches";

export class MissingMetadataError extends Error {
    public constructor(handle: ISeriesHandle) {
        super(`cannot find series detail: ${path.join(handle.path, seriesMetadataFileName)}`);
        this.name = "MissingMetadataError";
    }
}

export class InvalidMetadataError extends Error {
    public constructor(handle: ISeriesHandle, reason: unknown) {
        const detail =
            reason instanceof ZodError
                ? reason.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ")
                : reason instanceof Error
                  ? reason.message
                  : String(reason);
        super(`invalid series detail in ${path.join(handle.path, seriesMetadataFileName)}: ${detail}`);
        this.name = "InvalidMetadataError";
    }
}

export class EmptySeriesError extends Error {
    public constructor(handle: ISeriesHandle) {
        super(`no patch file found in ${path.join(handle.path, patchesDirectoryName)}`);
        this.name = "EmptySeriesError";
    }
}

export type SeriesLoadResult =
    | { kind: "loaded"; series: ISeries }
    | { kind: "missing-metadata"; reason: string }
    | { kind: "invalid-metadata"; reason: string }
    | { kind: "empty-series"; seriesId: number; reason: string }
    | { kind: "filtered"; seriesId: number; reason: string };

export interface ISeriesEntry {
    handle: ISeriesHandle;
    result: SeriesLoadResult;
}

/**
 * Restricts which series are synchronized, by name. Both expressions are
 * matched case-insensitively; `exclude` wins.
 */
export interface ISeriesFilter {
    include?: string;
    exclude?: string;
}

/**
 * The local collection of patch series, one directory per series:
 *
 *     <seriesPath>/<dir>/series.json
 *     <seriesPath>/<dir>/cover_letter      (optional)
 *     <seriesPath>/<dir>/patches/<files>   (applied in filename order)
 */
export class SeriesRepository {
    public readonly seriesPath: string;
    protected readonly include?: RegExp;
    protected readonly exclude?: RegExp;

    public constructor(seriesPath: string, filter: ISeriesFilter = {}) {
        this.seriesPath = seriesPath;
        this.include = filter.include ? new RegExp(filter.include, "i") : undefined;
        this.exclude = filter.exclude ? new RegExp(filter.exclude, "i") : undefined;
    }

    /**
     * @throws {SeriesPathError} if the series path is not a directory; an
     *         existing but empty directory yields no series
     */
    public async listSeries(): Promise<ISeriesHandle[]> {
        if (!(await isDirectory(this.seriesPath))) {
            throw new SeriesPathError(this.seriesPath);
        }
        const names = await listDirectory(this.seriesPath, "directory");
        return names.map((name) => ({ name, path: path.join(this.seriesPath, name) }));
    }

    /**
     * @throws {MissingMetadataError} if there is no `series.json`
     * @throws {InvalidMetadataError} if `series.json` cannot be parsed or lacks required fields
     */
    public async readSeriesMetadata(handle: ISeriesHandle): Promise<ISeriesMetadata> {
        const jsonPath = path.join(handle.path, seriesMetadataFileName);
        if (!(await isFile(jsonPath))) {
            throw new MissingMetadataError(handle);
        }
        const contents = await fs.promises.readFile(jsonPath, "utf-8");
        try {
            return fromJSON(contents, SeriesMetadataSchema);
        } catch (reason) {
            throw new InvalidMetadataError(handle, reason);
        }
    }

    /**
     * @throws {EmptySeriesError} if the `patches/` directory is missing or empty
     */
    public async listPatches(handle: ISeriesHandle): Promise<string[]> {
        const patchesPath = path.join(handle.path, patchesDirectoryName);
        const names = await listDirectory(patchesPath, "file");
        if (!names.length) {
            throw new EmptySeriesError(handle);
        }
        return names.map((name) => path.join(patchesPath, name));
    }

    public async load(handle: ISeriesHandle): Promise<SeriesLoadResult> {
        let metadata: ISeriesMetadata;
        try {
            metadata = await this.readSeriesMetadata(handle);
        } catch (reason) {
            if (reason instanceof MissingMetadataError) {
                return { kind: "missing-metadata", reason: reason.message };
            }
            if (reason instanceof InvalidMetadataError) {
                return { kind: "invalid-metadata", reason: reason.message };
            }
            throw reason;
        }

        if (this.exclude?.test(metadata.name)) {
            return { kind: "filtered", seriesId: metadata.id, reason: `name matches ${this.exclude}` };
        }
        if (this.include && !this.include.test(metadata.name)) {
            return { kind: "filtered", seriesId: metadata.id, reason: `name does not match ${this.include}` };
        }

        let patchPaths: string[];
        try {
            patchPaths = await this.listPatches(handle);
        } catch (reason) {
            if (reason instanceof EmptySeriesError) {
                return { kind: "empty-series", seriesId: metadata.id, reason: reason.message };
            }
            throw reason;
        }

        const coverLetterPath = path.join(handle.path, coverLetterFileName);
        return {
            kind: "loaded",
            series: {
                id: metadata.id,
                name: metadata.name,
                handle,
                metadata,
                coverLetterPath: (await isFile(coverLetterPath)) ? coverLetterPath : undefined,
                patchPaths,
            },
        };
    }

    /**
     * Enumerate the series in directory name order, loading each one only
     * when it is reached.
     */
    public async *entries(): AsyncGenerator<ISeriesEntry> {
        for (const handle of await this.listSeries()) {
            yield { handle, result: await this.load(handle) };
        }
    }
}
