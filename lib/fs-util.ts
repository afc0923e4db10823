import * as fs from "fs";

/**
 * Determine whether a given path refers to an existing directory.
 *
 * @param {string} path the path to the directory
 * @returns {boolean} whether the specified path points to an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(path)).isDirectory();
    } catch (reason) {
        return false; // it's okay, it does not exist
    }
}

/**
 * Determine whether a given path refers to an existing file.
 *
 * @param {string} path the path to the file
 * @returns {boolean} whether the specified path points to an existing file
 */
export async function isFile(path: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(path)).isFile();
    } catch (reason) {
        return false; // it's okay, it does not exist
    }
}

/**
 * List the entries of a directory of the given type, sorted by name.
 *
 * The order is plain code unit order (what `Array.prototype.sort()` does),
 * independent of the locale, so that runs are reproducible.
 *
 * @returns the entry names; empty if the directory does not exist
 */
export async function listDirectory(path: string, type: "directory" | "file"): Promise<string[]> {
    if (!(await isDirectory(path))) {
        return [];
    }
    const entries = await fs.promises.readdir(path, { withFileTypes: true });
    return entries
        .filter((entry) => (type === "directory" ? entry.isDirectory() : entry.isFile()))
        .map((entry) => entry.name)
        .sort();
}
