import { createHash } from "crypto";
import { promises as fs } from "fs";
import { glob } from "glob";
import * as _ from "lodash";
import * as path from "path";

import { concurrentMap, createConcurrentRunContext } from "./concurrency";
import { InputNotFoundError } from "./errors";
import { createLogger } from "./log";

const log = createLogger("fingerprint");

/**
 * Order independent summary of a set of files and their modification times.
 */
export type Fingerprint = string;

export interface FileStatus {
    path: string;
    exists: boolean;
    modifiedTime?: number;
}

export interface InputFile {
    /** Absolute path of the file. */
    path: string;
    /** Source root `path` was found under, outputs mirror the layout below it. */
    root: string;
}

const fileStatusParallelContext = createConcurrentRunContext(32);

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

export async function getFileStatus(filePath: string): Promise<FileStatus> {
    try {
        const stats = await fs.stat(filePath);
        return {
            path: filePath,
            exists: true,
            modifiedTime: Math.max(stats.mtimeMs, stats.ctimeMs)
        };
    } catch (error) {
        if (isMissingFileError(error)) {
            return { path: filePath, exists: false };
        }
        throw error;
    }
}

export function statInputs(paths: Iterable<string>): Promise<FileStatus[]> {
    return concurrentMap(_.uniq(Array.from(paths)), fileStatusParallelContext, getFileStatus);
}

/**
 * Throws `InputNotFoundError` naming every path that does not exist.
 */
export function assertAllExist(statuses: FileStatus[]) {
    const missing = statuses.filter(status => !status.exists).map(status => status.path);
    if (missing.length > 0) {
        throw new InputNotFoundError(missing);
    }
}

export function fingerprintOf(statuses: FileStatus[]): Fingerprint {
    const hash = createHash("sha256");
    for (const status of _.sortBy(statuses, "path")) {
        hash.update(`${status.path}\0${status.modifiedTime}\n`);
    }
    return hash.digest("hex");
}

/**
 * Fingerprint of `paths` by their current modification times.
 *
 * Fails with `InputNotFoundError` when any of them is missing; nothing is hashed in their place.
 */
export async function fingerprint(paths: Iterable<string>): Promise<Fingerprint> {
    const statuses = await statInputs(paths);
    assertAllExist(statuses);
    const result = fingerprintOf(statuses);
    log.debug("#fingerprint %d files => %s", statuses.length, result.substring(0, 12));
    return result;
}

/**
 * Lists files matching `patterns` below each source root, sorted by path.
 *
 * Roots that do not exist are skipped.
 */
export async function listInputFiles(roots: string[], patterns: string[]): Promise<InputFile[]> {
    const result: InputFile[] = [];
    for (const root of roots) {
        const absRoot = path.resolve(root);
        const rootStatus = await getFileStatus(absRoot);
        if (!rootStatus.exists) {
            log.debug("#listInputFiles skipping missing root %s", absRoot);
            continue;
        }
        const matches = await glob(patterns, { cwd: absRoot, nodir: true, absolute: true });
        for (const match of matches) {
            result.push({ path: match, root: absRoot });
        }
    }
    return _.sortBy(_.uniqBy(result, "path"), "path");
}
