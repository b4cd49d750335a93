import { createHash, type Hash } from 'node:crypto';
import { existsSync, readdirSync, readFileSync, renameSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { DatadexIOError, describeError } from '../errors.js';

/**
 * List regular files under `root` as POSIX relative paths, sorted
 * lexicographically. Symbolic links and special files are ignored.
 */
export function listFiles(root: string): string[] {
    const files: string[] = [];

    const walk = (relative: string): void => {
        const full = relative ? join(root, relative) : root;
        for (const entry of readdirSync(full, { withFileTypes: true })) {
            const entryRelative = relative ? `${relative}/${entry.name}` : entry.name;
            if (entry.isDirectory()) {
                walk(entryRelative);
            } else if (entry.isFile()) {
                files.push(entryRelative);
            }
        }
    };

    walk('');
    return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Content hash of a directory subtree (SHA-256, hex).
 *
 * Each file contributes its relative path, its byte length and its bytes,
 * in lexicographic path order. Neither the absolute location nor any file
 * metadata enters the digest.
 */
export function hashDirectory(dir: string): string {
    const hasher: Hash = createHash('sha256');

    let files: string[];
    try {
        files = listFiles(dir);
    } catch (error) {
        const { message, errno } = describeError(error);
        throw new DatadexIOError(dir, 'hash', message, errno);
    }

    for (const relative of files) {
        let content: Buffer;
        try {
            content = readFileSync(join(dir, ...relative.split('/')));
        } catch (error) {
            const { message, errno } = describeError(error);
            throw new DatadexIOError(join(dir, relative), 'hash', message, errno);
        }
        // Length-prefix each entry so path/content boundaries are unambiguous.
        hasher.update(`${relative}\0${content.length}\0`, 'utf-8');
        hasher.update(content);
    }

    return hasher.digest('hex');
}

/**
 * Rename `dir` to a sibling named `digest` and return the new path.
 * An existing target is never overwritten.
 */
export function renameToDigest(dir: string, digest: string): string {
    if (basename(dir) === digest) {
        return dir;
    }

    const target = join(dirname(dir), digest);
    if (existsSync(target)) {
        throw new DatadexIOError(dir, 'rename', `target '${target}' already exists`);
    }

    try {
        renameSync(dir, target);
    } catch (error) {
        const { message, errno } = describeError(error);
        throw new DatadexIOError(dir, 'rename', message, errno);
    }
    return target;
}
