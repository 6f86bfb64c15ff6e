import fs from "node:fs/promises";
import * as tar from "tar";
import { CorruptArchiveError, describeError } from "../errors";

export type ArchiveExtractor = (archivePath: string, targetDir: string, options: { strip: number }) => Promise<void>;

export async function listArchiveEntries(archivePath: string): Promise<string[]> {
    const entries: string[] = [];
    try {
        await tar.t({
            file: archivePath,
            strict: true,
            onReadEntry: (entry) => {
                entries.push(entry.path);
            },
        });
    } catch (error) {
        throw new CorruptArchiveError(`Snapshot archive ${archivePath} could not be read: ${describeError(error)}`, {
            cause: error,
        });
    }
    return entries;
}

export const extractArchive: ArchiveExtractor = async (archivePath, targetDir, { strip }) => {
    await fs.mkdir(targetDir, { recursive: true });
    await tar.x({
        file: archivePath,
        cwd: targetDir,
        strip,
        strict: true,
    });
};

/**
 * Number of leading path segments to strip so the marker file lands at the root
 * of the target directory. Archives may carry the marker at the root or below a
 * single top-level directory (`tar czf snapshot.tar.gz brain/`).
 */
export function resolveStripDepth(entries: string[], markerFile: string): number {
    let best: number | undefined;

    for (const entry of entries) {
        const segments = entry.split("/").filter((segment) => segment.length > 0);
        if (segments[segments.length - 1] !== markerFile) {
            continue;
        }

        const prefix = segments.slice(0, -1);
        const meaningful = prefix.filter((segment) => segment !== ".");
        if (meaningful.length > 1) {
            continue;
        }

        if (best === undefined || prefix.length < best) {
            best = prefix.length;
        }
    }

    if (best === undefined) {
        throw new CorruptArchiveError(`Snapshot archive does not contain ${markerFile} at its root or in a top-level directory.`);
    }

    return best;
}
