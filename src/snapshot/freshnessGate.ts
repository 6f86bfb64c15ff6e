import fs from "node:fs/promises";
import path from "node:path";
import type { RefreshPolicy } from "../config/types";
import { DEFAULT_MARKER_FILE } from "./indexFile";
import type { FreshnessDecision } from "./types";

/**
 * True when the marker file exists under `installPath` and is non-empty.
 * Unreadable paths count as "not installed".
 */
export async function hasInstalledMarker(installPath: string, markerFile = DEFAULT_MARKER_FILE): Promise<boolean> {
    try {
        const stats = await fs.stat(path.join(installPath, markerFile));
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}

/**
 * Start-up decision for whether a snapshot has to be fetched. Only inspects
 * existence and size of the marker file.
 *
 * `always-refresh` and `fetch-and-swap` both fetch unconditionally; they differ in
 * what the installer does with the existing installation.
 */
export async function decideFreshness(
    installPath: string,
    policy: RefreshPolicy,
    markerFile = DEFAULT_MARKER_FILE
): Promise<FreshnessDecision> {
    switch (policy) {
        case "always-refresh":
        case "fetch-and-swap":
            return "fetch";
        case "fetch-if-missing":
            return (await hasInstalledMarker(installPath, markerFile)) ? "skip" : "fetch";
    }
}
