import fs from "node:fs/promises";
import type { Logger } from "pino";
import type { RefreshPolicy, SnapshotConfig } from "../config/types";
import { getLogger } from "../utils/logger";
import type { ArchiveExtractor } from "./archive";
import { fetchSnapshotArchive, redactUrl } from "./fetcher";
import { decideFreshness } from "./freshnessGate";
import type { SnapshotHolder } from "./holder";
import { installSnapshot, loadInstalledSnapshot, removeInstallation } from "./installer";
import type { ActiveSnapshot } from "./types";

export interface SnapshotLifecycleOptions {
    logger?: Logger;
    extract?: ArchiveExtractor;
}

async function fetchAndInstall(
    config: SnapshotConfig,
    policy: RefreshPolicy,
    options: SnapshotLifecycleOptions,
    logger: Logger
): Promise<ActiveSnapshot> {
    if (!config.sourceUrl) {
        throw new Error("SNAPSHOT_URL is required to fetch a knowledge-base snapshot.");
    }

    const fetched = await fetchSnapshotArchive(
        config.sourceUrl,
        { token: config.token },
        {
            scratchDir: config.scratchDir,
            timeoutMs: config.fetchTimeoutMs,
            retries: config.fetchRetries,
            minTimeoutMs: config.retryMinTimeoutMs,
            logger,
        }
    );

    try {
        return await installSnapshot(fetched.archivePath, policy, {
            installPath: config.installPath,
            markerFile: config.markerFile,
            sourceUrl: redactUrl(config.sourceUrl),
            extract: options.extract,
            logger,
        });
    } finally {
        await fs.rm(fetched.scratchDir, { recursive: true, force: true });
    }
}

/**
 * Start-up sequence: freshness gate, conditional fetch, install, activation.
 * Runs to completion before any request handler exists; every error it throws is
 * fatal for the process.
 */
export async function bootstrapSnapshot(
    config: SnapshotConfig,
    holder: SnapshotHolder,
    options: SnapshotLifecycleOptions = {}
): Promise<ActiveSnapshot> {
    const logger = options.logger ?? getLogger();
    const decision = await decideFreshness(config.installPath, config.policy, config.markerFile);

    logger.info({ policy: config.policy, decision, installPath: config.installPath }, "Snapshot freshness decided.");

    let snapshot: ActiveSnapshot;
    if (decision === "skip") {
        snapshot = await loadInstalledSnapshot(config.installPath, { markerFile: config.markerFile });
    } else {
        if (config.policy === "always-refresh") {
            await removeInstallation(config.installPath);
            logger.info("Discarded existing installation before fetching.");
        }
        snapshot = await fetchAndInstall(config, config.policy, options, logger);
    }

    holder.activate(snapshot);
    logger.info(
        {
            generation: snapshot.generation,
            documentCount: snapshot.metadata.documentCount,
            corpusDate: snapshot.metadata.corpusDate,
        },
        "Knowledge-base snapshot active."
    );
    return snapshot;
}

/**
 * Explicit refresh while serving: always fetch-and-swap, so the current snapshot
 * keeps serving until the new one is validated and activated.
 */
export async function refreshSnapshot(
    config: SnapshotConfig,
    holder: SnapshotHolder,
    options: SnapshotLifecycleOptions = {}
): Promise<ActiveSnapshot> {
    const logger = options.logger ?? getLogger();
    const snapshot = await fetchAndInstall(config, "fetch-and-swap", options, logger);
    const previous = holder.activate(snapshot);

    logger.info(
        {
            generation: snapshot.generation,
            previousGeneration: previous?.generation,
            documentCount: snapshot.metadata.documentCount,
        },
        "Knowledge-base snapshot refreshed."
    );
    return snapshot;
}

/**
 * Process-boundary wrapper around `bootstrapSnapshot`: logs the failure and maps
 * it to the exit code the caller should terminate with.
 */
export async function runSnapshotBootstrap(
    config: SnapshotConfig,
    holder: SnapshotHolder,
    options: SnapshotLifecycleOptions = {}
): Promise<number> {
    const logger = options.logger ?? getLogger();
    try {
        await bootstrapSnapshot(config, holder, options);
        return 0;
    } catch (error) {
        logger.fatal({ err: error, policy: config.policy }, "Snapshot bootstrap failed; refusing to serve.");
        return 1;
    }
}
