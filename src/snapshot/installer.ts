import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { RefreshPolicy } from "../config/types";
import { CorruptArchiveError, describeError, isKnowledgeBaseError } from "../errors";
import { getLogger } from "../utils/logger";
import { type ArchiveExtractor, extractArchive, listArchiveEntries, resolveStripDepth } from "./archive";
import { DEFAULT_MARKER_FILE, isMissingFileError, loadSnapshotIndex, readReceipt, writeReceipt } from "./indexFile";
import type { ActiveSnapshot, InstallReceipt } from "./types";

export interface InstallOptions {
    installPath: string;
    markerFile?: string;
    sourceUrl?: string;
    logger?: Logger;
    /** Replaces the tar extractor, e.g. to inject failures. */
    extract?: ArchiveExtractor;
    now?: () => Date;
}

export function generationsDirFor(installPath: string): string {
    return `${installPath}.generations`;
}

function createGeneration(now: Date): string {
    return `${now.toISOString().replace(/[:.]/g, "-")}-${crypto.randomBytes(3).toString("hex")}`;
}

async function lstatOrNull(target: string) {
    try {
        return await fs.lstat(target);
    } catch (error) {
        if (isMissingFileError(error)) {
            return null;
        }
        throw error;
    }
}

/**
 * Removes the live installation and every generation directory behind it.
 */
export async function removeInstallation(installPath: string): Promise<void> {
    await fs.rm(installPath, { recursive: true, force: true });
    await fs.rm(generationsDirFor(installPath), { recursive: true, force: true });
}

/**
 * Extracts and validates the archive in `targetDir`. On any failure `targetDir`
 * is removed and the error is reported as a corrupt archive unless it already
 * carries a more specific kind (e.g. `EmptyCorpusError`).
 */
async function extractAndValidate(
    archivePath: string,
    targetDir: string,
    strip: number,
    receipt: InstallReceipt,
    options: InstallOptions
): Promise<ActiveSnapshot> {
    const extract = options.extract ?? extractArchive;
    try {
        await extract(archivePath, targetDir, { strip });
        await writeReceipt(targetDir, receipt);
        return await loadSnapshotIndex({
            readFrom: targetDir,
            installPath: options.installPath,
            markerFile: options.markerFile,
            receipt,
        });
    } catch (error) {
        await fs.rm(targetDir, { recursive: true, force: true });
        if (isKnowledgeBaseError(error)) {
            throw error;
        }
        throw new CorruptArchiveError(`Failed to extract snapshot archive ${archivePath}: ${describeError(error)}`, {
            cause: error,
        });
    }
}

/**
 * Downtime-tolerant install: the archive is extracted beside the live path and
 * moved into place once it validates. The previous installation is renamed aside
 * just before the move and deleted after it.
 */
async function installDirect(
    archivePath: string,
    strip: number,
    receipt: InstallReceipt,
    options: InstallOptions
): Promise<ActiveSnapshot> {
    const { installPath } = options;
    const staging = `${installPath}.staging-${receipt.generation}`;
    const retired = `${installPath}.retired-${receipt.generation}`;

    await fs.mkdir(path.dirname(installPath), { recursive: true });
    const snapshot = await extractAndValidate(archivePath, staging, strip, receipt, options);

    const current = await lstatOrNull(installPath);
    if (current) {
        await fs.rename(installPath, retired);
    }
    try {
        await fs.rename(staging, installPath);
    } catch (error) {
        if (current) {
            await fs.rename(retired, installPath);
        }
        await fs.rm(staging, { recursive: true, force: true });
        throw error;
    }

    await fs.rm(retired, { recursive: true, force: true });
    await fs.rm(generationsDirFor(installPath), { recursive: true, force: true });
    return snapshot;
}

/**
 * Zero-downtime install: the archive is extracted into a new generation
 * directory and the live path, a symlink, is re-pointed with a single rename.
 */
async function installWithSwap(
    archivePath: string,
    strip: number,
    receipt: InstallReceipt,
    options: InstallOptions,
    logger: Logger
): Promise<ActiveSnapshot> {
    const { installPath } = options;
    const generationsDir = generationsDirFor(installPath);
    const generationDir = path.join(generationsDir, receipt.generation);

    await fs.mkdir(generationsDir, { recursive: true });
    const snapshot = await extractAndValidate(archivePath, generationDir, strip, receipt, options);

    await swapLiveLink(installPath, generationDir, receipt.generation, logger);
    await pruneGenerations(generationsDir, receipt.generation, logger);
    return snapshot;
}

async function swapLiveLink(installPath: string, generationDir: string, generation: string, logger: Logger): Promise<void> {
    const generationsDir = generationsDirFor(installPath);
    const tempLink = `${installPath}.link-${generation}`;
    const target = path.relative(path.dirname(installPath), generationDir);

    await fs.rm(tempLink, { force: true });
    await fs.symlink(target, tempLink, "dir");

    const current = await lstatOrNull(installPath);
    let adopted: string | undefined;

    try {
        if (current && !current.isSymbolicLink()) {
            // plain directory left by a direct install; adopt it as a generation
            const adoptedDir = path.join(generationsDir, `adopted-${generation}`);
            await fs.rename(installPath, adoptedDir);
            adopted = adoptedDir;
        }
        await fs.rename(tempLink, installPath);
    } catch (error) {
        await fs.rm(tempLink, { force: true });
        if (adopted) {
            await fs.rename(adopted, installPath);
        }
        throw error;
    }

    if (adopted) {
        logger.info({ adopted }, "Moved existing installation into the generations directory.");
    }
}

async function pruneGenerations(generationsDir: string, keep: string, logger: Logger): Promise<void> {
    const entries = await fs.readdir(generationsDir);
    const stale = entries.filter((entry) => entry !== keep);

    await Promise.all(
        stale.map((entry) => fs.rm(path.join(generationsDir, entry), { recursive: true, force: true }))
    );

    if (stale.length > 0) {
        logger.info({ removed: stale.length }, "Pruned previous snapshot generations.");
    }
}

/**
 * Installs a downloaded snapshot archive under the given policy and returns the
 * validated snapshot. The live install path only ever holds a complete snapshot:
 * extraction and validation happen elsewhere and failures leave it untouched.
 */
export async function installSnapshot(
    archivePath: string,
    policy: RefreshPolicy,
    options: InstallOptions
): Promise<ActiveSnapshot> {
    const logger = options.logger ?? getLogger();
    const markerFile = options.markerFile ?? DEFAULT_MARKER_FILE;
    const installedAt = (options.now ?? (() => new Date()))();
    const receipt: InstallReceipt = {
        generation: createGeneration(installedAt),
        installedAt: installedAt.toISOString(),
        sourceUrl: options.sourceUrl,
    };

    const entries = await listArchiveEntries(archivePath);
    const strip = resolveStripDepth(entries, markerFile);

    logger.info({ policy, generation: receipt.generation, entries: entries.length, strip }, "Installing snapshot.");

    const snapshot =
        policy === "fetch-and-swap"
            ? await installWithSwap(archivePath, strip, receipt, options, logger)
            : await installDirect(archivePath, strip, receipt, options);

    logger.info(
        {
            generation: snapshot.generation,
            documentCount: snapshot.metadata.documentCount,
            fragmentCount: snapshot.metadata.fragmentCount,
        },
        "Snapshot installed."
    );
    return snapshot;
}

/**
 * Loads an installation that is already present (the freshness gate decided not
 * to fetch).
 */
export async function loadInstalledSnapshot(
    installPath: string,
    options: { markerFile?: string } = {}
): Promise<ActiveSnapshot> {
    const markerFile = options.markerFile ?? DEFAULT_MARKER_FILE;
    const receipt = await readReceipt(installPath, markerFile);
    return loadSnapshotIndex({ installPath, markerFile, receipt });
}
