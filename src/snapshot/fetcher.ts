import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import pRetry from "p-retry";
import type { Logger } from "pino";
import {
    ArtifactFetchError,
    AuthError,
    NotFoundError,
    TransientNetworkError,
    describeError,
    isKnowledgeBaseError,
} from "../errors";
import { getLogger } from "../utils/logger";
import { listArchiveEntries } from "./archive";

export const ARCHIVE_FILE_NAME = "snapshot.tar.gz";
const USER_AGENT = "corpus-chat-bootstrap";
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export interface SnapshotCredentials {
    token?: string;
}

export interface FetchSnapshotOptions {
    /** Parent directory for the per-download scratch directory (defaults to the OS temp dir). */
    scratchDir?: string;
    timeoutMs?: number;
    retries?: number;
    minTimeoutMs?: number;
    logger?: Logger;
}

export interface FetchedArchive {
    archivePath: string;
    /** Scratch directory owned by this download; callers remove it when done. */
    scratchDir: string;
    bytes: number;
    entries: number;
}

/** Strips credentials and query strings before a URL is logged. */
export function redactUrl(sourceUrl: string): string {
    try {
        const url = new URL(sourceUrl);
        return `${url.protocol}//${url.host}${url.pathname}`;
    } catch {
        return "<invalid url>";
    }
}

export function classifyHttpFailure(status: number, statusText: string, sourceUrl: string): Error {
    const message = `Snapshot download from ${redactUrl(sourceUrl)} failed: ${status} ${statusText}`.trim();

    if (status === 401 || status === 403) {
        return new AuthError(message, status);
    }
    if (status === 404 || status === 410) {
        return new NotFoundError(message, status);
    }
    if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
        return new TransientNetworkError(message, { status });
    }
    return new ArtifactFetchError(message, status);
}

async function downloadOnce(
    sourceUrl: string,
    credentials: SnapshotCredentials,
    scratchDir: string,
    timeoutMs: number
): Promise<FetchedArchive> {
    const partPath = path.join(scratchDir, `${ARCHIVE_FILE_NAME}.part`);
    const archivePath = path.join(scratchDir, ARCHIVE_FILE_NAME);

    const headers: Record<string, string> = {
        Accept: "application/octet-stream",
        "User-Agent": USER_AGENT,
    };
    if (credentials.token) {
        headers["Authorization"] = `token ${credentials.token}`;
    }

    let response: Response;
    try {
        response = await fetch(sourceUrl, {
            headers,
            redirect: "follow",
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (error) {
        throw new TransientNetworkError(
            `Could not reach snapshot source ${redactUrl(sourceUrl)}: ${describeError(error)}`,
            { cause: error }
        );
    }

    if (!response.ok) {
        throw classifyHttpFailure(response.status, response.statusText, sourceUrl);
    }

    if (!response.body) {
        throw new TransientNetworkError(`Snapshot source ${redactUrl(sourceUrl)} returned an empty body.`);
    }

    try {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(partPath));
    } catch (error) {
        await fs.rm(partPath, { force: true });
        throw new TransientNetworkError(
            `Snapshot transfer from ${redactUrl(sourceUrl)} was interrupted: ${describeError(error)}`,
            { cause: error }
        );
    }

    try {
        const { size } = await fs.stat(partPath);
        if (size === 0) {
            throw new TransientNetworkError(`Snapshot source ${redactUrl(sourceUrl)} returned an empty body.`);
        }
        const entries = await listArchiveEntries(partPath);
        // only a complete, readable archive ever appears under the final name
        await fs.rename(partPath, archivePath);
        return { archivePath, scratchDir, bytes: size, entries: entries.length };
    } catch (error) {
        await fs.rm(partPath, { force: true });
        throw error;
    }
}

/**
 * Downloads the snapshot archive into a fresh scratch directory, never into the
 * serving path. Transient failures are retried with exponential backoff; auth,
 * not-found and corrupt-archive failures abort immediately.
 */
export async function fetchSnapshotArchive(
    sourceUrl: string,
    credentials: SnapshotCredentials,
    options: FetchSnapshotOptions = {}
): Promise<FetchedArchive> {
    const logger = options.logger ?? getLogger();
    const scratchParent = options.scratchDir ?? os.tmpdir();
    await fs.mkdir(scratchParent, { recursive: true });
    const scratchDir = await fs.mkdtemp(path.join(scratchParent, "snapshot-"));
    const timeoutMs = options.timeoutMs ?? 120_000;

    logger.info({ source: redactUrl(sourceUrl) }, "Downloading knowledge-base snapshot.");

    try {
        const fetched = await pRetry(
            async () => {
                try {
                    return await downloadOnce(sourceUrl, credentials, scratchDir, timeoutMs);
                } catch (error) {
                    if (error instanceof TransientNetworkError) {
                        throw error;
                    }
                    const cause = error instanceof Error ? error : new Error(String(error));
                    throw new pRetry.AbortError(cause);
                }
            },
            {
                retries: options.retries ?? 3,
                factor: 2,
                minTimeout: options.minTimeoutMs ?? 1_000,
                maxTimeout: 30_000,
                onFailedAttempt: (error) => {
                    logger.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        "snapshot:fetch failed attempt"
                    );
                },
            }
        );

        logger.info({ bytes: fetched.bytes, entries: fetched.entries }, "Snapshot archive downloaded and verified.");
        return fetched;
    } catch (error) {
        await fs.rm(scratchDir, { recursive: true, force: true });
        if (!isKnowledgeBaseError(error)) {
            logger.error({ err: error }, "Snapshot download failed unexpectedly.");
        }
        throw error;
    }
}
