import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CorruptArchiveError, EmptyCorpusError, describeError } from "../errors";
import type { ActiveSnapshot, CorpusMetadata, IndexedFragment, InstallReceipt } from "./types";

export const DEFAULT_MARKER_FILE = "index.json";
export const RECEIPT_FILE = ".snapshot.json";

const fragmentSchema = z.object({
    id: z.string().min(1),
    documentId: z.string().min(1),
    text: z.string(),
    title: z.string().optional(),
    // plain number array, or base64 of little-endian float32 values
    embedding: z.union([z.array(z.number()), z.string()]),
});

const snapshotIndexSchema = z.object({
    version: z.number().int().optional(),
    meta: z
        .object({
            corpusDate: z.string().optional(),
            documentCount: z.number().int().nonnegative().optional(),
            embeddingModel: z.string().optional(),
        })
        .default({}),
    fragments: z.array(fragmentSchema),
});

const receiptSchema = z.object({
    generation: z.string().min(1),
    installedAt: z.string().min(1),
    sourceUrl: z.string().optional(),
});

export type SnapshotIndexFile = z.input<typeof snapshotIndexSchema>;

export interface LoadSnapshotOptions {
    /** Directory the index is read from; defaults to `installPath`. */
    readFrom?: string;
    installPath: string;
    markerFile?: string;
    receipt: InstallReceipt;
}

function decodeEmbedding(raw: number[] | string, fragmentId: string): Float32Array {
    if (Array.isArray(raw)) {
        return Float32Array.from(raw);
    }

    const buffer = Buffer.from(raw, "base64");
    if (buffer.byteLength === 0 || buffer.byteLength % 4 !== 0) {
        throw new CorruptArchiveError(`Fragment "${fragmentId}" has a malformed base64 embedding.`);
    }

    const values = new Float32Array(buffer.byteLength / 4);
    for (let i = 0; i < values.length; i += 1) {
        values[i] = buffer.readFloatLE(i * 4);
    }
    return values;
}

export function vectorNorm(vector: ArrayLike<number>): number {
    let sum = 0;
    for (let i = 0; i < vector.length; i += 1) {
        sum += vector[i] * vector[i];
    }
    return Math.sqrt(sum);
}

/**
 * Reads the marker/index file of an extracted snapshot, validates it and computes
 * its corpus metadata. Throws `CorruptArchiveError` for anything unreadable and
 * `EmptyCorpusError` when no documents are present.
 */
export async function loadSnapshotIndex(options: LoadSnapshotOptions): Promise<ActiveSnapshot> {
    const markerFile = options.markerFile ?? DEFAULT_MARKER_FILE;
    const indexPath = path.join(options.readFrom ?? options.installPath, markerFile);

    let raw: string;
    try {
        raw = await fs.readFile(indexPath, "utf8");
    } catch (error) {
        throw new CorruptArchiveError(`Snapshot index ${indexPath} is not readable: ${describeError(error)}`, {
            cause: error,
        });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new CorruptArchiveError(`Snapshot index ${indexPath} is not valid JSON.`, { cause: error });
    }

    const parsed = snapshotIndexSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new CorruptArchiveError(`Snapshot index ${indexPath} is malformed: ${issues}`);
    }

    const { meta, fragments: rawFragments } = parsed.data;
    const fragments: IndexedFragment[] = [];
    const documentIds = new Set<string>();
    let dimension = 0;

    for (const fragment of rawFragments) {
        const embedding = decodeEmbedding(fragment.embedding, fragment.id);
        if (embedding.length === 0) {
            throw new CorruptArchiveError(`Fragment "${fragment.id}" has an empty embedding.`);
        }
        if (dimension === 0) {
            dimension = embedding.length;
        } else if (embedding.length !== dimension) {
            throw new CorruptArchiveError(
                `Fragment "${fragment.id}" has dimension ${embedding.length}, expected ${dimension}.`
            );
        }

        documentIds.add(fragment.documentId);
        fragments.push({
            id: fragment.id,
            documentId: fragment.documentId,
            text: fragment.text,
            title: fragment.title,
            embedding,
            norm: vectorNorm(embedding),
        });
    }

    const documentCount = documentIds.size;
    if (documentCount === 0) {
        throw new EmptyCorpusError(options.installPath);
    }

    if (meta.documentCount !== undefined && meta.documentCount !== documentCount) {
        throw new CorruptArchiveError(
            `Snapshot index declares ${meta.documentCount} documents but contains ${documentCount}.`
        );
    }

    const { receipt } = options;
    const metadata: CorpusMetadata = Object.freeze({
        documentCount,
        fragmentCount: fragments.length,
        corpusDate: meta.corpusDate ?? receipt.installedAt.slice(0, 10),
        installedAt: receipt.installedAt,
        generation: receipt.generation,
        dimension,
        embeddingModel: meta.embeddingModel,
    });

    return Object.freeze({
        generation: receipt.generation,
        installPath: options.installPath,
        sourceUrl: receipt.sourceUrl,
        installedAt: receipt.installedAt,
        metadata,
        fragments: Object.freeze(fragments),
    });
}

export async function writeReceipt(directory: string, receipt: InstallReceipt): Promise<void> {
    await fs.writeFile(path.join(directory, RECEIPT_FILE), JSON.stringify(receipt, null, 2));
}

/**
 * Receipt left by the installer. Installations that predate receipts fall back
 * to the marker file's modification time.
 */
export async function readReceipt(directory: string, markerFile = DEFAULT_MARKER_FILE): Promise<InstallReceipt> {
    try {
        const raw = await fs.readFile(path.join(directory, RECEIPT_FILE), "utf8");
        const parsed = receiptSchema.safeParse(JSON.parse(raw));
        if (parsed.success) {
            return parsed.data;
        }
    } catch (error) {
        if (!isMissingFileError(error) && !(error instanceof SyntaxError)) {
            throw error;
        }
    }

    const stats = await fs.stat(path.join(directory, markerFile)).catch((error: unknown) => {
        throw new CorruptArchiveError(`Installed snapshot at ${directory} has no ${markerFile}.`, { cause: error });
    });
    return {
        generation: `local-${Math.floor(stats.mtimeMs)}`,
        installedAt: stats.mtime.toISOString(),
    };
}

export function isMissingFileError(error: unknown): boolean {
    if (!(error instanceof Error) || !("code" in error)) {
        return false;
    }
    return error.code === "ENOENT" || error.code === "ENOTDIR";
}
