import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import * as tar from "tar";
import type { AppConfig, ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { ChatProvider, CompletionRequest, CompletionResult, EmbedOptions, EmbeddingProvider } from "../llm/types";
import type { SnapshotIndexFile } from "../snapshot/indexFile";

export const silentLogger = pino({ level: "silent" });

export async function makeTempDir(prefix = "corpus-chat-test-"): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface IndexFixtureOptions {
    documents: number;
    fragmentsPerDocument?: number;
    dimension?: number;
    corpusDate?: string;
    declaredCount?: number;
}

/** Builds an index whose fragment `doc-<d>-<f>` points along axis `d % dimension`. */
export function buildIndex(options: IndexFixtureOptions): SnapshotIndexFile {
    const dimension = options.dimension ?? 3;
    const perDocument = options.fragmentsPerDocument ?? 1;
    const fragments: SnapshotIndexFile["fragments"] = [];

    for (let d = 0; d < options.documents; d += 1) {
        for (let f = 0; f < perDocument; f += 1) {
            const embedding = new Array<number>(dimension).fill(0);
            embedding[d % dimension] = 1;
            fragments.push({
                id: `doc-${d}-${f}`,
                documentId: `doc-${d}`,
                title: `Document ${d}`,
                text: `Fragment ${f} of document ${d}.`,
                embedding,
            });
        }
    }

    return {
        version: 1,
        meta: {
            corpusDate: options.corpusDate ?? "2025-10-01",
            documentCount: options.declaredCount,
            embeddingModel: "test-embedding",
        },
        fragments,
    };
}

export async function writeSnapshotDir(
    dir: string,
    index: SnapshotIndexFile,
    extraFiles: Record<string, string> = {}
): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, "index.json"), JSON.stringify(index));
    for (const [name, content] of Object.entries(extraFiles)) {
        await fs.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
        await fs.writeFile(path.join(dir, name), content);
    }
}

/**
 * Packs `files` into a gzipped tarball. With `topLevelDir` the entries sit below
 * that directory, the way `tar czf snapshot.tar.gz brain/` lays them out.
 */
export async function buildArchive(
    archivePath: string,
    files: Record<string, string>,
    options: { topLevelDir?: string } = {}
): Promise<void> {
    const source = await makeTempDir("corpus-chat-archive-");
    const root = options.topLevelDir ? path.join(source, options.topLevelDir) : source;

    for (const [name, content] of Object.entries(files)) {
        const target = path.join(root, name);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content);
    }

    const entries = options.topLevelDir ? [options.topLevelDir] : Object.keys(files);
    await tar.c({ gzip: true, file: archivePath, cwd: source }, entries);
    await fs.rm(source, { recursive: true, force: true });
}

export async function buildSnapshotArchive(
    archivePath: string,
    index: SnapshotIndexFile,
    options: { topLevelDir?: string; extraFiles?: Record<string, string> } = {}
): Promise<void> {
    await buildArchive(
        archivePath,
        { "index.json": JSON.stringify(index), ...(options.extraFiles ?? {}) },
        { topLevelDir: options.topLevelDir }
    );
}

/** Recursively maps every file under `dir` to its contents. */
export async function readTree(dir: string): Promise<Record<string, string>> {
    const tree: Record<string, string> = {};
    const walk = async (current: string): Promise<void> => {
        const entries = await fs.readdir(current, { withFileTypes: true });
        for (const entry of entries) {
            const full = path.join(current, entry.name);
            if (entry.isDirectory()) {
                await walk(full);
            } else {
                tree[path.relative(dir, full)] = await fs.readFile(full, "utf8");
            }
        }
    };
    await walk(dir);
    return tree;
}

const embeddingConfig: EmbeddingModelConfig = { provider: "openai", model: "test-embedding" };
const chatConfig: ChatModelConfig = { provider: "openai", model: "test-chat", temperature: 0 };

export class StubEmbeddingProvider implements EmbeddingProvider {
    readonly config = embeddingConfig;
    readonly calls: string[] = [];

    constructor(private readonly embed: (query: string) => number[] = () => [1, 0, 0]) {}

    async embedQuery(query: string, _options?: EmbedOptions): Promise<number[]> {
        this.calls.push(query);
        return this.embed(query);
    }
}

export class StubChatProvider implements ChatProvider {
    readonly config = chatConfig;
    readonly requests: CompletionRequest[] = [];

    constructor(private readonly respond: (request: CompletionRequest) => Promise<CompletionResult> = async () => ({ text: "stub answer" })) {}

    async complete(request: CompletionRequest): Promise<CompletionResult> {
        this.requests.push(request);
        return this.respond(request);
    }
}

export function testConfig(installPath: string, overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        logging: { level: "fatal", pretty: false },
        server: { port: 0 },
        snapshot: {
            sourceUrl: "https://artifacts.test/snapshot.tar.gz",
            token: "test-secret",
            policy: "fetch-if-missing",
            installPath,
            markerFile: "index.json",
            fetchTimeoutMs: 5_000,
            fetchRetries: 2,
            retryMinTimeoutMs: 1,
        },
        retrieval: { matchCount: 5, similarityThreshold: 0.2 },
        prompt: { maxContextChars: 12_000, historyTurns: 5 },
        conversations: {
            store: "memory",
            table: "conversation_turns",
            interfaceSource: "test",
            recordPartialTurns: false,
        },
        llm: { embedding: embeddingConfig, chat: chatConfig },
        ...overrides,
    };
}
