import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import { ProviderError, RetrievalError, describeError } from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import type { SnapshotHolder } from "../snapshot/holder";
import { vectorNorm } from "../snapshot/indexFile";
import type { ActiveSnapshot, CorpusMetadata, IndexedFragment } from "../snapshot/types";
import { getLogger } from "../utils/logger";

export interface RetrievedFragment {
    id: string;
    documentId: string;
    title?: string;
    text: string;
    score: number;
}

export interface RetrievalResult {
    generation: string;
    /** Metadata of the generation the fragments were ranked from. */
    corpus: Readonly<CorpusMetadata>;
    fragments: RetrievedFragment[];
}

export interface RetrieveOptions {
    signal?: AbortSignal;
    similarityThreshold?: number;
}

function cosine(query: readonly number[], queryNorm: number, fragment: IndexedFragment): number {
    if (queryNorm === 0 || fragment.norm === 0) {
        return 0;
    }

    const { embedding } = fragment;
    let dot = 0;
    for (let i = 0; i < embedding.length; i += 1) {
        dot += query[i] * embedding[i];
    }
    return dot / (queryNorm * fragment.norm);
}

/**
 * Exact cosine scan over one snapshot generation. Results are ordered by
 * descending score; equal scores keep index order.
 */
export function rankFragments(
    snapshot: ActiveSnapshot,
    queryEmbedding: readonly number[],
    k: number,
    similarityThreshold: number
): RetrievedFragment[] {
    if (queryEmbedding.length !== snapshot.metadata.dimension) {
        throw new RetrievalError(
            `Query embedding has ${queryEmbedding.length} dimensions, snapshot ${snapshot.generation} expects ${snapshot.metadata.dimension}.`
        );
    }
    if (k <= 0) {
        return [];
    }

    const queryNorm = vectorNorm(queryEmbedding);
    const scored: Array<{ index: number; score: number }> = [];

    snapshot.fragments.forEach((fragment, index) => {
        const score = cosine(queryEmbedding, queryNorm, fragment);
        if (score >= similarityThreshold) {
            scored.push({ index, score });
        }
    });

    scored.sort((a, b) => b.score - a.score || a.index - b.index);

    return scored.slice(0, k).map(({ index, score }) => {
        const fragment = snapshot.fragments[index];
        return {
            id: fragment.id,
            documentId: fragment.documentId,
            title: fragment.title,
            text: fragment.text,
            score,
        };
    });
}

export class RetrievalEngine {
    private readonly logger: Logger;

    constructor(
        private readonly holder: SnapshotHolder,
        private readonly embedding: EmbeddingProvider,
        private readonly config: RetrievalConfig,
        logger?: Logger
    ) {
        this.logger = logger ?? getLogger();
    }

    async retrieve(queryText: string, k = this.config.matchCount, options: RetrieveOptions = {}): Promise<RetrievalResult> {
        // pin the generation for the whole call
        const snapshot = this.holder.active;
        const queryEmbedding = await this.embedQuery(queryText, options.signal);
        const fragments = rankFragments(
            snapshot,
            queryEmbedding,
            k,
            options.similarityThreshold ?? this.config.similarityThreshold
        );

        this.logger.debug({ generation: snapshot.generation, matches: fragments.length }, "Retrieved fragments.");
        return { generation: snapshot.generation, corpus: snapshot.metadata, fragments };
    }

    private async embedQuery(queryText: string, signal?: AbortSignal): Promise<number[]> {
        try {
            return await this.embedding.embedQuery(queryText, { signal });
        } catch (error) {
            if (error instanceof ProviderError) {
                throw error;
            }
            throw new ProviderError(`Query embedding failed: ${describeError(error)}`, { cause: error });
        }
    }

    metadata(): Readonly<CorpusMetadata> {
        return this.holder.metadata;
    }
}
