export interface DocumentFragment {
    id: string;
    documentId: string;
    text: string;
    title?: string;
    embedding: Float32Array;
}

export interface IndexedFragment extends DocumentFragment {
    /** Euclidean norm of `embedding`, precomputed at load time. */
    norm: number;
}

/**
 * Facts about the active snapshot, computed once when it is activated and never
 * re-derived per request.
 */
export interface CorpusMetadata {
    documentCount: number;
    fragmentCount: number;
    /** ISO date (YYYY-MM-DD) the corpus content is current as of. */
    corpusDate: string;
    installedAt: string;
    generation: string;
    dimension: number;
    embeddingModel?: string;
}

export interface ActiveSnapshot {
    generation: string;
    installPath: string;
    sourceUrl?: string;
    installedAt: string;
    metadata: Readonly<CorpusMetadata>;
    fragments: readonly IndexedFragment[];
}

export interface InstallReceipt {
    generation: string;
    installedAt: string;
    sourceUrl?: string;
}

export type FreshnessDecision = "skip" | "fetch";
