import { describe, expect, it } from "vitest";
import { RetrievalError } from "../errors";
import { SnapshotHolder } from "../snapshot/holder";
import type { ActiveSnapshot, IndexedFragment } from "../snapshot/types";
import { StubEmbeddingProvider, silentLogger } from "../test/fixtures";
import { RetrievalEngine, rankFragments } from "./retrieval";

function fragment(id: string, documentId: string, embedding: number[]): IndexedFragment {
    const values = Float32Array.from(embedding);
    return {
        id,
        documentId,
        text: `text of ${id}`,
        embedding: values,
        norm: Math.hypot(...embedding),
    };
}

function snapshotOf(generation: string, fragments: IndexedFragment[]): ActiveSnapshot {
    const documentCount = new Set(fragments.map((item) => item.documentId)).size;
    return {
        generation,
        installPath: "/srv/knowledge",
        installedAt: "2025-10-14T08:00:00.000Z",
        metadata: {
            documentCount,
            fragmentCount: fragments.length,
            corpusDate: "2025-10-14",
            installedAt: "2025-10-14T08:00:00.000Z",
            generation,
            dimension: fragments[0].embedding.length,
        },
        fragments,
    };
}

const fragments = [
    fragment("a", "doc-1", [1, 0]),
    fragment("b", "doc-1", [0, 1]),
    fragment("c", "doc-2", [1, 1]),
    fragment("d", "doc-3", [2, 0]),
    fragment("e", "doc-4", [-1, 0]),
];

describe("rankFragments", () => {
    it("orders by descending cosine score and keeps index order on ties", () => {
        const ranked = rankFragments(snapshotOf("g1", fragments), [1, 0], 10, 0);

        expect(ranked.map((item) => item.id)).toEqual(["a", "d", "c", "b"]);
        expect(ranked[0].score).toBeCloseTo(1);
        expect(ranked[2].score).toBeCloseTo(Math.SQRT1_2);
    });

    it("returns at most k results", () => {
        expect(rankFragments(snapshotOf("g1", fragments), [1, 0], 2, 0).map((item) => item.id)).toEqual(["a", "d"]);
    });

    it("drops results below the similarity floor", () => {
        expect(rankFragments(snapshotOf("g1", fragments), [1, 0], 10, 0.9).map((item) => item.id)).toEqual(["a", "d"]);
    });

    it("returns an empty list when nothing clears the floor", () => {
        expect(rankFragments(snapshotOf("g1", fragments), [0, -1], 10, 0.5)).toEqual([]);
    });

    it("rejects a query with the wrong dimension", () => {
        expect(() => rankFragments(snapshotOf("g1", fragments), [1, 0, 0], 3, 0)).toThrow(RetrievalError);
    });

    it("scores a zero query vector as zero", () => {
        expect(rankFragments(snapshotOf("g1", fragments), [0, 0], 10, 0.1)).toEqual([]);
    });
});

describe("RetrievalEngine", () => {
    it("embeds the query and ranks against the active snapshot", async () => {
        const holder = new SnapshotHolder();
        holder.activate(snapshotOf("g1", fragments));
        const embedding = new StubEmbeddingProvider(() => [0, 1]);
        const engine = new RetrievalEngine(holder, embedding, { matchCount: 2, similarityThreshold: 0.5 }, silentLogger);

        const result = await engine.retrieve("what is b?");

        expect(embedding.calls).toEqual(["what is b?"]);
        expect(result.generation).toBe("g1");
        expect(result.fragments.map((item) => item.id)).toEqual(["b", "c"]);
        expect(result.corpus.documentCount).toBe(4);
    });

    it("stays on the generation it started with when a swap happens mid-call", async () => {
        const holder = new SnapshotHolder();
        holder.activate(snapshotOf("g1", fragments));
        const next = snapshotOf("g2", [fragment("z", "doc-9", [1, 0])]);
        const embedding = new StubEmbeddingProvider(() => {
            holder.activate(next);
            return [1, 0];
        });
        const engine = new RetrievalEngine(holder, embedding, { matchCount: 10, similarityThreshold: 0 }, silentLogger);

        const result = await engine.retrieve("question");

        expect(result.generation).toBe("g1");
        expect(result.corpus.documentCount).toBe(4);
        expect(engine.metadata().generation).toBe("g2");
    });

    it("reports the install-time document count under concurrent reads", async () => {
        const holder = new SnapshotHolder();
        holder.activate(snapshotOf("g1", fragments));
        const engine = new RetrievalEngine(
            holder,
            new StubEmbeddingProvider(() => [1, 0]),
            { matchCount: 3, similarityThreshold: 0 },
            silentLogger
        );

        const results = await Promise.all(
            Array.from({ length: 50 }, async (_, index) => {
                const result = await engine.retrieve(`question ${index}`);
                return [result.corpus.documentCount, engine.metadata().documentCount];
            })
        );

        expect(new Set(results.flat())).toEqual(new Set([4]));
    });
});
