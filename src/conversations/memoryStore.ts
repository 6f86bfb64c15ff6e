import { PersistenceError } from "../errors";
import type { ConversationStore, ConversationTurn } from "./types";

/**
 * Process-local store for development runs and tests. Enforces the same
 * uniqueness rules as the `conversation_turns` table.
 */
export class InMemoryConversationStore implements ConversationStore {
    private readonly turns = new Map<string, ConversationTurn[]>();

    async findByIdempotencyKey(conversationId: string, idempotencyKey: string): Promise<ConversationTurn | null> {
        const turns = this.turns.get(conversationId) ?? [];
        return turns.find((turn) => turn.idempotencyKey === idempotencyKey) ?? null;
    }

    async lastSequence(conversationId: string): Promise<number> {
        const turns = this.turns.get(conversationId) ?? [];
        return turns.reduce((max, turn) => Math.max(max, turn.sequence), 0);
    }

    async append(turn: ConversationTurn): Promise<void> {
        const turns = this.turns.get(turn.conversationId) ?? [];
        if (turns.some((existing) => existing.sequence === turn.sequence)) {
            throw new PersistenceError(`Turn ${turn.sequence} already exists in conversation ${turn.conversationId}.`);
        }
        if (turns.some((existing) => existing.idempotencyKey === turn.idempotencyKey)) {
            throw new PersistenceError(`Idempotency key ${turn.idempotencyKey} already used in ${turn.conversationId}.`);
        }

        turns.push({ ...turn });
        this.turns.set(turn.conversationId, turns);
    }

    async listRecent(conversationId: string, limit: number): Promise<ConversationTurn[]> {
        if (limit <= 0) {
            return [];
        }
        const turns = [...(this.turns.get(conversationId) ?? [])].sort((a, b) => a.sequence - b.sequence);
        return turns.slice(-limit);
    }
}
