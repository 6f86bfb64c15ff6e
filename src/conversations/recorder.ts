import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import { PersistenceError, describeError } from "../errors";
import { getLogger } from "../utils/logger";
import { createKeyedSerialQueue } from "../utils/rateLimiter";
import type { ConversationStore, HistoryTurn, RecordResult, TurnInput } from "./types";

/**
 * Appends turns to the durable store with per-conversation sequence numbers.
 * Writes for one conversation are serialized; different conversations proceed
 * independently. A sequence number is only taken once the store accepts the turn.
 */
export class ConversationRecorder {
    private readonly queue: Bottleneck.Group;
    private readonly logger: Logger;

    constructor(
        private readonly store: ConversationStore,
        options: { logger?: Logger; idleTimeoutMs?: number } = {}
    ) {
        this.queue = createKeyedSerialQueue(options.idleTimeoutMs);
        this.logger = options.logger ?? getLogger();
    }

    record(conversationId: string, turn: TurnInput, now: Date = new Date()): Promise<RecordResult> {
        return this.queue.key(conversationId).schedule(() => this.write(conversationId, turn, now));
    }

    async history(conversationId: string, limit: number): Promise<HistoryTurn[]> {
        if (limit <= 0) {
            return [];
        }

        try {
            const turns = await this.store.listRecent(conversationId, limit);
            return turns
                .filter((turn) => turn.status === "complete")
                .map(({ userMessage, assistantResponse }) => ({ userMessage, assistantResponse }));
        } catch (error) {
            throw this.toPersistenceError(`Could not load history for ${conversationId}`, error);
        }
    }

    private async write(conversationId: string, turn: TurnInput, now: Date): Promise<RecordResult> {
        try {
            const existing = await this.store.findByIdempotencyKey(conversationId, turn.idempotencyKey);
            if (existing) {
                this.logger.debug(
                    { conversationId, sequence: existing.sequence },
                    "Turn already recorded for idempotency key."
                );
                return { sequence: existing.sequence, created: false };
            }

            const sequence = (await this.store.lastSequence(conversationId)) + 1;
            await this.store.append({
                ...turn,
                conversationId,
                sequence,
                createdAt: now.toISOString(),
            });

            this.logger.debug({ conversationId, sequence, status: turn.status }, "Conversation turn recorded.");
            return { sequence, created: true };
        } catch (error) {
            throw this.toPersistenceError(`Could not record turn for ${conversationId}`, error);
        }
    }

    private toPersistenceError(message: string, error: unknown): PersistenceError {
        if (error instanceof PersistenceError) {
            return error;
        }
        return new PersistenceError(`${message}: ${describeError(error)}`, { cause: error });
    }
}
