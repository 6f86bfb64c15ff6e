export type TurnStatus = "complete" | "partial";

export interface ConversationTurn {
    conversationId: string;
    sequence: number;
    idempotencyKey: string;
    userMessage: string;
    assistantResponse: string;
    status: TurnStatus;
    /** Checksum of the assembled prompt the answer was generated from. */
    contextRef?: string;
    interfaceSource: string;
    createdAt: string;
}

/** A turn as handed to the recorder; sequence and timestamp are assigned on write. */
export type TurnInput = Omit<ConversationTurn, "conversationId" | "sequence" | "createdAt">;

export type HistoryTurn = Pick<ConversationTurn, "userMessage" | "assistantResponse">;

export interface RecordResult {
    sequence: number;
    /** False when the idempotency key matched an already stored turn. */
    created: boolean;
}

export interface ConversationStore {
    findByIdempotencyKey(conversationId: string, idempotencyKey: string): Promise<ConversationTurn | null>;
    /** Highest stored sequence for the conversation, 0 when it has none. */
    lastSequence(conversationId: string): Promise<number>;
    append(turn: ConversationTurn): Promise<void>;
    /** Most recent turns, oldest first. */
    listRecent(conversationId: string, limit: number): Promise<ConversationTurn[]>;
}
