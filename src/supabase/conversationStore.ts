import { type SupabaseClient, createClient } from "@supabase/supabase-js";
import type { Logger } from "pino";
import { z } from "zod";
import type { SupabaseConfig } from "../config/types";
import type { ConversationStore, ConversationTurn } from "../conversations/types";
import { PersistenceError } from "../errors";
import { getLogger } from "../utils/logger";

const TURN_COLUMNS =
    "conversation_id, sequence, idempotency_key, user_message, assistant_response, status, context_ref, interface_source, created_at";

const turnRowSchema = z.object({
    conversation_id: z.string(),
    sequence: z.number().int(),
    idempotency_key: z.string(),
    user_message: z.string(),
    assistant_response: z.string(),
    status: z.enum(["complete", "partial"]),
    context_ref: z.string().nullable().optional(),
    interface_source: z.string(),
    created_at: z.string(),
});

type TurnRow = z.infer<typeof turnRowSchema>;

function fromRow(row: TurnRow): ConversationTurn {
    return {
        conversationId: row.conversation_id,
        sequence: row.sequence,
        idempotencyKey: row.idempotency_key,
        userMessage: row.user_message,
        assistantResponse: row.assistant_response,
        status: row.status,
        contextRef: row.context_ref ?? undefined,
        interfaceSource: row.interface_source,
        createdAt: row.created_at,
    };
}

function toRow(turn: ConversationTurn): TurnRow {
    return {
        conversation_id: turn.conversationId,
        sequence: turn.sequence,
        idempotency_key: turn.idempotencyKey,
        user_message: turn.userMessage,
        assistant_response: turn.assistantResponse,
        status: turn.status,
        context_ref: turn.contextRef ?? null,
        interface_source: turn.interfaceSource,
        created_at: turn.createdAt,
    };
}

export class SupabaseConversationStore implements ConversationStore {
    private readonly logger: Logger;
    private readonly client: SupabaseClient;

    constructor(
        config: SupabaseConfig,
        private readonly table: string,
        logger?: Logger
    ) {
        this.logger = logger ?? getLogger();
        this.client = createClient(config.url, config.serviceRoleKey, {
            auth: {
                persistSession: false,
            },
            global: {
                headers: {
                    "X-Client-Info": "corpus-chat/1.0.0",
                },
            },
        });
    }

    async verifyConnection(): Promise<void> {
        const { error } = await this.client.from(this.table).select("conversation_id").limit(1);

        if (error && error.code !== "PGRST116") {
            throw new PersistenceError(`Failed to connect to Supabase table "${this.table}": ${error.message}`);
        }

        this.logger.info(`Connected to the table "${this.table}"`);
    }

    async findByIdempotencyKey(conversationId: string, idempotencyKey: string): Promise<ConversationTurn | null> {
        const { data, error } = await this.client
            .from(this.table)
            .select(TURN_COLUMNS)
            .eq("conversation_id", conversationId)
            .eq("idempotency_key", idempotencyKey)
            .maybeSingle();

        if (error) {
            throw new PersistenceError(`Failed to look up idempotency key: ${error.message}`);
        }
        return data ? fromRow(this.parseRow(data)) : null;
    }

    async lastSequence(conversationId: string): Promise<number> {
        const { data, error } = await this.client
            .from(this.table)
            .select("sequence")
            .eq("conversation_id", conversationId)
            .order("sequence", { ascending: false })
            .limit(1);

        if (error) {
            throw new PersistenceError(`Failed to read last sequence for ${conversationId}: ${error.message}`);
        }

        const rows = z.array(z.object({ sequence: z.number().int() })).parse(data ?? []);
        return rows[0]?.sequence ?? 0;
    }

    async append(turn: ConversationTurn): Promise<void> {
        const { error } = await this.client.from(this.table).insert(toRow(turn));

        if (error) {
            this.logger.error({ err: error, conversationId: turn.conversationId }, "Failed to insert conversation turn.");
            throw new PersistenceError(`Failed to insert conversation turn: ${error.message}`);
        }
    }

    async listRecent(conversationId: string, limit: number): Promise<ConversationTurn[]> {
        const { data, error } = await this.client
            .from(this.table)
            .select(TURN_COLUMNS)
            .eq("conversation_id", conversationId)
            .order("sequence", { ascending: false })
            .limit(limit);

        if (error) {
            throw new PersistenceError(`Failed to list turns for ${conversationId}: ${error.message}`);
        }

        return (data ?? []).map((row) => fromRow(this.parseRow(row))).reverse();
    }

    private parseRow(row: unknown): TurnRow {
        const parsed = turnRowSchema.safeParse(row);
        if (!parsed.success) {
            throw new PersistenceError(`Unexpected row shape in "${this.table}": ${parsed.error.message}`);
        }
        return parsed.data;
    }
}
