import type { HistoryTurn } from "../conversations/types";
import type { CorpusMetadata } from "../snapshot/types";
import { calculateChecksum } from "../utils/calculateChecksum";
import type { RetrievedFragment } from "./retrieval";

export const DEFAULT_SYSTEM_PROMPT = [
    "You are a knowledge-base assistant. Answer questions using the provided context.",
    "When the question is about the knowledge base itself, use the figures given above.",
    "",
    "When answering:",
    "- Give direct, helpful answers based on the context",
    "- If the context doesn't cover the question, say so clearly.",
    "- Do not invent facts, names or figures that are not in the context.",
    "",
    "Be concise but thorough.",
].join("\n");

export interface PromptInput {
    query: string;
    fragments: readonly RetrievedFragment[];
    corpus: Readonly<CorpusMetadata>;
    history: readonly HistoryTurn[];
    currentDate: Date;
}

export interface PromptOptions {
    systemPrompt?: string;
    /** Budget for the history and context sections together. */
    maxContextChars: number;
}

export interface PromptContext {
    system: string;
    prompt: string;
    fragmentIds: string[];
    historyTurns: number;
    contextRef: string;
}

function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

function buildSystem(corpus: Readonly<CorpusMetadata>, currentDate: Date, basePrompt: string): string {
    return [
        "Knowledge base:",
        `- Documents indexed: ${corpus.documentCount}`,
        `- Corpus current as of: ${corpus.corpusDate}`,
        `- Current date: ${formatDate(currentDate)}`,
        "",
        basePrompt.trim(),
    ].join("\n");
}

function formatHistory(history: readonly HistoryTurn[]): string {
    if (history.length === 0) {
        return "";
    }

    const turns = history.map((turn) => `User: ${turn.userMessage.trim()}\nAssistant: ${turn.assistantResponse.trim()}`);
    return `Conversation so far:\n${turns.join("\n\n")}`;
}

function formatFragments(fragments: readonly RetrievedFragment[]): string {
    if (fragments.length === 0) {
        return "";
    }

    const blocks = fragments.map((fragment, index) => {
        const title = fragment.title ? ` (${fragment.title})` : "";
        return `Source ${index + 1}: ${fragment.documentId}#${fragment.id}${title}\n${fragment.text.trim()}`;
    });
    return `Knowledge base context (${fragments.length} relevant fragments):\n${blocks.join("\n\n")}`;
}

/**
 * Builds the model input from retrieval results, conversation history and corpus
 * facts. The same input always yields the same output byte for byte.
 *
 * When history and context exceed `maxContextChars`, the oldest history turns go
 * first, then the lowest-scoring fragments. The query itself is never cut.
 */
export function assemblePrompt(input: PromptInput, options: PromptOptions): PromptContext {
    const system = buildSystem(input.corpus, input.currentDate, options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT);

    let history = [...input.history];
    // stable: equal scores keep retrieval order
    let fragments = [...input.fragments].sort((a, b) => b.score - a.score);

    const sectionsLength = () => formatHistory(history).length + formatFragments(fragments).length;
    while (sectionsLength() > options.maxContextChars && (history.length > 0 || fragments.length > 0)) {
        if (history.length > 0) {
            history = history.slice(1);
        } else {
            fragments = fragments.slice(0, -1);
        }
    }

    const sections = [formatHistory(history), formatFragments(fragments), `Question: ${input.query}`];
    const prompt = sections.filter((section) => section.length > 0).join("\n\n---\n\n");

    return {
        system,
        prompt,
        fragmentIds: fragments.map((fragment) => fragment.id),
        historyTurns: history.length,
        contextRef: calculateChecksum(`${system}\n\n${prompt}`),
    };
}

/** Full text handed to the model, as echoed back in API responses. */
export function renderPromptContext(context: PromptContext): string {
    return `${context.system}\n\n${context.prompt}`;
}
