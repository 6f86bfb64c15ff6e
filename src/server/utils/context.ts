import type { AppConfig } from "../../config/types";
import type { ConversationRecorder } from "../../conversations/recorder";
import type { LLMClientBundle } from "../../llm/types";
import type { RetrievalEngine } from "../../query/retrieval";
import type { SnapshotHolder } from "../../snapshot/holder";
import type { ActiveSnapshot } from "../../snapshot/types";

export interface ServerContext {
    config: AppConfig;
    holder: SnapshotHolder;
    llm: LLMClientBundle;
    retrieval: RetrievalEngine;
    recorder: ConversationRecorder;
    refresh: () => Promise<ActiveSnapshot>;
    refreshBusy: boolean;
}

export interface RouterContext {
    config: AppConfig;
    holder: SnapshotHolder;
    llm: LLMClientBundle;
    retrieval: RetrievalEngine;
    recorder: ConversationRecorder;
    refresh: () => Promise<ActiveSnapshot>;
    isRefreshBusy: () => boolean;
    setRefreshBusy: (busy: boolean) => void;
}

export function createRouterContext(context: ServerContext): RouterContext {
    return {
        config: context.config,
        holder: context.holder,
        llm: context.llm,
        retrieval: context.retrieval,
        recorder: context.recorder,
        refresh: () => context.refresh(),
        isRefreshBusy: () => context.refreshBusy,
        setRefreshBusy: (busy: boolean) => {
            context.refreshBusy = busy;
        },
    };
}
