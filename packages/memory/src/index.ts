export { StateRecordStore } from "./state-record-store.js";
export { ConversationStore, emptyCursor } from "./conversation-store.js";
export type { ReplayOptions } from "./conversation-store.js";
export { SessionMemory, filterMemory } from "./session-memory.js";
