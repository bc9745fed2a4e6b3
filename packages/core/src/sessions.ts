export { SerialLock } from "./sessions/lock.js";
export { ConversationSession } from "./sessions/session.js";
export type { ConversationSnapshot, RunState } from "./sessions/session.js";
export { SessionRegistry } from "./sessions/registry.js";
