export {
  SessionRegistry,
  type SessionRegistryOptions,
} from "./session-registry.js";
export { type TransitionResult, transition } from "./state-machine.js";
export {
  type ForcedCloseReason,
  SESSION_EVENTS,
  SESSION_STATES,
  SESSION_TRANSITIONS,
  type Session,
  type SessionEvent,
  type SessionState,
} from "./types.js";
