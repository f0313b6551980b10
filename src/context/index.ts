export {
  ContextAwareGuidanceManager, insufficientContextMessage,
  REQUIRED_CONTEXT_KEYS, DEFAULT_SESSION_ID, STALE_SESSION_MARKER,
} from './guidance-manager.js';
export type { ContextManagerOptions, SharedContext, CleanupReport, ArchiveReport } from './guidance-manager.js';
export { KeywordClassifier, loadContextVocabulary, CONTEXT_FAMILIES } from './classifier.js';
export type { ContextClassifier, ContextVocabulary } from './classifier.js';
export { SessionContext } from './session.js';
export type { SessionSnapshot } from './session.js';
export { SpecializedContext } from './specialized.js';
export type { SpecializedSnapshot } from './specialized.js';
