/**
 * Elevator pitch tutor library entry point.
 */

// Configuration
export { loadConfig, ConfigError, COMPLETION_MODEL, COMPLETION_TEMPERATURE } from "./config";
export type { TutorConfig } from "./config";

// Conversation
export { TutorConversation, SESSION_EXPIRED_MESSAGE } from "./domain/tutorConversation";
export type { TutorEvent, NoticeKind, ReplyMetadata, EmitEvent, TutorDependencies } from "./domain/tutorConversation";
export { classifyMessage, PERSONA_COMMANDS, PROGRESS_COMMAND, UPLOAD_COMMAND } from "./domain/tutorCommands";
export type { TutorCommand } from "./domain/tutorCommands";

// Pitch steps and progression
export { PITCH_STEPS, TOTAL_STEPS, getPitchStep, formatPitchSteps } from "./domain/pitchStep";
export type { PitchStep } from "./domain/pitchStep";
export { StepProgression, evaluateAdvancement } from "./domain/stepProgression";
export type { AdvancementDecision, BlockReason, ProgressionOutcome } from "./domain/stepProgression";
export { COMPLETION_MARKER, ADVANCE_COMMAND, MarkerFilter } from "./domain/completionMarker";
export { buildProgressReport, formatProgressReport } from "./domain/progressReport";
export type { ProgressReport } from "./domain/progressReport";

// Personas and completions
export { PERSONA_KEYS, isPersonaKey, personaLabel, renderPersonaPrompt } from "./domain/persona";
export type { PersonaKey, PersonaVariables } from "./domain/persona";
export { AgentRouter } from "./domain/agentRouter";
export { collectStream } from "./domain/completionService";
export type { CompletionService } from "./domain/completionService";
export { OpenAICompletionService } from "./domain/openaiCompletionService";

// Sessions and evaluations
export { SessionLifecycle, generateStudentId } from "./domain/sessionLifecycle";
export type { StudentSession, ChatTurn } from "./domain/studentSession";
export { EvaluationPipeline } from "./domain/evaluationPipeline";
export { parseScore } from "./domain/pitchEvaluation";
export type { PitchEvaluation } from "./domain/pitchEvaluation";

// Storage
export { JsonSessionStore } from "./stores/sessionStore";
export type { SessionRecord, SessionRecordUpdate, SessionStorePort } from "./stores/sessionStore";
export { SafeSessionStore } from "./stores/safeSessionStore";
export type { StoreOutcome } from "./stores/safeSessionStore";

// Documents
export { extractText, SUPPORTED_EXTENSIONS } from "./loaders/documentExtractor";
export type { UploadedFile, TextExtractor } from "./loaders/documentExtractor";

// Wiring
export { buildTutorDependencies, createTutorDependencies, createTutorConversation } from "./services/tutorFactory";
export type { TutorBackends } from "./services/tutorFactory";
