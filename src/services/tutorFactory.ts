import { TutorConfig } from "../config";
import { AgentRouter } from "../domain/agentRouter";
import { CompletionService } from "../domain/completionService";
import { EvaluationPipeline } from "../domain/evaluationPipeline";
import { OpenAICompletionService } from "../domain/openaiCompletionService";
import { SessionLifecycle } from "../domain/sessionLifecycle";
import { StepProgression } from "../domain/stepProgression";
import { TutorConversation, TutorDependencies } from "../domain/tutorConversation";
import { extractText, TextExtractor } from "../loaders/documentExtractor";
import { SafeSessionStore } from "../stores/safeSessionStore";
import { JsonSessionStore, SessionStorePort } from "../stores/sessionStore";

export interface TutorBackends {
  completions: CompletionService;
  store: SessionStorePort;
  extractText?: TextExtractor;
  clock?: () => Date;
}

/**
 * Wire the tutor components around a completion service and a store.
 * The returned dependencies can be shared by many conversations.
 */
export function buildTutorDependencies(backends: TutorBackends): TutorDependencies {
  const clock = backends.clock ?? (() => new Date());
  const store = new SafeSessionStore(backends.store);

  return {
    router: new AgentRouter(backends.completions, clock),
    progression: new StepProgression(store),
    lifecycle: new SessionLifecycle(store, clock),
    evaluation: new EvaluationPipeline(backends.completions, store, clock),
    store,
    extractText: backends.extractText ?? extractText,
    clock,
  };
}

/**
 * Production wiring: OpenAI completions and the JSON file store.
 */
export function createTutorDependencies(config: TutorConfig): TutorDependencies {
  return buildTutorDependencies({
    completions: new OpenAICompletionService(config.openaiApiKey, config.model, config.temperature),
    store: new JsonSessionStore(config.dataDir),
  });
}

export function createTutorConversation(deps: TutorDependencies): TutorConversation {
  return new TutorConversation(deps);
}
