import { StudentSession, getStepInteractions } from "./studentSession";
import { getPitchStep, isLastStep, stepKey, PitchStep } from "./pitchStep";
import { ADVANCE_COMMAND, hasCompletionMarker } from "./completionMarker";
import { SafeSessionStore, StoreOutcome } from "../stores/safeSessionStore";

export const MIN_STEP_INTERACTIONS = 2;
export const MIN_MESSAGE_LENGTH = 10;
export const GREETING_TOKENS = ["hi", "hello", "hey", "start", "begin"];

export type BlockReason = "insufficient interactions" | "message too short" | "greeting only";

export type AdvancementDecision =
  | { allowed: true; reason: "user requested next step" | "guards passed" }
  | { allowed: false; reason: BlockReason };

export type ProgressionOutcome =
  | { kind: "none" }
  | { kind: "blocked"; reason: BlockReason }
  | { kind: "advanced"; stepIndex: number; step: PitchStep; store: StoreOutcome }
  | { kind: "completed"; stepIndex: number; store: StoreOutcome };

/**
 * Decide whether a completion marker may advance the student.
 *
 * Guards run in order on the trimmed, lower-cased student message. An explicit
 * request to move on skips the interaction and length guards, but the greeting
 * check runs last and can still block any message that is exactly a greeting.
 */
export function evaluateAdvancement(userMessage: string, interactionCount: number): AdvancementDecision {
  const normalized = userMessage.trim().toLowerCase();
  let decision: AdvancementDecision;

  if (normalized === ADVANCE_COMMAND || normalized.includes("next step")) {
    decision = { allowed: true, reason: "user requested next step" };
  } else if (interactionCount < MIN_STEP_INTERACTIONS) {
    decision = { allowed: false, reason: "insufficient interactions" };
  } else if (normalized.length < MIN_MESSAGE_LENGTH && normalized !== ADVANCE_COMMAND) {
    decision = { allowed: false, reason: "message too short" };
  } else {
    decision = { allowed: true, reason: "guards passed" };
  }

  if (GREETING_TOKENS.includes(normalized)) {
    decision = { allowed: false, reason: "greeting only" };
  }

  return decision;
}

/**
 * StepProgression owns a session's position in the pitch steps.
 * Only mentor replies are fed through it.
 */
export class StepProgression {
  constructor(private store: SafeSessionStore) {}

  /**
   * Count a mentor interaction for the current step and return the new count.
   */
  recordInteraction(session: StudentSession): number {
    const key = stepKey(session.stepIndex);
    const count = getStepInteractions(session) + 1;
    session.stepInteractions[key] = count;
    console.log(`[Progression] Step ${session.stepIndex} (${session.currentStep}) interaction count: ${count}`);
    return count;
  }

  /**
   * Handle a complete mentor reply: count the interaction, then advance the
   * step if the reply carries the completion marker and the guards allow it.
   */
  async applyMentorReply(session: StudentSession, userMessage: string, rawReply: string): Promise<ProgressionOutcome> {
    const count = this.recordInteraction(session);

    if (!hasCompletionMarker(rawReply)) {
      return { kind: "none" };
    }

    console.log(`[Progression] Completion marker detected for student ${session.studentId}`);

    const decision = evaluateAdvancement(userMessage, count);
    if (!decision.allowed) {
      console.log(`[Progression] Skipping step advancement for student ${session.studentId}: ${decision.reason}`);
      return { kind: "blocked", reason: decision.reason };
    }

    console.log(
      `[Progression] Step advancement approved for student ${session.studentId} with ${count} interactions (${decision.reason})`
    );

    if (isLastStep(session.stepIndex)) {
      const store = await this.store.upsertSession(session.studentId, session.stepIndex, {
        totalInteractions: count,
      });
      return { kind: "completed", stepIndex: session.stepIndex, store };
    }

    session.stepIndex += 1;
    session.currentStep = getPitchStep(session.stepIndex);

    const store = await this.store.upsertSession(session.studentId, session.stepIndex, {
      totalInteractions: count,
      lastMessage: userMessage,
    });

    return { kind: "advanced", stepIndex: session.stepIndex, step: session.currentStep, store };
  }
}
