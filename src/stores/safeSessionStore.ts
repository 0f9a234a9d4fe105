import { PitchEvaluation } from "../domain/pitchEvaluation";
import { SessionRecordUpdate, SessionStorePort } from "./sessionStore";

export type StoreOutcome = { ok: true } | { ok: false; error: string };

/**
 * Boundary in front of a SessionStorePort. Store failures are logged and
 * returned as a StoreOutcome; they never propagate to conversation handling.
 */
export class SafeSessionStore {
  constructor(private store: SessionStorePort) {}

  upsertSession(studentId: string, stepIndex: number, update?: SessionRecordUpdate): Promise<StoreOutcome> {
    return this.attempt(
      "saving session",
      () => this.store.upsertSession(studentId, stepIndex, update),
      `Session saved for student ${studentId}`
    );
  }

  insertEvaluation(evaluation: PitchEvaluation): Promise<StoreOutcome> {
    return this.attempt(
      "saving pitch evaluation",
      () => this.store.insertEvaluation(evaluation),
      `Pitch evaluation saved for student ${evaluation.studentId}, step ${evaluation.stepName}`
    );
  }

  incrementInteractions(studentId: string): Promise<StoreOutcome> {
    return this.attempt(
      "incrementing interactions",
      () => this.store.incrementInteractions(studentId),
      `Incremented interactions for student ${studentId}`
    );
  }

  private async attempt(action: string, operation: () => Promise<void>, successMessage: string): Promise<StoreOutcome> {
    try {
      await operation();
      console.log(`[Store] ${successMessage}`);
      return { ok: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Store] Error ${action}: ${message}`);
      return { ok: false, error: message };
    }
  }
}
