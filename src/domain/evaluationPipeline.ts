import { randomUUID } from "crypto";
import { CompletionService } from "./completionService";
import { PitchEvaluation, parseScore } from "./pitchEvaluation";
import { renderPersonaPrompt } from "./persona";
import { StudentSession } from "./studentSession";
import { SafeSessionStore, StoreOutcome } from "../stores/safeSessionStore";

export interface EvaluationOutcome {
  evaluation: PitchEvaluation;
  saved: StoreOutcome;
}

/**
 * Grades a submitted pitch with the evaluator persona and records the result.
 */
export class EvaluationPipeline {
  constructor(
    private completions: CompletionService,
    private store: SafeSessionStore,
    private clock: () => Date = () => new Date(),
    private newId: () => string = randomUUID
  ) {}

  /**
   * Rejects only if generation fails. A failed save is reported in `saved`.
   */
  async evaluate(session: StudentSession, pitchText: string): Promise<EvaluationOutcome> {
    const prompt = renderPersonaPrompt("eval", { pitch: pitchText });
    const feedback = await this.completions.complete(prompt);
    const score = parseScore(feedback);

    if (score === null) {
      console.warn(`[Evaluation] No score found in feedback for student ${session.studentId}`);
    }

    const evaluation: PitchEvaluation = {
      id: this.newId(),
      studentId: session.studentId,
      stepName: session.currentStep,
      score,
      feedback,
      createdAt: this.clock().toISOString(),
    };

    const saved = await this.store.insertEvaluation(evaluation);
    if (!saved.ok) {
      console.warn(`[Evaluation] Failed to save pitch evaluation for student ${session.studentId}`);
    }

    return { evaluation, saved };
  }
}
