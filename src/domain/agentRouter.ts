import { CompletionService, collectStream } from "./completionService";
import { MarkerFilter, stripCompletionMarker } from "./completionMarker";
import { PersonaKey, isPersonaKey, renderPersonaPrompt } from "./persona";
import { StudentSession, ChatTurn, elapsedMinutes } from "./studentSession";
import { TOTAL_STEPS, formatPitchSteps } from "./pitchStep";

export interface DispatchResult {
  rawText: string; // as generated, marker included
  displayText: string; // what the student sees and what history keeps
}

/**
 * Joins a persona's history into the prompt's context block.
 */
export function flattenHistory(turns: ChatTurn[]): string {
  return turns.map((turn) => turn.message).join("\n");
}

/**
 * AgentRouter picks the active persona and runs student messages through it.
 */
export class AgentRouter {
  constructor(
    private completions: CompletionService,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Make `key` the active persona. Returns null (and changes nothing) for unknown keys.
   */
  switchPersona(session: StudentSession, key: string): PersonaKey | null {
    if (!isPersonaKey(key)) {
      return null;
    }
    session.activePersona = key;
    return key;
  }

  buildPrompt(session: StudentSession, persona: PersonaKey, message: string): string {
    const context = flattenHistory(session.histories[persona]);

    switch (persona) {
      case "mentor":
        return renderPersonaPrompt("mentor", {
          context,
          question: message,
          currentStep: session.currentStep,
          pitchSteps: formatPitchSteps(),
          currentStepNumber: session.stepIndex + 1,
          totalSteps: TOTAL_STEPS,
        });
      case "peer":
        return renderPersonaPrompt("peer", { context, question: message });
      case "progress":
        return renderPersonaPrompt("progress", {
          context,
          question: message,
          studentProgress: `${session.currentStep} (${session.stepIndex + 1}/${TOTAL_STEPS})`,
          timeSpent: elapsedMinutes(session, this.clock()).toFixed(1),
        });
      case "eval":
        return renderPersonaPrompt("eval", { pitch: message });
    }
  }

  /**
   * Send a message to a persona, streaming the reply through `onFragment`.
   * History is only updated once the full reply has arrived.
   */
  async dispatch(
    session: StudentSession,
    persona: PersonaKey,
    message: string,
    onFragment: (fragment: string) => void = () => {}
  ): Promise<DispatchResult> {
    const prompt = this.buildPrompt(session, persona, message);
    console.log(`[Tutor] Sending to ${persona} agent`);

    const filter = new MarkerFilter();
    const rawText = await collectStream(this.completions.stream(prompt), (fragment) => {
      const visible = filter.push(fragment);
      if (visible) onFragment(visible);
    });
    const tail = filter.flush();
    if (tail) onFragment(tail);

    const displayText = stripCompletionMarker(rawText);
    session.histories[persona].push(
      { role: "student", message },
      { role: "tutor", message: displayText }
    );

    return { rawText, displayText };
  }
}
