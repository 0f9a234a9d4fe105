import { PitchStep, stepKey } from "./pitchStep";
import { PersonaKey } from "./persona";

export interface ChatTurn {
  role: "student" | "tutor";
  message: string;
}

/**
 * A StudentSession is one anonymous student's pass through the pitch steps.
 * It lives only as long as the conversation that owns it; the store keeps a
 * durable copy of the step index and counters.
 */
export interface StudentSession {
  studentId: string;
  stepIndex: number;
  currentStep: PitchStep;
  activePersona: PersonaKey;
  startedAt: Date;
  stepInteractions: Record<string, number>; // keyed by stepKey(index)
  histories: Record<PersonaKey, ChatTurn[]>;
}

export function emptyHistories(): Record<PersonaKey, ChatTurn[]> {
  return { mentor: [], peer: [], progress: [], eval: [] };
}

/**
 * Mentor interactions recorded for a step. Steps never visited count as 0.
 */
export function getStepInteractions(session: StudentSession, index: number = session.stepIndex): number {
  return session.stepInteractions[stepKey(index)] ?? 0;
}

export function elapsedMinutes(session: StudentSession, now: Date): number {
  return (now.getTime() - session.startedAt.getTime()) / 60000;
}
