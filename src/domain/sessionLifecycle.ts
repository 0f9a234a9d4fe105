import { StudentSession, emptyHistories } from "./studentSession";
import { getPitchStep } from "./pitchStep";
import { SafeSessionStore } from "../stores/safeSessionStore";

/**
 * Random 8-digit student ID. IDs are not checked against existing sessions,
 * so two conversations can in principle receive the same one.
 */
export function generateStudentId(random: () => number = Math.random): string {
  return String(10000000 + Math.floor(random() * 90000000));
}

export class SessionLifecycle {
  constructor(
    private store: SafeSessionStore,
    private clock: () => Date = () => new Date(),
    private random: () => number = Math.random
  ) {}

  /**
   * Create a fresh session at the first step and try to record it.
   * The session is usable even if the store write fails.
   */
  async start(): Promise<StudentSession> {
    const session: StudentSession = {
      studentId: generateStudentId(this.random),
      stepIndex: 0,
      currentStep: getPitchStep(0),
      activePersona: "mentor",
      startedAt: this.clock(),
      stepInteractions: {},
      histories: emptyHistories(),
    };

    console.log(`[Tutor] New student assigned ID: ${session.studentId}`);

    const saved = await this.store.upsertSession(session.studentId, session.stepIndex);
    if (!saved.ok) {
      console.log("[Tutor] Initial session not saved, continuing with local session only");
    }

    return session;
  }

  /**
   * Drop the session's in-memory state. Nothing more is written to the store.
   */
  end(session: StudentSession): string {
    session.stepInteractions = {};
    session.histories = emptyHistories();
    console.log(`[Tutor] Session ended for student ${session.studentId}`);
    return session.studentId;
  }
}
