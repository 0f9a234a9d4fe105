import { AgentRouter } from "./agentRouter";
import { StepProgression } from "./stepProgression";
import { SessionLifecycle } from "./sessionLifecycle";
import { EvaluationPipeline } from "./evaluationPipeline";
import { StudentSession } from "./studentSession";
import { PersonaKey, personaLabel } from "./persona";
import { classifyMessage } from "./tutorCommands";
import { buildProgressReport, formatProgressReport } from "./progressReport";
import { ADVANCE_COMMAND } from "./completionMarker";
import { SafeSessionStore } from "../stores/safeSessionStore";
import { SUPPORTED_EXTENSIONS, TextExtractor, UploadedFile } from "../loaders/documentExtractor";

export type NoticeKind =
  | "student_id"
  | "welcome"
  | "progress"
  | "persona_switched"
  | "step_advanced"
  | "all_steps_complete"
  | "evaluation"
  | "store_error"
  | "unsupported_file"
  | "upload_missing"
  | "ai_service_error"
  | "session_expired"
  | "goodbye";

export interface ReplyMetadata {
  studentId: string;
  persona: PersonaKey;
  currentStep: string;
  stepIndex: number;
  timestamp: string;
}

/**
 * Everything the tutor sends back to the host, in order.
 */
export type TutorEvent =
  | { type: "notice"; kind: NoticeKind; text: string }
  | { type: "reply_start"; metadata: ReplyMetadata }
  | { type: "reply_chunk"; persona: PersonaKey; text: string }
  | { type: "reply_end"; persona: PersonaKey; text: string }
  | { type: "request_file"; text: string; accept: string[] };

export type EmitEvent = (event: TutorEvent) => void;

export interface TutorDependencies {
  router: AgentRouter;
  progression: StepProgression;
  lifecycle: SessionLifecycle;
  evaluation: EvaluationPipeline;
  store: SafeSessionStore;
  extractText: TextExtractor;
  clock?: () => Date;
}

export const SESSION_EXPIRED_MESSAGE =
  "⚠️ Session Error\n\nYour session appears to have expired. Please start a new session to continue.";

const AI_SERVICE_ERROR_MESSAGE =
  "⚠️ AI Service Error\n\nThere was an issue connecting to the AI service. Please try again in a moment.";

const UNSUPPORTED_FILE_MESSAGE = "❌ Couldn't extract text. Please upload a valid .pdf or .docx.";

/**
 * One student's conversation with the tutor.
 *
 * Messages must be handled one at a time: the host awaits each call before
 * passing in the next message for the same conversation.
 */
export class TutorConversation {
  private session: StudentSession | null = null;
  private clock: () => Date;

  constructor(private deps: TutorDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get studentId(): string | null {
    return this.session?.studentId ?? null;
  }

  /**
   * Read-only view of the current session, if any.
   */
  get currentSession(): Readonly<StudentSession> | null {
    return this.session;
  }

  async start(emit: EmitEvent): Promise<string> {
    const session = await this.deps.lifecycle.start();
    this.session = session;

    emit({
      type: "notice",
      kind: "student_id",
      text: `You've been assigned Student ID: #${session.studentId}\n\nIMPORTANT: Please write down this ID for your records. You'll need it to identify your data in the experiment.`,
    });
    emit({ type: "notice", kind: "welcome", text: welcomeMessage(session.studentId) });

    return session.studentId;
  }

  async handleMessage(content: string, emit: EmitEvent): Promise<void> {
    const session = this.session;
    if (!session) {
      emit({ type: "notice", kind: "session_expired", text: SESSION_EXPIRED_MESSAGE });
      return;
    }

    const command = classifyMessage(content);

    switch (command.kind) {
      case "progress": {
        const report = buildProgressReport(session, this.clock());
        emit({ type: "notice", kind: "progress", text: formatProgressReport(report) });
        return;
      }
      case "upload":
        emit({
          type: "request_file",
          text: "Please upload your pitch document (PDF or DOCX)",
          accept: [...SUPPORTED_EXTENSIONS],
        });
        return;
      case "switch": {
        const persona = this.deps.router.switchPersona(session, command.persona);
        if (persona) {
          emit({
            type: "notice",
            kind: "persona_switched",
            text: `🔹 Switched to ${personaLabel(persona)}\n\nRemember your Student ID: #${session.studentId}`,
          });
        }
        return;
      }
      case "chat":
        await this.chat(session, command.text, emit);
        return;
    }
  }

  /**
   * Grade an uploaded pitch. Pass null when the student didn't provide a file.
   */
  async submitPitch(file: UploadedFile | null, emit: EmitEvent): Promise<void> {
    const session = this.session;
    if (!session) {
      emit({ type: "notice", kind: "session_expired", text: SESSION_EXPIRED_MESSAGE });
      return;
    }

    if (!file) {
      emit({
        type: "notice",
        kind: "upload_missing",
        text: `No file was uploaded. Try again with the /upload command.\n\nIMPORTANT: Remember your Student ID: #${session.studentId}`,
      });
      return;
    }

    const pitchText = await this.deps.extractText(file);
    if (!pitchText) {
      emit({ type: "notice", kind: "unsupported_file", text: UNSUPPORTED_FILE_MESSAGE });
      return;
    }

    try {
      const { evaluation, saved } = await this.deps.evaluation.evaluate(session, pitchText);
      emit({ type: "notice", kind: "evaluation", text: `✅ Evaluation Complete:\n\n${evaluation.feedback}` });

      if (!saved.ok) {
        emit({
          type: "notice",
          kind: "store_error",
          text:
            "⚠️ Storage Error\n\nYour pitch was evaluated, but we couldn't save the result.\n\n" +
            `Error details: ${saved.error}\n\n` +
            `Please take a screenshot of this message and note your Student ID: #${session.studentId}`,
        });
      }
    } catch (error) {
      console.error("[Evaluation] Error during pitch evaluation:", error);
      emit({ type: "notice", kind: "ai_service_error", text: AI_SERVICE_ERROR_MESSAGE });
    }
  }

  end(emit: EmitEvent): void {
    const session = this.session;
    if (!session) {
      emit({ type: "notice", kind: "session_expired", text: SESSION_EXPIRED_MESSAGE });
      return;
    }

    const studentId = this.deps.lifecycle.end(session);
    this.session = null;
    emit({
      type: "notice",
      kind: "goodbye",
      text: `Session stopped. Your progress is saved! Remember your Student ID: #${studentId}`,
    });
  }

  private async chat(session: StudentSession, message: string, emit: EmitEvent): Promise<void> {
    const persona = session.activePersona;

    try {
      emit({
        type: "reply_start",
        metadata: {
          studentId: session.studentId,
          persona,
          currentStep: session.currentStep,
          stepIndex: session.stepIndex,
          timestamp: this.clock().toISOString(),
        },
      });

      const reply = await this.deps.router.dispatch(session, persona, message, (fragment) =>
        emit({ type: "reply_chunk", persona, text: fragment })
      );
      emit({ type: "reply_end", persona, text: reply.displayText });

      // Ended while the reply was streaming: nothing more to record
      if (this.session !== session) {
        return;
      }

      if (persona === "mentor") {
        const outcome = await this.deps.progression.applyMentorReply(session, message, reply.rawText);
        if (outcome.kind === "advanced") {
          emit({
            type: "notice",
            kind: "step_advanced",
            text: `✅ Great job! Moving to the next step: ${outcome.step}`,
          });
        } else if (outcome.kind === "completed") {
          emit({
            type: "notice",
            kind: "all_steps_complete",
            text: "🎉 Congratulations! You've completed all steps of your elevator pitch. You can now upload your final pitch using /upload or continue refining it.",
          });
        }
      }
    } catch (error) {
      console.error("[Tutor] Error in message processing:", error);
      emit({ type: "notice", kind: "ai_service_error", text: AI_SERVICE_ERROR_MESSAGE });
      return;
    }

    await this.deps.store.incrementInteractions(session.studentId);
  }
}

function welcomeMessage(studentId: string): string {
  return [
    `🎓 Welcome to the Elevator Pitch Tutor, Student #${studentId}!`,
    "",
    "This tutor has four agents:",
    "- Mentor Agent: guides you step by step with practical feedback",
    "- Peer Agent: thinks with you like a fellow student",
    "- Progress Agent: keeps track of your progress",
    "- Evaluator Agent: reviews and scores your final pitch",
    "",
    "Commands:",
    `- ${ADVANCE_COMMAND}: move to the next step when you're ready`,
    "- /progress: check your progress and time spent",
    "- /mentor, /peer, /tracker, /eval: switch agents",
    "- /upload: submit your final pitch (PDF or DOCX)",
    "",
    `Your Student ID is ${studentId}. Your progress is saved as you complete steps.`,
    "",
    "🔹 You're now talking to the Mentor Agent.",
  ].join("\n");
}
