import { StepProgression, evaluateAdvancement } from "./stepProgression";
import { StudentSession, emptyHistories } from "./studentSession";
import { PITCH_STEPS } from "./pitchStep";
import { SafeSessionStore } from "../stores/safeSessionStore";

describe("evaluateAdvancement", () => {
  it("allows the explicit advance command regardless of interactions", () => {
    expect(evaluateAdvancement("/next", 0)).toEqual({ allowed: true, reason: "user requested next step" });
  });

  it("allows messages asking for the next step", () => {
    expect(evaluateAdvancement("Can we go to the NEXT STEP please", 1)).toEqual({
      allowed: true,
      reason: "user requested next step",
    });
  });

  it("blocks when the step has fewer than two interactions", () => {
    expect(evaluateAdvancement("explain more about my audience", 1)).toEqual({
      allowed: false,
      reason: "insufficient interactions",
    });
  });

  it("blocks short messages", () => {
    expect(evaluateAdvancement("short one", 2)).toEqual({ allowed: false, reason: "message too short" });
  });

  it("reports greetings even when the length guard already blocked", () => {
    expect(evaluateAdvancement("hello", 5)).toEqual({ allowed: false, reason: "greeting only" });
  });

  it("normalizes case and whitespace before matching greetings", () => {
    expect(evaluateAdvancement("  Hey  ", 3)).toEqual({ allowed: false, reason: "greeting only" });
  });

  it("allows a substantive message after enough interactions", () => {
    expect(evaluateAdvancement("explain more about my audience", 2)).toEqual({
      allowed: true,
      reason: "guards passed",
    });
  });
});

describe("StepProgression", () => {
  let port: {
    upsertSession: jest.Mock;
    insertEvaluation: jest.Mock;
    incrementInteractions: jest.Mock;
  };
  let progression: StepProgression;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  const createSession = (overrides: Partial<StudentSession> = {}): StudentSession => ({
    studentId: "12345678",
    stepIndex: 0,
    currentStep: PITCH_STEPS[0],
    activePersona: "mentor",
    startedAt: new Date("2024-01-15T10:00:00.000Z"),
    stepInteractions: {},
    histories: emptyHistories(),
    ...overrides,
  });

  beforeEach(() => {
    port = {
      upsertSession: jest.fn().mockResolvedValue(undefined),
      insertEvaluation: jest.fn().mockResolvedValue(undefined),
      incrementInteractions: jest.fn().mockResolvedValue(undefined),
    };
    progression = new StepProgression(new SafeSessionStore(port));
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe("recordInteraction", () => {
    it("starts unseen steps from zero", () => {
      const session = createSession({ stepIndex: 2, currentStep: PITCH_STEPS[2] });

      expect(progression.recordInteraction(session)).toBe(1);
      expect(session.stepInteractions).toEqual({ step_2: 1 });
    });

    it("only touches the current step's counter", () => {
      const session = createSession({ stepInteractions: { step_0: 4, step_1: 1 }, stepIndex: 1 });

      progression.recordInteraction(session);

      expect(session.stepInteractions).toEqual({ step_0: 4, step_1: 2 });
    });
  });

  describe("applyMentorReply", () => {
    it("counts the interaction when the reply has no marker", async () => {
      const session = createSession();

      const outcome = await progression.applyMentorReply(session, "My audience is students", "Tell me more.");

      expect(outcome).toEqual({ kind: "none" });
      expect(session.stepInteractions).toEqual({ step_0: 1 });
      expect(session.stepIndex).toBe(0);
      expect(port.upsertSession).not.toHaveBeenCalled();
    });

    it("blocks advancement on the first interaction of a step", async () => {
      const session = createSession();

      const outcome = await progression.applyMentorReply(session, "ideas", "Good start! [STEP_COMPLETED]");

      expect(outcome).toEqual({ kind: "blocked", reason: "insufficient interactions" });
      expect(session.stepIndex).toBe(0);
      expect(session.stepInteractions).toEqual({ step_0: 1 });
      expect(port.upsertSession).not.toHaveBeenCalled();
      expect(logSpy).toHaveBeenCalledWith(
        "[Progression] Skipping step advancement for student 12345678: insufficient interactions"
      );
    });

    it("advances one step and persists the new index", async () => {
      const session = createSession({ stepInteractions: { step_0: 3 } });

      const outcome = await progression.applyMentorReply(
        session,
        "explain more about my audience",
        "Your audience is clear. [STEP_COMPLETED]"
      );

      expect(outcome).toEqual({
        kind: "advanced",
        stepIndex: 1,
        step: "Define the Problem/Need",
        store: { ok: true },
      });
      expect(session.stepIndex).toBe(1);
      expect(session.currentStep).toBe("Define the Problem/Need");
      expect(port.upsertSession).toHaveBeenCalledWith("12345678", 1, {
        totalInteractions: 4,
        lastMessage: "explain more about my audience",
      });
    });

    it("stays on the last step and reports completion", async () => {
      const session = createSession({ stepIndex: 4, currentStep: PITCH_STEPS[4] });

      const outcome = await progression.applyMentorReply(session, "/next", "Well done! [STEP_COMPLETED]");

      expect(outcome).toEqual({ kind: "completed", stepIndex: 4, store: { ok: true } });
      expect(session.stepIndex).toBe(4);
      expect(session.currentStep).toBe("End with a Strong Closing Statement");
      expect(port.upsertSession).toHaveBeenCalledWith("12345678", 4, { totalInteractions: 1 });
    });

    it("advances in memory when the store is unreachable", async () => {
      port.upsertSession.mockRejectedValue(new Error("connect ECONNREFUSED"));
      const session = createSession({ stepInteractions: { step_0: 2 } });

      const outcome = await progression.applyMentorReply(
        session,
        "explain more about my audience",
        "[STEP_COMPLETED] Great answer."
      );

      expect(outcome).toEqual({
        kind: "advanced",
        stepIndex: 1,
        step: "Define the Problem/Need",
        store: { ok: false, error: "connect ECONNREFUSED" },
      });
      expect(session.stepIndex).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith("[Store] Error saving session: connect ECONNREFUSED");
    });

    it("never moves more than one step per message", async () => {
      const session = createSession();

      for (let expected = 1; expected < PITCH_STEPS.length; expected++) {
        await progression.applyMentorReply(session, "/next", "[STEP_COMPLETED][STEP_COMPLETED]");
        expect(session.stepIndex).toBe(expected);
      }

      expect(port.upsertSession.mock.calls.map((call) => call[1])).toEqual([1, 2, 3, 4]);
    });

    it("keeps a greeting from advancing even with enough interactions", async () => {
      const session = createSession({ stepInteractions: { step_0: 5 } });

      const outcome = await progression.applyMentorReply(session, "Hi", "Hi there! [STEP_COMPLETED]");

      expect(outcome).toEqual({ kind: "blocked", reason: "greeting only" });
      expect(session.stepIndex).toBe(0);
    });
  });
});
