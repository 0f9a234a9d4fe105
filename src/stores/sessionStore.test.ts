import fs from "fs";
import path from "path";
import { JsonSessionStore, SessionRecord } from "./sessionStore";
import { PitchEvaluation } from "../domain/pitchEvaluation";

// Mock fs module
jest.mock("fs");

const mockFs = jest.mocked(fs);

describe("JsonSessionStore", () => {
  const DATA_DIR = "/tmp/pitch-tutor-data";
  const SESSIONS_DIR = path.join(DATA_DIR, "student-sessions");
  const EVALUATIONS_DIR = path.join(DATA_DIR, "pitch-evaluations");
  const NOW = "2024-01-15T10:00:00.000Z";

  const createRecord = (overrides: Partial<SessionRecord> = {}): SessionRecord => ({
    studentId: "12345678",
    currentStepIndex: 1,
    lastUpdated: "2024-01-14T09:00:00.000Z",
    sessionStartTime: "2024-01-14T08:30:00.000Z",
    totalInteractions: 5,
    completedSteps: 1,
    lastMessageContent: "earlier message",
    ...overrides,
  });

  const createEvaluation = (overrides: Partial<PitchEvaluation> = {}): PitchEvaluation => ({
    id: "eval-1",
    studentId: "12345678",
    stepName: "End with a Strong Closing Statement",
    score: 8,
    feedback: "Score: 8/10",
    createdAt: NOW,
    ...overrides,
  });

  // Parse what was written by the nth writeFileSync call
  const written = (call: number): unknown => JSON.parse(String(mockFs.writeFileSync.mock.calls[call][1]));

  beforeEach(() => {
    jest.clearAllMocks();
    jest.useFakeTimers().setSystemTime(new Date(NOW));
    mockFs.existsSync.mockReturnValue(true);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("constructor", () => {
    it("creates both data directories if they do not exist", () => {
      mockFs.existsSync.mockReturnValue(false);

      new JsonSessionStore(DATA_DIR);

      expect(mockFs.mkdirSync).toHaveBeenCalledWith(SESSIONS_DIR, { recursive: true });
      expect(mockFs.mkdirSync).toHaveBeenCalledWith(EVALUATIONS_DIR, { recursive: true });
    });

    it("does not create directories that already exist", () => {
      new JsonSessionStore(DATA_DIR);

      expect(mockFs.mkdirSync).not.toHaveBeenCalled();
    });
  });

  describe("upsertSession", () => {
    it("inserts a new record with default counters", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.existsSync.mockReturnValue(false);

      await store.upsertSession("12345678", 0);

      expect(mockFs.writeFileSync).toHaveBeenCalledTimes(1);
      expect(mockFs.writeFileSync.mock.calls[0][0]).toBe(path.join(SESSIONS_DIR, "12345678.json"));
      expect(written(0)).toEqual({
        studentId: "12345678",
        currentStepIndex: 0,
        lastUpdated: NOW,
        sessionStartTime: NOW,
        totalInteractions: 0,
        completedSteps: 0,
        lastMessageContent: null,
      });
    });

    it("updates an existing record and keeps its other fields", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.readFileSync.mockReturnValue(JSON.stringify(createRecord()));

      await store.upsertSession("12345678", 2, { totalInteractions: 3, lastMessage: "my audience is students" });

      expect(written(0)).toEqual(
        createRecord({
          currentStepIndex: 2,
          lastUpdated: NOW,
          totalInteractions: 3,
          lastMessageContent: "my audience is students",
        })
      );
    });

    it("leaves optional fields alone when they are not given", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.readFileSync.mockReturnValue(JSON.stringify(createRecord()));

      await store.upsertSession("12345678", 3);

      expect(written(0)).toEqual(createRecord({ currentStepIndex: 3, lastUpdated: NOW }));
    });
  });

  describe("insertEvaluation", () => {
    it("writes the evaluation and bumps completed steps", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      const evaluation = createEvaluation();
      mockFs.readFileSync.mockReturnValue(JSON.stringify(createRecord()));

      await store.insertEvaluation(evaluation);

      expect(mockFs.writeFileSync).toHaveBeenCalledWith(
        path.join(EVALUATIONS_DIR, "eval-1.json"),
        JSON.stringify(evaluation, null, 2)
      );
      expect(mockFs.writeFileSync.mock.calls[1][0]).toBe(path.join(SESSIONS_DIR, "12345678.json"));
      expect(written(1)).toEqual(createRecord({ completedSteps: 2 }));
    });

    it("keeps the evaluation when the completed-steps update fails", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
      mockFs.readFileSync.mockImplementation(() => {
        throw new Error("EIO: i/o error, read");
      });

      await expect(store.insertEvaluation(createEvaluation())).resolves.toBeUndefined();

      expect(mockFs.writeFileSync).toHaveBeenCalledTimes(1);
      expect(mockFs.writeFileSync.mock.calls[0][0]).toBe(path.join(EVALUATIONS_DIR, "eval-1.json"));
      expect(warnSpy).toHaveBeenCalledWith(
        "[Store] Evaluation eval-1 saved but completed steps not updated: EIO: i/o error, read"
      );
      warnSpy.mockRestore();
    });

    it("keeps a null score", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.existsSync.mockReturnValue(false);

      await store.insertEvaluation(createEvaluation({ score: null }));

      expect(written(0)).toEqual(createEvaluation({ score: null }));
    });

    it("stores the evaluation even when the student has no record", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.existsSync.mockReturnValue(false);

      await store.insertEvaluation(createEvaluation());

      expect(mockFs.writeFileSync).toHaveBeenCalledTimes(1);
    });
  });

  describe("incrementInteractions", () => {
    it("adds one to the cumulative count", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.readFileSync.mockReturnValue(JSON.stringify(createRecord({ totalInteractions: 5 })));

      await store.incrementInteractions("12345678");

      expect(written(0)).toEqual(createRecord({ totalInteractions: 6 }));
    });

    it("does nothing for unknown students", async () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.existsSync.mockReturnValue(false);

      await store.incrementInteractions("99999999");

      expect(mockFs.writeFileSync).not.toHaveBeenCalled();
    });
  });

  describe("load", () => {
    it("returns null when no record exists", () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.existsSync.mockReturnValue(false);

      expect(store.load("12345678")).toBeNull();
    });

    it("returns the stored record", () => {
      const store = new JsonSessionStore(DATA_DIR);
      mockFs.readFileSync.mockReturnValue(JSON.stringify(createRecord()));

      expect(store.load("12345678")).toEqual(createRecord());
      expect(mockFs.readFileSync).toHaveBeenCalledWith(path.join(SESSIONS_DIR, "12345678.json"), "utf-8");
    });
  });
});
