import fs from "fs";
import path from "path";
import { PitchEvaluation } from "../domain/pitchEvaluation";

/**
 * Durable mirror of a student's session. One record per student ID.
 */
export interface SessionRecord {
  studentId: string;
  currentStepIndex: number;
  lastUpdated: string;
  sessionStartTime: string;
  totalInteractions: number;
  completedSteps: number;
  lastMessageContent: string | null;
}

export interface SessionRecordUpdate {
  totalInteractions?: number;
  lastMessage?: string;
}

/**
 * The three persistence operations the tutor relies on.
 * Implementations may throw; callers go through SafeSessionStore.
 */
export interface SessionStorePort {
  /** Insert or update the record for a student, refreshing lastUpdated. */
  upsertSession(studentId: string, stepIndex: number, update?: SessionRecordUpdate): Promise<void>;
  /** Append an evaluation and bump the student's completed-step count. */
  insertEvaluation(evaluation: PitchEvaluation): Promise<void>;
  /** Bump the student's cumulative interaction count. */
  incrementInteractions(studentId: string): Promise<void>;
}

/**
 * SessionStorePort backed by JSON files:
 *   {dataDir}/student-sessions/{studentId}.json
 *   {dataDir}/pitch-evaluations/{evaluationId}.json
 *
 * Every operation reads and writes its own files; nothing stays open between calls.
 */
export class JsonSessionStore implements SessionStorePort {
  private sessionsDir: string;
  private evaluationsDir: string;

  constructor(dataDir: string) {
    this.sessionsDir = path.join(dataDir, "student-sessions");
    this.evaluationsDir = path.join(dataDir, "pitch-evaluations");

    for (const dir of [this.sessionsDir, this.evaluationsDir]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
  }

  async upsertSession(studentId: string, stepIndex: number, update: SessionRecordUpdate = {}): Promise<void> {
    const now = new Date().toISOString();
    const existing = this.load(studentId);

    const record: SessionRecord = existing ?? {
      studentId,
      currentStepIndex: stepIndex,
      lastUpdated: now,
      sessionStartTime: now,
      totalInteractions: 0,
      completedSteps: 0,
      lastMessageContent: null,
    };

    record.currentStepIndex = stepIndex;
    record.lastUpdated = now;
    if (update.totalInteractions !== undefined) {
      record.totalInteractions = update.totalInteractions;
    }
    if (update.lastMessage !== undefined) {
      record.lastMessageContent = update.lastMessage;
    }

    this.save(record);
  }

  async insertEvaluation(evaluation: PitchEvaluation): Promise<void> {
    const filePath = path.join(this.evaluationsDir, `${evaluation.id}.json`);
    fs.writeFileSync(filePath, JSON.stringify(evaluation, null, 2));

    // Only students with a session record get their count bumped.
    // The evaluation is already on disk, so a failed bump is a partial save.
    try {
      const record = this.load(evaluation.studentId);
      if (record) {
        record.completedSteps += 1;
        this.save(record);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Store] Evaluation ${evaluation.id} saved but completed steps not updated: ${message}`);
    }
  }

  async incrementInteractions(studentId: string): Promise<void> {
    const record = this.load(studentId);
    if (record) {
      record.totalInteractions += 1;
      this.save(record);
    }
  }

  /**
   * Load a session record by student ID
   */
  load(studentId: string): SessionRecord | null {
    const filePath = this.sessionPath(studentId);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(data) as SessionRecord;
  }

  private save(record: SessionRecord): void {
    fs.writeFileSync(this.sessionPath(record.studentId), JSON.stringify(record, null, 2));
  }

  private sessionPath(studentId: string): string {
    return path.join(this.sessionsDir, `${studentId}.json`);
  }
}
