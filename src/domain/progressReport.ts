import { StudentSession, elapsedMinutes, getStepInteractions } from "./studentSession";
import { TOTAL_STEPS } from "./pitchStep";
import { MIN_STEP_INTERACTIONS } from "./stepProgression";
import { ADVANCE_COMMAND } from "./completionMarker";

export interface ProgressReport {
  studentId: string;
  elapsedMinutes: number;
  percentComplete: number;
  currentStep: string;
  stepNumber: number; // 1-based
  totalSteps: number;
  interactionCount: number;
  remainingInteractions: number;
}

/**
 * Snapshot of where a student stands. Reads the session without changing it.
 */
export function buildProgressReport(session: StudentSession, now: Date): ProgressReport {
  const interactionCount = getStepInteractions(session);
  return {
    studentId: session.studentId,
    elapsedMinutes: elapsedMinutes(session, now),
    percentComplete: Math.floor((session.stepIndex / TOTAL_STEPS) * 100),
    currentStep: session.currentStep,
    stepNumber: session.stepIndex + 1,
    totalSteps: TOTAL_STEPS,
    interactionCount,
    remainingInteractions: Math.max(0, MIN_STEP_INTERACTIONS - interactionCount),
  };
}

export function formatProgressReport(report: ProgressReport): string {
  return [
    `⏱️ Time elapsed: ${report.elapsedMinutes.toFixed(1)} minutes`,
    `📊 Progress: ${report.percentComplete}% complete`,
    `📝 Current step: ${report.currentStep} (${report.stepNumber}/${report.totalSteps})`,
    `💬 Step interactions: ${report.interactionCount} (You need at least ${MIN_STEP_INTERACTIONS} interactions per step (need ${report.remainingInteractions} more) or type ${ADVANCE_COMMAND} to proceed.)`,
    `🆔 Student ID: ${report.studentId} (IMPORTANT: Write down this ID for your records!)`,
  ].join("\n");
}
