/**
 * A graded pitch submission. Written once, never updated.
 */
export interface PitchEvaluation {
  id: string;
  studentId: string;
  stepName: string; // step label active when the pitch was submitted
  score: number | null; // 0-10, null when the feedback had no parsable score
  feedback: string;
  createdAt: string;
}

const SCORE_PATTERN = /score[:\s]+(\d{1,2})\s*\/\s*10/i;

/**
 * Pull the score out of evaluator feedback such as "Score: 8/10".
 * Returns null (not 0) when no score is present.
 */
export function parseScore(feedback: string): number | null {
  const match = SCORE_PATTERN.exec(feedback);
  return match ? parseInt(match[1], 10) : null;
}
