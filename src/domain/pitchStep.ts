/**
 * The five ordered stages of building an elevator pitch.
 * Shared, read-only reference data for every session.
 */
export const PITCH_STEPS = [
  "Identify the Target Audience",
  "Define the Problem/Need",
  "Introduce the Product/Service",
  "Highlight the Key Differentiator",
  "End with a Strong Closing Statement",
] as const;

export type PitchStep = (typeof PITCH_STEPS)[number];

export const TOTAL_STEPS = PITCH_STEPS.length;

export function getPitchStep(index: number): PitchStep {
  const step = PITCH_STEPS[index];
  if (step === undefined) {
    throw new RangeError(`Step index ${index} is outside 0..${TOTAL_STEPS - 1}`);
  }
  return step;
}

export function isLastStep(index: number): boolean {
  return index === TOTAL_STEPS - 1;
}

/**
 * Numbered list used in the mentor prompt, e.g. "1. Identify the Target Audience"
 */
export function formatPitchSteps(): string {
  return PITCH_STEPS.map((step, i) => `${i + 1}. ${step}`).join("\n");
}

/**
 * Key used for per-step interaction counters.
 */
export function stepKey(index: number): string {
  return `step_${index}`;
}
