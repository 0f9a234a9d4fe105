/**
 * Sentinel the mentor appends when it judges the current step answered.
 */
export const COMPLETION_MARKER = "[STEP_COMPLETED]";

/**
 * Command a student types to ask for the next step.
 */
export const ADVANCE_COMMAND = "/next";

export function hasCompletionMarker(text: string): boolean {
  return text.includes(COMPLETION_MARKER);
}

export function stripCompletionMarker(text: string): string {
  return text.split(COMPLETION_MARKER).join("");
}

/**
 * Removes the completion marker from a stream of text fragments before they
 * reach the student. The marker can arrive split across fragments, so any
 * trailing text that could still grow into the marker is held back until the
 * next fragment (or flush) decides it.
 */
export class MarkerFilter {
  private pending = "";

  push(fragment: string): string {
    const text = stripCompletionMarker(this.pending + fragment);
    const holdBack = partialMarkerSuffixLength(text);
    this.pending = text.slice(text.length - holdBack);
    return text.slice(0, text.length - holdBack);
  }

  flush(): string {
    const rest = this.pending;
    this.pending = "";
    return rest;
  }
}

// Length of the longest suffix of `text` that is a proper prefix of the marker
function partialMarkerSuffixLength(text: string): number {
  const max = Math.min(text.length, COMPLETION_MARKER.length - 1);
  for (let len = max; len > 0; len--) {
    if (COMPLETION_MARKER.startsWith(text.slice(text.length - len))) {
      return len;
    }
  }
  return 0;
}
