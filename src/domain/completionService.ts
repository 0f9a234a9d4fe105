/**
 * Text generation backend used by the tutor personas.
 */
export interface CompletionService {
  /**
   * Generate the full response for a rendered prompt.
   */
  complete(prompt: string): Promise<string>;

  /**
   * Generate a response as ordered fragments that concatenate to the full text.
   * Each call starts a new generation; the returned sequence is consumed once.
   */
  stream(prompt: string): AsyncIterable<string>;
}

/**
 * Consume a fragment stream, forwarding each fragment as it arrives,
 * and return the assembled text.
 */
export async function collectStream(
  fragments: AsyncIterable<string>,
  onFragment?: (fragment: string) => void
): Promise<string> {
  let text = "";
  for await (const fragment of fragments) {
    text += fragment;
    onFragment?.(fragment);
  }
  return text;
}
