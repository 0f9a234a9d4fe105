import { PersonaKey } from "./persona";

export type TutorCommand =
  | { kind: "progress" }
  | { kind: "upload" }
  | { kind: "switch"; persona: PersonaKey }
  | { kind: "chat"; text: string };

export const PROGRESS_COMMAND = "/progress";
export const UPLOAD_COMMAND = "/upload";

/**
 * Commands that change the active persona. The progress persona uses
 * "/tracker" because "/progress" shows the progress report.
 */
export const PERSONA_COMMANDS: Record<string, PersonaKey> = {
  "/mentor": "mentor",
  "/peer": "peer",
  "/tracker": "progress",
  "/eval": "eval",
};

/**
 * Classify an incoming message. Anything that isn't a command,
 * including "/next", is chat for the active persona.
 */
export function classifyMessage(content: string): TutorCommand {
  const command = content.trim().toLowerCase();

  if (command === PROGRESS_COMMAND) {
    return { kind: "progress" };
  }
  if (command === UPLOAD_COMMAND) {
    return { kind: "upload" };
  }
  if (Object.prototype.hasOwnProperty.call(PERSONA_COMMANDS, command)) {
    return { kind: "switch", persona: PERSONA_COMMANDS[command] };
  }
  return { kind: "chat", text: content };
}
