import path from "path";

export const COMPLETION_MODEL = "gpt-4o";
export const COMPLETION_TEMPERATURE = 0.7;

export const DEFAULT_DATA_DIR = path.join(__dirname, "../data");
const DEFAULT_API_PORT = 3001;

export interface TutorConfig {
  openaiApiKey: string;
  model: string;
  temperature: number;
  dataDir: string;
  apiPort: number;
}

/**
 * Raised when a required setting is missing. Hosts let it abort startup.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build the tutor configuration from environment variables.
 * Call `dotenv/config` first if settings live in a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
  const openaiApiKey = env.OPENAI_API_KEY?.trim();
  if (!openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY not found in environment variables");
  }

  const port = env.API_PORT ? parseInt(env.API_PORT, 10) : DEFAULT_API_PORT;
  if (Number.isNaN(port) || port <= 0) {
    throw new ConfigError(`API_PORT must be a positive integer, got "${env.API_PORT}"`);
  }

  return {
    openaiApiKey,
    model: COMPLETION_MODEL,
    temperature: COMPLETION_TEMPERATURE,
    dataDir: env.TUTOR_DATA_DIR?.trim() || DEFAULT_DATA_DIR,
    apiPort: port,
  };
}
