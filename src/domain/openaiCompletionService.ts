import OpenAI from "openai";
import { CompletionService } from "./completionService";
import { COMPLETION_MODEL, COMPLETION_TEMPERATURE } from "../config";

/**
 * CompletionService backed by OpenAI chat completions.
 * The rendered persona prompt is sent as a single user message.
 */
export class OpenAICompletionService implements CompletionService {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(apiKey: string, model: string = COMPLETION_MODEL, temperature: number = COMPLETION_TEMPERATURE) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
    this.temperature = temperature;
  }

  async complete(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [{ role: "user", content: prompt }],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error("No response from AI");
    }
    return content;
  }

  async *stream(prompt: string): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [{ role: "user", content: prompt }],
      stream: true,
    });

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) {
        yield delta;
      }
    }
  }
}
