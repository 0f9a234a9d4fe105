#!/usr/bin/env node
import "dotenv/config";
import fs from "fs";
import path from "path";
import readline from "readline";
import { loadConfig, ConfigError } from "../config";
import { EmitEvent, TutorConversation, TutorEvent } from "../domain/tutorConversation";
import { createTutorConversation, createTutorDependencies } from "../services/tutorFactory";
import { UploadedFile } from "../loaders/documentExtractor";

/**
 * Terminal chat with the elevator pitch tutor.
 * Type 'exit' or 'quit' to end the session.
 */

/**
 * Ask one question. Resolves to null if the input closes first (Ctrl-D).
 */
function askLine(rl: readline.Interface, prompt: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(prompt, (answer) => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

function isExitCommand(input: string): boolean {
  const exitCommands = ["exit", "quit"];
  return exitCommands.includes(input.toLowerCase().trim());
}

/**
 * Print tutor events as they arrive. Reply chunks stream onto one line.
 */
function renderEvent(event: TutorEvent): void {
  switch (event.type) {
    case "notice":
      console.log(`\n${event.text}\n`);
      break;
    case "reply_start":
      process.stdout.write("\n🤖 ");
      break;
    case "reply_chunk":
      process.stdout.write(event.text);
      break;
    case "reply_end":
      process.stdout.write("\n\n");
      break;
    case "request_file":
      console.log(`\n📎 ${event.text}`);
      break;
  }
}

/**
 * Ask for a file path and read it. Returns null if nothing usable was given.
 */
async function askForFile(rl: readline.Interface): Promise<UploadedFile | null> {
  const answer = (await askLine(rl, "File path (enter to cancel): "))?.trim();
  if (!answer) {
    return null;
  }

  const filePath = path.resolve(answer);
  if (!fs.existsSync(filePath)) {
    console.log(`\nFile not found: ${filePath}`);
    return null;
  }

  return { name: path.basename(filePath), data: fs.readFileSync(filePath) };
}

/**
 * Run a chat session over a readline interface until the student exits
 * or the input closes. The session is ended either way.
 */
export async function runChat(
  tutor: TutorConversation,
  rl: readline.Interface,
  render: EmitEvent = renderEvent
): Promise<void> {
  let open = true;
  rl.once("close", () => {
    open = false;
  });

  await tutor.start(render);

  while (true) {
    const input = open ? await askLine(rl, "> ") : null;

    if (input === null || isExitCommand(input)) {
      tutor.end(render);
      return;
    }
    if (input.trim() === "") {
      continue;
    }

    let fileRequested = false;
    await tutor.handleMessage(input, (event) => {
      if (event.type === "request_file") fileRequested = true;
      render(event);
    });

    if (fileRequested) {
      const file = open ? await askForFile(rl) : null;
      await tutor.submitPitch(file, render);
    }
  }
}

async function main(): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    const config = loadConfig();
    const tutor = createTutorConversation(createTutorDependencies(config));
    await runChat(tutor, rl);
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      console.error("Copy .env.example to .env and fill in your values.");
    } else {
      console.error("Tutor stopped unexpectedly:", error);
    }
    process.exitCode = 1;
  });
}
