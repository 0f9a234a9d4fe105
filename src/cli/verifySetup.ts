#!/usr/bin/env node
import "dotenv/config";
import fs from "fs";
import { DEFAULT_DATA_DIR } from "../config";

const REQUIRED_VARS = ["OPENAI_API_KEY"];

export interface SetupCheck {
  label: string;
  ok: boolean;
  detail: string;
}

/**
 * Show only the last few characters of a secret.
 */
export function maskSecret(value: string, visible: number = 5): string {
  if (value.length <= visible) {
    return "*".repeat(value.length);
  }
  return "*".repeat(value.length - visible) + value.slice(-visible);
}

export function checkEnvironment(env: NodeJS.ProcessEnv): SetupCheck[] {
  return REQUIRED_VARS.map((name) => {
    const value = env[name]?.trim();
    return value
      ? { label: name, ok: true, detail: maskSecret(value) }
      : { label: name, ok: false, detail: "Not set" };
  });
}

export function checkDataDir(dataDir: string): SetupCheck {
  try {
    fs.mkdirSync(dataDir, { recursive: true });
    fs.accessSync(dataDir, fs.constants.W_OK);
    return { label: "Data directory", ok: true, detail: dataDir };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { label: "Data directory", ok: false, detail: `${dataDir} (${message})` };
  }
}

function main(): void {
  console.log("🚀 Elevator Pitch Tutor setup verification");
  console.log("=".repeat(40));

  const checks = [
    ...checkEnvironment(process.env),
    checkDataDir(process.env.TUTOR_DATA_DIR?.trim() || DEFAULT_DATA_DIR),
  ];

  for (const check of checks) {
    console.log(`${check.ok ? "✅" : "❌"} ${check.label}: ${check.detail}`);
  }

  console.log("=".repeat(40));
  if (checks.every((check) => check.ok)) {
    console.log("🎉 Setup verification passed. Run: npm run tutor");
  } else {
    console.log("⚠️  Setup verification failed. Copy .env.example to .env and fill in your values.");
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
