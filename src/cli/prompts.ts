// src/cli/prompts.ts

import readline from "readline/promises";
import {
  DEFAULT_AUTHOR,
  DEFAULT_DESCRIPTION,
  DEFAULT_PROJECT_NAME,
  DEFAULT_RUNTIME_VERSION,
  FEATURE_FLAGS,
  type FeatureFlag,
  type ProjectConfigInput,
} from "../schema";
import { defaultLogger, type Logger } from "../util/logger";

/**
 * The slice of a readline interface the prompts need.
 */
export interface Asker {
  question(query: string): Promise<string>;
  close(): void;
}

export function createReadlineAsker(): Asker {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

type TextField = "name" | "description" | "author" | "runtimeVersion";

const TEXT_PROMPTS: ReadonlyArray<{ field: TextField; label: string; fallback: string }> = [
  { field: "name", label: "Project name", fallback: DEFAULT_PROJECT_NAME },
  { field: "description", label: "Project description", fallback: DEFAULT_DESCRIPTION },
  { field: "author", label: "Author name", fallback: DEFAULT_AUTHOR },
  { field: "runtimeVersion", label: "Python version", fallback: DEFAULT_RUNTIME_VERSION },
];

export const FLAG_QUESTIONS: Record<FeatureFlag, string> = {
  continuousIntegration: "Include GitHub Actions CI?",
  devcontainer: "Include devcontainer setup?",
  preCommitHooks: "Include pre-commit hooks?",
  containerization: "Include Docker setup?",
  diagrams: "Include PlantUML diagram templates?",
  localAiAssistant: "Include Continue local AI config?",
};

async function askText(asker: Asker, label: string, fallback: string): Promise<string> {
  const answer = (await asker.question(`  ${label} (${fallback}): `)).trim();
  return answer || fallback;
}

/**
 * Ask a yes/no question until the answer is recognised. Empty means yes.
 */
export async function askYesNo(asker: Asker, question: string, logger: Logger): Promise<boolean> {
  for (;;) {
    // eslint-disable-next-line no-await-in-loop
    const answer = (await asker.question(`  ${question} [Y/n] `)).trim().toLowerCase();
    if (answer === "" || answer === "y" || answer === "yes") return true;
    if (answer === "n" || answer === "no") return false;
    logger.warn(`"${answer}" is not valid, expected y (yes) or n (no)`);
  }
}

/**
 * Prompt only for values not already provided via CLI flags.
 * Returns a new input; the given one is left untouched.
 */
export async function promptForConfig(
  input: ProjectConfigInput,
  asker: Asker,
  logger: Logger = defaultLogger.child("[prompt]"),
): Promise<ProjectConfigInput> {
  const result: ProjectConfigInput = { ...input };

  for (const { field, label, fallback } of TEXT_PROMPTS) {
    if (result[field]) continue;
    // eslint-disable-next-line no-await-in-loop
    result[field] = await askText(asker, label, fallback);
  }

  for (const flag of FEATURE_FLAGS) {
    if (result[flag] !== undefined) continue;
    // eslint-disable-next-line no-await-in-loop
    result[flag] = await askYesNo(asker, FLAG_QUESTIONS[flag], logger);
  }

  return result;
}
