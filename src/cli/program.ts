// src/cli/program.ts

import path from "path";
import { Command } from "commander";
import packageJson from "../../package.json";
import { generateProject } from "../core/generate-project";
import {
  applyDefaults,
  isCompleteConfig,
  resolveName,
  validateConfig,
} from "../core/resolve-config";
import type { ProjectConfig, ProjectConfigInput } from "../schema";
import { color, defaultLogger, type Logger } from "../util/logger";
import { createReadlineAsker, promptForConfig, type Asker } from "./prompts";
import { formatConfigSummary, formatNextSteps, renderFileTree } from "./report";

const { version: VERSION, name: NAME } = packageJson;

interface GlobalCliOptions {
  quiet?: boolean;
  debug?: boolean;
}

interface NewCliOptions {
  description?: string;
  author?: string;
  python?: string;
  ci?: boolean;
  devcontainer?: boolean;
  precommit?: boolean;
  docker?: boolean;
  diagrams?: boolean;
  continue?: boolean;
  interactive: boolean;
}

export interface ProgramOptions {
  /**
   * Directory projects are created in. Default: process.cwd()
   */
  cwd?: string;

  /**
   * Logger for CLI output; --quiet/--debug adjust its level.
   */
  logger?: Logger;

  /**
   * Factory for the prompt backend; defaults to a stdin/stdout readline interface.
   */
  createAsker?: () => Asker;
}

/**
 * Apply --quiet / --debug to the logger and return a CLI-scoped child.
 */
function createCliLogger(base: Logger, opts: GlobalCliOptions): Logger {
  if (opts.quiet) {
    base.setLevel("silent");
  } else if (opts.debug) {
    base.setLevel("debug");
  }
  return base.child("[cli]");
}

function toConfigInput(
  rawName: string | undefined,
  opts: NewCliOptions,
  cwd: string,
): ProjectConfigInput {
  const { name, useCurrentDirectory } = resolveName(rawName, path.basename(cwd));
  return {
    name,
    description: opts.description,
    author: opts.author,
    runtimeVersion: opts.python,
    continuousIntegration: opts.ci,
    devcontainer: opts.devcontainer,
    preCommitHooks: opts.precommit,
    containerization: opts.docker,
    diagrams: opts.diagrams,
    localAiAssistant: opts.continue,
    useCurrentDirectory,
  };
}

function printReport(logger: Logger, config: ProjectConfig, created: readonly string[]) {
  logger.plain("");
  logger.plain(color.bold("Project Structure"));
  for (const line of renderFileTree(config.name, created)) {
    logger.plain(`  ${line}`);
  }

  logger.plain("");
  logger.plain(color.green(`✔ Project '${config.name}' created successfully!`));
  logger.plain("");
  logger.plain(color.dim("Next steps:"));
  for (const step of formatNextSteps(config)) {
    logger.plain(`  $ ${step}`);
  }
}

export async function handleNewCommand(
  cwd: string,
  rawName: string | undefined,
  opts: NewCliOptions,
  logger: Logger,
  createAsker: () => Asker,
): Promise<string[]> {
  let input = toConfigInput(rawName, opts, cwd);

  if (opts.interactive && !isCompleteConfig(input)) {
    const asker = createAsker();
    try {
      input = await promptForConfig(input, asker, logger.child("[prompt]"));
    } finally {
      asker.close();
    }
  }

  const config = applyDefaults(input);
  validateConfig(config);

  logger.plain("");
  logger.plain(color.bold("Configuration"));
  formatConfigSummary(config).forEach((line) => logger.plain(line));

  logger.info("Generating project...");
  const created = generateProject(config, {
    cwd,
    logger: logger.child("[generate]"),
  });

  printReport(logger, config, created);
  return created;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const baseLogger = options.logger ?? defaultLogger;
  const createAsker = options.createAsker ?? createReadlineAsker;

  const program = new Command();

  program
    .name(NAME)
    .description("Scaffold Python projects with all dev tooling pre-configured")
    .version(VERSION, "-v, --version", "Show version and exit")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("new [name]")
    .description(
      'Create a new Python project. Use "." to scaffold into the current (empty) directory.',
    )
    .option("-d, --description <text>", "Project description")
    .option("-a, --author <name>", "Author name")
    .option("--python <version>", "Python version (X.Y)")
    .option("--ci", "Include GitHub Actions CI")
    .option("--no-ci", "Skip GitHub Actions CI")
    .option("--devcontainer", "Include devcontainer setup")
    .option("--no-devcontainer", "Skip devcontainer setup")
    .option("--precommit", "Include pre-commit hooks config")
    .option("--no-precommit", "Skip pre-commit hooks config")
    .option("--docker", "Include Docker setup")
    .option("--no-docker", "Skip Docker setup")
    .option("--diagrams", "Include PlantUML diagram templates")
    .option("--no-diagrams", "Skip PlantUML diagram templates")
    .option("--continue", "Include Continue local AI config")
    .option("--no-continue", "Skip Continue local AI config")
    .option("-y, --no-interactive", "Use defaults, skip all prompts")
    .action(async (name: string | undefined, opts: NewCliOptions, cmd: Command) => {
      const globalOpts = cmd.parent?.opts<GlobalCliOptions>() ?? {};
      const logger = createCliLogger(baseLogger, globalOpts);
      await handleNewCommand(cwd, name, opts, logger, createAsker);
    });

  return program;
}
