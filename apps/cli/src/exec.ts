import { readFileSync } from "node:fs";
import { CommanderError } from "commander";
import {
  type Forms,
  read,
  readFile,
  ReaderConfigError,
  ReaderSyntaxError,
} from "@tinysexpr/reader";
import { type CliConfig, getConfig } from "./config/index.js";
import { getConfigFromCli } from "./config/arg-parser.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { printForm } from "./output.js";

const STDIN_PATH = "<stdin>";

type Input = {
  forms: Forms<string>;
  /** Source text when it is not available from a file */
  text?: string;
};

const openInput = (config: CliConfig): Input => {
  const options = { commentChar: config.commentChar };

  if (config.input === "-") {
    const text = readFileSync(0, "utf8");
    return { forms: read(text, { ...options, filePath: STDIN_PATH }), text };
  }

  return { forms: readFile(config.input, options) };
};

const main = (config: CliConfig) => {
  const input = openInput(config);
  try {
    for (const form of input.forms) {
      printForm(form, { format: config.format, spans: config.spans });
    }
  } catch (error) {
    if (error instanceof ReaderSyntaxError) {
      console.error(
        formatCliDiagnostic(error.diagnostic, {
          color: config.color,
          source: input.text,
        })
      );
      process.exitCode = 1;
      return;
    }
    throw error;
  }
};

const errorHandler = (error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }

  process.exitCode = 1;
  if (error instanceof ReaderConfigError) {
    console.error(`${error.code}: ${error.message}`);
    return;
  }

  console.error(error instanceof Error ? error.message : String(error));
};

/** Runs the CLI. `argv` defaults to the process arguments. */
export const exec = (argv?: readonly string[]): void => {
  try {
    main(argv ? getConfigFromCli(argv) : getConfig());
  } catch (error) {
    errorHandler(error);
  }
};
