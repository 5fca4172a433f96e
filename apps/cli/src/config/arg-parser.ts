import { Command, InvalidArgumentError } from "commander";
import { VERSION } from "../version.js";
import type { CliConfig, OutputFormat } from "./types.js";

const OUTPUT_FORMATS = ["text", "json", "verbose"] as const;

const parseOutputFormat = (value: string): OutputFormat => {
  const normalized = value.toLowerCase();
  if (
    normalized === "text" ||
    normalized === "json" ||
    normalized === "verbose"
  ) {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid output format "${value}" (allowed: ${OUTPUT_FORMATS.join(", ")})`
  );
};

type CliOptions = {
  format: OutputFormat;
  commentChar?: string;
  spans?: boolean;
  color: boolean;
};

const createCommand = (): Command =>
  new Command()
    .name("tinysexpr")
    .description("Read S-expressions from a file and print them")
    .version(VERSION, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .exitOverride()
    .argument("[file]", "file to read, - for stdin", "-")
    .option(
      "-f, --format <format>",
      `output format (${OUTPUT_FORMATS.join("|")})`,
      parseOutputFormat,
      "text"
    )
    .option("-c, --comment-char <char>", "character that starts a line comment")
    .option("--spans", "label text output with source spans")
    .option("--no-color", "disable colored diagnostics");

/**
 * Parses CLI arguments (without the node and script entries). Invalid
 * arguments, --help and --version throw a CommanderError after commander has
 * written its output.
 */
export const getConfigFromCli = (
  argv: readonly string[] = process.argv.slice(2)
): CliConfig => {
  const program = createCommand();
  program.parse(["node", "tinysexpr", ...argv]);
  const opts = program.opts<CliOptions>();
  const [input = "-"] = program.args;

  return {
    input,
    format: opts.format,
    commentChar: opts.commentChar,
    spans: Boolean(opts.spans),
    color: opts.color,
  };
};
