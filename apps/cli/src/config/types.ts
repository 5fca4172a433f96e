export type OutputFormat = "text" | "json" | "verbose";

export type CliConfig = {
  /** File to read, `-` for stdin */
  input: string;
  format: OutputFormat;
  /** Overrides the reader's default comment character */
  commentChar?: string;
  /** Label text output with source spans */
  spans: boolean;
  color: boolean;
};
