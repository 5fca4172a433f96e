import { getConfigFromCli } from "./arg-parser.js";
import type { CliConfig } from "./types.js";

export type { CliConfig, OutputFormat } from "./types.js";

let config: CliConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
