import { type Form, formToString } from "@tinysexpr/reader";
import type { OutputFormat } from "./config/index.js";

export type OutputOpts = {
  format: OutputFormat;
  spans?: boolean;
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(value, undefined, 2);

/** One top-level form as printed by the CLI */
export const formatForm = <T>(form: Form<T>, opts: OutputOpts): string => {
  switch (opts.format) {
    case "json":
      return JSON.stringify(form.toJSON());
    case "verbose":
      return stringifyOutput(form.toVerboseJSON());
    case "text":
      return formToString(form, { spans: opts.spans });
  }
};

export const printForm = <T>(form: Form<T>, opts: OutputOpts): void => {
  console.log(formatForm(form, opts));
};
