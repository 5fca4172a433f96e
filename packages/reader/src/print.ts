import type { Form, FormElement } from "./ast/form.js";
import { formatSpan } from "./coordinate.js";

export type PrintOpts = {
  /** Suffix every atom and list with `@line:column` span labels */
  spans?: boolean;
};

const elementToString = <T>(element: FormElement<T>, opts: PrintOpts): string => {
  if (element.type === "list") return formToString(element.form, opts);
  const text = String(element.value);
  return opts.spans ? `${text}@${formatSpan(element.span)}` : text;
};

/** Debug rendering: `(a b (c d))`. Atom values go through `String`. */
export const formToString = <T>(form: Form<T>, opts: PrintOpts = {}): string => {
  const inner = form.elements
    .map((element) => elementToString(element, opts))
    .join(" ");
  return opts.spans ? `(${inner})@${formatSpan(form.span)}` : `(${inner})`;
};
