import type { Span } from "../coordinate.js";
import { formToString } from "../print.js";

export type AtomElement<T> = {
  readonly type: "atom";
  readonly value: T;
  readonly span: Span;
};

export type ListElement<T> = {
  readonly type: "list";
  readonly form: Form<T>;
};

/** One entry of a form: a handled atom or a nested form */
export type FormElement<T> = AtomElement<T> | ListElement<T>;

export type FormJSON<T> = Array<T | FormJSON<T>>;

export type VerboseAtomJSON<T> = { type: "atom"; value: T; span: Span };

export type VerboseFormJSON<T> = {
  type: "list";
  span: Span;
  elements: Array<VerboseAtomJSON<T> | VerboseFormJSON<T>>;
};

export type FormOpts<T> = {
  elements: readonly FormElement<T>[];
  span: Span;
};

/** A matched `(` ... `)` pair and everything read between them. Immutable. */
export class Form<T = string> implements Iterable<FormElement<T>> {
  readonly syntaxType = "list";
  readonly elements: readonly FormElement<T>[];
  /** From the opening `(` to the closing `)` */
  readonly span: Span;

  constructor(opts: FormOpts<T>) {
    this.elements = Object.freeze([...opts.elements]);
    this.span = opts.span;
    Object.freeze(this);
  }

  get length() {
    return this.elements.length;
  }

  at(index: number): FormElement<T> | undefined {
    return this.elements.at(index);
  }

  [Symbol.iterator](): Iterator<FormElement<T>> {
    return this.elements[Symbol.iterator]();
  }

  /** Atom values and nested forms, in source order */
  values(): Array<T | Form<T>> {
    return this.elements.map((element) =>
      element.type === "atom" ? element.value : element.form
    );
  }

  toJSON(): FormJSON<T> {
    return this.elements.map((element) =>
      element.type === "atom" ? element.value : element.form.toJSON()
    );
  }

  toVerboseJSON(): VerboseFormJSON<T> {
    return {
      type: "list",
      span: this.span,
      elements: this.elements.map(
        (element): VerboseAtomJSON<T> | VerboseFormJSON<T> =>
          element.type === "atom"
            ? { type: "atom", value: element.value, span: element.span }
            : element.form.toVerboseJSON()
      ),
    };
  }

  toString(): string {
    return formToString(this);
  }
}

export const atomElement = <T>(value: T, span: Span): AtomElement<T> => ({
  type: "atom",
  value,
  span,
});

export const listElement = <T>(form: Form<T>): ListElement<T> => ({
  type: "list",
  form,
});

export const isAtomElement = <T>(
  element?: FormElement<T>
): element is AtomElement<T> => element?.type === "atom";

export const isListElement = <T>(
  element?: FormElement<T>
): element is ListElement<T> => element?.type === "list";
