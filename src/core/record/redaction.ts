import { format } from "node:util";

import type { Redactable } from "../types.js";

export function isRedactable(value: unknown): value is Redactable {
  return (
    typeof value === "object" &&
    value !== null &&
    "redacted" in value &&
    typeof value.redacted === "function"
  );
}

/**
 * Returns a string of `*` with the same length as `text`.
 */
export function redact(text: string): string {
  return "*".repeat(text.length);
}

class SecretValue implements Redactable {
  public constructor(private readonly value: string) {}

  public redacted(): string {
    return redact(this.value);
  }

  public reveal(): string {
    return this.value;
  }

  public toString(): string {
    return this.redacted();
  }
}

export type Secret = SecretValue;

export function secret(value: string): Secret {
  return new SecretValue(value);
}

/**
 * Replaces every redactable argument in place by its redacted form.
 */
export function redactArgs(args: unknown[]): void {
  args.forEach((arg, index) => {
    if (isRedactable(arg)) {
      args[index] = arg.redacted();
    }
  });
}

export function renderArg(value: unknown): string {
  return format("%s", value);
}

/**
 * Concatenates operands, adding a space between two operands when neither
 * is a string.
 */
export function sprint(args: readonly unknown[]): string {
  let output = "";
  args.forEach((arg, index) => {
    const previous = index > 0 ? args[index - 1] : undefined;
    if (
      index > 0 &&
      typeof arg !== "string" &&
      typeof previous !== "string"
    ) {
      output += " ";
    }
    output += renderArg(arg);
  });
  return output;
}
