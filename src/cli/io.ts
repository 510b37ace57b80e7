import { InputError, describeError } from "../domain/errors.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Runs an argument parser, reporting its failures as input errors. */
export function withArgumentErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new InputError("INVALID_ARGUMENTS", describeError(error));
  }
}
