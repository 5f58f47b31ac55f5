import { readPath, readProperty, toOptionalInteger, toOptionalString } from "../core/_shared/probe";
import type { ProgramDescriptor } from "./session.types";

export const EMPTY_PROGRAM_DESCRIPTOR: ProgramDescriptor = Object.freeze({
  name: null,
  path: null,
  architecture: null,
  entry: null,
});

export function deriveProgramDescriptor(program: unknown): ProgramDescriptor {
  if (program === null || program === undefined) {
    return EMPTY_PROGRAM_DESCRIPTOR;
  }

  const filename = toOptionalString(readProperty(program, "filename"));
  const binary = toOptionalString(readPath(program, ["loader", "mainObject", "binary"]));
  const entry = toOptionalInteger(readPath(program, ["loader", "mainObject", "entry"]));
  const architecture = toOptionalString(readPath(program, ["arch", "name"]));

  return Object.freeze({
    // An empty binary name falls back to the filename.
    name: binary !== null && binary !== "" ? binary : filename,
    path: filename,
    architecture,
    entry,
  });
}
