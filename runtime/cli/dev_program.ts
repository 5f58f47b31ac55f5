import { createInMemoryProgram } from "../../src/host/in_memory.program";
import type { HostProgram } from "../../src/host/host.types";

/** Bound by `serve` when no program database is given, so tools answer. */
export function createDevProgram(): HostProgram {
  return createInMemoryProgram({
    filename: "dev/placeholder.bin",
    binary: "placeholder.bin",
    architecture: "AMD64",
    entry: 0x401000,
    functions: [
      { address: 0x401000, name: "_start", size: 48 },
      { address: 0x401030, name: "main", size: 96 },
      { address: 0x401100, name: "puts", size: 6, isPlt: true },
    ],
    strings: [[0x402000, "hello from the placeholder program"]],
    comments: [[0x401030, "entry into user code"]],
    xrefs: [{ src: 0x401020, dst: 0x401030, type: "call" }],
  });
}
