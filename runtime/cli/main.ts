import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 2;
  });
