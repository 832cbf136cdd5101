import { createLogger } from "./logger";
import { createCommandHandlers } from "./cli/commands";
import { createProgram } from "./cli/program";
import { errorMessage } from "./errors";

async function main(): Promise<void> {
  const logger = createLogger();

  const program = createProgram(
    createCommandHandlers({
      logger,
      env: process.env,
      write: (line) => {
        process.stdout.write(`${line}\n`);
      },
    }),
  );

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "command failed");
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
