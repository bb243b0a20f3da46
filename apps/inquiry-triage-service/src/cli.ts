import dotenv from "dotenv";
import { AppConfig, loadConfig } from "./config";
import { setupDatabase } from "./db/sqlite";
import { PipelineDeps, createPipelineDeps, runPipeline } from "./services/pipeline";

export const USAGE = "Usage: cli <run|setup-db>";

/**
 * One-shot entry for scheduled invocations, resolved to an exit code
 * 1 only for an unknown command, or when the run could not start or read the sheet
 */
export async function runCommand(
  command: string | undefined,
  config: Readonly<AppConfig>,
  deps?: PipelineDeps
): Promise<number> {
  try {
    switch (command) {
      case "setup-db":
        setupDatabase(config.dbFile);
        return 0;

      case "run":
      case undefined: {
        console.log("--- Starting Automation Pipeline ---");
        setupDatabase(config.dbFile);
        const summary = await runPipeline(deps ?? createPipelineDeps(config));
        if (summary.fetched === 0) {
          console.log("No new inquiries to process.");
        }
        console.log("--- Automation Pipeline Finished ---");
        return 0;
      }

      default:
        console.error(USAGE);
        return 1;
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[cli] Fatal:", message);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  void runCommand(process.argv[2], loadConfig()).then((code) => {
    process.exitCode = code;
  });
}
