import type { DestinationStream } from "pino";
import { createRegExportTool } from "./backup/regExport";
import { parseProfileDedupeArgs, validateProfileDedupeArgs } from "./commands/profiles/args";
import { ProfileRepository } from "./commands/profiles/repository";
import { runProfileDedupe } from "./commands/profiles/runProfileDedupe";
import { parseProfileDedupeConfig, type ProfileDedupeConfig } from "./config/schema";
import { createLogger } from "./logger";
import { runCommand, type CommandRunner } from "./process/runCommand";
import { RegExeRegistryStore } from "./store/regExeStore";

type CliDeps = {
  run?: CommandRunner;
  destination?: DestinationStream;
  now?: () => Date;
};

/** Returns the process exit code. */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv, deps: CliDeps = {}): Promise<number> {
  let config: ProfileDedupeConfig;
  try {
    config = parseProfileDedupeConfig(env);
  } catch (err) {
    createLogger("info", deps.destination).fatal({ err }, "invalid configuration");
    return 1;
  }

  const log = createLogger(config.log_level, deps.destination);
  const run = deps.run ?? runCommand;

  try {
    const { prefix } = validateProfileDedupeArgs(parseProfileDedupeArgs(argv));
    const store = new RegExeRegistryStore(config.backup.regExe, run, config.console_encoding);

    await runProfileDedupe(
      {
        prefix,
        backupDir: config.backup.dir,
        backupFilePrefix: config.backup.prefix,
        now: deps.now ? deps.now() : new Date(),
      },
      {
        repository: new ProfileRepository(store, config.keys),
        backupTool: createRegExportTool(config.backup.regExe, run),
        log,
      },
    );
    return 0;
  } catch (err) {
    log.fatal({ err }, "profile cleanup aborted");
    return 1;
  }
}
