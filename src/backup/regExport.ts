import { access, mkdir } from "node:fs/promises";
import path from "node:path";
import type { BackupTool } from "../commands/profiles/backupGate";
import type { CommandRunner } from "../process/runCommand";

async function exists(targetPath: string): Promise<boolean> {
  try {
    await access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export function createRegExportTool(regExe: string, run: CommandRunner): BackupTool {
  return {
    locate: async () => ((await exists(regExe)) ? regExe : null),
    exportSubtree: async (toolPath, keyPath, filePath) => {
      await mkdir(path.dirname(filePath), { recursive: true });
      return run(toolPath, ["export", keyPath, filePath, "/y"]);
    },
  };
}
