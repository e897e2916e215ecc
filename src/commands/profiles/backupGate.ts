import path from "node:path";
import type { Logger } from "../../logger";
import { describeCommandFailure, type CommandResult } from "../../process/runCommand";
import type { ProfileRepositoryKeys } from "./repository";

export type BackupSubtree = "secondary" | "primary";

export type BackupTool = {
  /** Resolves the export executable, or null when it is not installed. */
  locate: () => Promise<string | null>;
  exportSubtree: (toolPath: string, keyPath: string, filePath: string) => Promise<CommandResult>;
};

export type BackupManifest = {
  takenAt: string;
  files: Record<BackupSubtree, string>;
};

export type BackupErrorKind = "tool-not-found" | "export-failed";

export class BackupError extends Error {
  readonly kind: BackupErrorKind;
  readonly which?: BackupSubtree;

  constructor(kind: BackupErrorKind, message: string, options?: { which?: BackupSubtree; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BackupError";
    this.kind = kind;
    this.which = options?.which;
  }
}

type EnsureBackupInput = {
  destinationDir: string;
  filePrefix: string;
  keys: ProfileRepositoryKeys;
  now: Date;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatBackupStamp(now: Date): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}`
  );
}

function subtreeName(keyPath: string): string {
  const trimmed = keyPath.replace(/\\+$/, "");
  return trimmed.slice(trimmed.lastIndexOf("\\") + 1);
}

export function backupFileName(filePrefix: string, keyPath: string, now: Date): string {
  return `${filePrefix}-${subtreeName(keyPath)}-BEFORE-${formatBackupStamp(now)}.reg`;
}

/**
 * Exports ProfileGuid, then ProfileList. Throws on the first failure; nothing may be
 * deleted unless this returns.
 */
export async function ensureBackup(input: EnsureBackupInput, tool: BackupTool, log: Logger): Promise<BackupManifest> {
  const toolPath = await tool.locate();
  if (!toolPath) {
    throw new BackupError("tool-not-found", "backup tool not found; no export was attempted");
  }

  const exportStep = async (which: BackupSubtree, keyPath: string): Promise<string> => {
    const filePath = path.join(input.destinationDir, backupFileName(input.filePrefix, keyPath, input.now));
    log.info({ key: keyPath, file: filePath }, "exporting registry subtree");

    let result: CommandResult;
    try {
      result = await tool.exportSubtree(toolPath, keyPath, filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new BackupError("export-failed", `${which} export of ${keyPath} failed (${message})`, {
        which,
        cause: error,
      });
    }
    if (result.status !== 0) {
      const detail = describeCommandFailure(result);
      throw new BackupError("export-failed", `${which} export of ${keyPath} failed (${detail})`, {
        which,
        cause: result.spawnError ?? new Error(detail),
      });
    }
    return filePath;
  };

  const secondary = await exportStep("secondary", input.keys.profileGuid);
  const primary = await exportStep("primary", input.keys.profileList);

  log.info({ secondary, primary }, "backup completed");
  return { takenAt: input.now.toISOString(), files: { secondary, primary } };
}
