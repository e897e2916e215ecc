import type { Logger } from "../../logger";
import { ensureBackup, type BackupManifest, type BackupTool } from "./backupGate";
import { groupDuplicateProfiles } from "./groupDuplicates";
import { compilePrefixMatcher } from "./identity";
import { removeProfileEntries } from "./removeEntries";
import type { ProfileRepository } from "./repository";
import { selectRemovableProfiles } from "./selectRemovable";
import type { DeletionOutcome, DuplicateGroup, ProfileEntry } from "./types";

type RunInput = {
  prefix: string;
  backupDir: string;
  backupFilePrefix: string;
  now: Date;
};

type RunHandlers = {
  repository: ProfileRepository;
  backupTool: BackupTool;
  log: Logger;
};

export type ProfileDedupeResult = {
  prefix: string;
  groups: DuplicateGroup[];
  candidates: ProfileEntry[];
  backup: BackupManifest | null;
  outcomes: DeletionOutcome[];
};

export async function runProfileDedupe(input: RunInput, handlers: RunHandlers): Promise<ProfileDedupeResult> {
  const { repository, backupTool, log } = handlers;
  const desired = compilePrefixMatcher(input.prefix);
  log.info({ prefix: desired.prefix }, "desired identity prefix");

  const groups = groupDuplicateProfiles(await repository.listProfiles());
  for (const group of groups) {
    log.info(
      { imagePath: group.imagePath, count: group.entries.length, identities: group.entries.map((e) => e.identity) },
      "duplicate profile path",
    );
  }

  const candidates = selectRemovableProfiles(groups, desired);
  log.info({ count: candidates.length }, "removal candidates found");

  if (candidates.length === 0) {
    log.info("nothing to remove");
    return { prefix: desired.prefix, groups, candidates, backup: null, outcomes: [] };
  }

  let backup: BackupManifest;
  try {
    backup = await ensureBackup(
      {
        destinationDir: input.backupDir,
        filePrefix: input.backupFilePrefix,
        keys: repository.keys,
        now: input.now,
      },
      backupTool,
      log,
    );
  } catch (error) {
    log.error({ err: error }, "backup failed; no profile entries were deleted");
    throw error;
  }

  const outcomes = await removeProfileEntries(candidates, repository, log);
  const failed = outcomes.filter((outcome) => outcome.kind === "failed").length;
  log.info({ removed: outcomes.length - failed, failed }, "profile cleanup finished");

  return { prefix: desired.prefix, groups, candidates, backup, outcomes };
}
