import type { Logger } from "../../logger";
import type { DeletionOutcome, ProfileEntry } from "./types";

type DeletionHandlers = {
  deletePrimary: (entry: ProfileEntry) => Promise<void>;
  secondaryExists: (correlationId: string) => Promise<boolean>;
  deleteSecondary: (correlationId: string) => Promise<void>;
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Deletes each entry's ProfileList key, then its ProfileGuid key when one is referenced and
 * still present. A failure is recorded against its entry and the batch carries on; nothing
 * already deleted is restored.
 */
export async function removeProfileEntries(
  entries: ProfileEntry[],
  handlers: DeletionHandlers,
  log: Logger,
): Promise<DeletionOutcome[]> {
  const outcomes: DeletionOutcome[] = [];

  for (const entry of entries) {
    log.info({ identity: entry.identity, location: entry.location }, "deleting profile entry");

    try {
      await handlers.deletePrimary(entry);

      let secondaryRemoved = false;
      if (entry.correlationId && (await handlers.secondaryExists(entry.correlationId))) {
        log.info({ identity: entry.identity, correlationId: entry.correlationId }, "deleting profile guid entry");
        await handlers.deleteSecondary(entry.correlationId);
        secondaryRemoved = true;
      }

      outcomes.push({ kind: "removed", entry, secondaryRemoved });
    } catch (error) {
      const cause = toError(error);
      log.error(
        { location: entry.location, correlationId: entry.correlationId ?? null, err: cause },
        "failed to delete profile entry",
      );
      outcomes.push({ kind: "failed", entry, cause });
    }
  }

  return outcomes;
}
