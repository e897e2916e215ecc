import { isStandardUserIdentity } from "./identity";
import type { DuplicateGroup, ProfileEntry } from "./types";

// U+FFFD means the path was decoded lossily; two different directories may share the result.
const REPLACEMENT_CHARACTER = "\uFFFD";

function groupKey(imagePath: string): string {
  return imagePath.toLowerCase();
}

export function groupDuplicateProfiles(entries: ProfileEntry[]): DuplicateGroup[] {
  const byPath = new Map<string, DuplicateGroup>();

  for (const entry of entries) {
    if (!isStandardUserIdentity(entry.identity)) continue;
    if (!entry.imagePath || entry.imagePath.includes(REPLACEMENT_CHARACTER)) continue;

    const key = groupKey(entry.imagePath);
    const group = byPath.get(key);
    if (group) {
      group.entries.push(entry);
    } else {
      byPath.set(key, { imagePath: entry.imagePath, entries: [entry] });
    }
  }

  return [...byPath.values()].filter((group) => group.entries.length >= 2);
}
