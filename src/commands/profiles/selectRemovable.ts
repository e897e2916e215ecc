import { compilePrefixMatcher, type IdentityMatcher } from "./identity";
import type { DuplicateGroup, ProfileEntry } from "./types";

export function selectRemovableProfiles(groups: DuplicateGroup[], desired: IdentityMatcher | string): ProfileEntry[] {
  const matcher = typeof desired === "string" ? compilePrefixMatcher(desired) : desired;
  return groups.flatMap((group) => group.entries.filter((entry) => !matcher.matches(entry.identity)));
}
