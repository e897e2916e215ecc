// Domain user and group SIDs: S-1-5-21 followed by the domain sub-authorities and the RID.
const STANDARD_USER_IDENTITY = /^S-1-5-21(-\d+)+$/i;

export type IdentityMatcher = {
  prefix: string;
  matches: (identity: string) => boolean;
};

export function isStandardUserIdentity(identity: string): boolean {
  return STANDARD_USER_IDENTITY.test(identity);
}

export function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles the retention policy for a desired identity prefix. An identity is protected
 * when it is the prefix followed by one or more `-<digits>` segments; the bare prefix is not.
 */
export function compilePrefixMatcher(desiredPrefix: string): IdentityMatcher {
  const prefix = desiredPrefix.trim();
  if (prefix.length === 0) {
    throw new Error("desired identity prefix is required");
  }

  const pattern = new RegExp(`^${escapeRegExp(prefix)}(-\\d+)+$`, "i");
  return {
    prefix,
    matches: (identity) => pattern.test(identity),
  };
}
