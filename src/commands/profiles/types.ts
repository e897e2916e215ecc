export type ProfileEntry = {
  identity: string;
  imagePath: string;
  correlationId?: string;
  location: string;
};

export type DuplicateGroup = {
  imagePath: string;
  entries: ProfileEntry[];
};

export type DeletionOutcome =
  | { kind: "removed"; entry: ProfileEntry; secondaryRemoved: boolean }
  | { kind: "failed"; entry: ProfileEntry; cause: Error };
