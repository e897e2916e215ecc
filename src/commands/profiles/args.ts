export type ProfileDedupeArgs = {
  prefix?: string;
};

export function parseProfileDedupeArgs(argv: string[]): ProfileDedupeArgs {
  const args: ProfileDedupeArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];

    if (token === "--prefix" && argv[i + 1]) {
      args.prefix = argv[i + 1];
      i += 1;
      continue;
    }
    if (token.startsWith("--prefix=")) {
      args.prefix = token.slice("--prefix=".length);
      continue;
    }
    if (!token.startsWith("--") && args.prefix === undefined) {
      args.prefix = token;
    }
  }

  return args;
}

export function validateProfileDedupeArgs(args: ProfileDedupeArgs): Required<ProfileDedupeArgs> {
  const prefix = args.prefix?.trim();
  if (!prefix) {
    throw new Error("--prefix is required");
  }

  return { prefix };
}
