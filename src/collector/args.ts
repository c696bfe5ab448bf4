export type RunOptions = {
  direction: "new" | "more";
  repeat: number;
  dryRun: boolean;
  page: number;
};

export const parseArgs = (argv: string[]): RunOptions => {
  const args = new Map<string, string>();
  for (const arg of argv) {
    if (arg === "--dry-run") {
      args.set("dry-run", "true");
      continue;
    }
    const match = arg.match(/^--(direction|repeat|page)=(.*)$/);
    if (match) {
      args.set(match[1], match[2]);
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  const direction = args.get("direction") ?? "new";
  if (direction !== "new" && direction !== "more") {
    throw new Error(`--direction must be "new" or "more", got "${direction}"`);
  }
  const repeat = Number(args.get("repeat") ?? 1);
  const page = Number(args.get("page") ?? 1);
  if (!Number.isInteger(repeat) || repeat < 1) {
    throw new Error(`--repeat must be a positive integer, got "${args.get("repeat")}"`);
  }
  if (!Number.isInteger(page) || page < 1) {
    throw new Error(`--page must be a positive integer, got "${args.get("page")}"`);
  }

  return { direction, repeat, dryRun: args.get("dry-run") === "true", page };
};
