export type CliOptions = {
  mode: "range" | "recurrence" | "all";
  seed?: number;
  svgPath?: string;
  debug: boolean;
};

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { mode: "all", debug: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--debug") {
      opts.debug = true;
    } else if (arg === "--seed") {
      const seed = Number(argv[++i]);
      if (!Number.isInteger(seed)) throw new Error("--seed expects an integer");
      opts.seed = seed;
    } else if (arg === "--svg") {
      const path = argv[++i];
      if (!path) throw new Error("--svg expects a file path");
      opts.svgPath = path;
    } else if (arg === "range" || arg === "recurrence" || arg === "all") {
      opts.mode = arg;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return opts;
}
