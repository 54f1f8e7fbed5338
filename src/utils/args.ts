export interface CliArgs {
  source: string;
  dest: string;
  dryRun: boolean;
}

/** `[source_file] [export_file] [--dry-run]`; dest falls back to source */
export function parseArgs(argv: string[], defaultSource: string): CliArgs {
  const dryRun = argv.includes("--dry-run");
  const [src, dest] = argv.filter((a) => !a.startsWith("--"));
  const source = src || defaultSource;
  return { source, dest: dest || source, dryRun };
}
