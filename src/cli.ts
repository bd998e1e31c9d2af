import cac from 'cac';
import type { CAC } from 'cac';

export interface CliOverrides {
  rootDir?: string;
  outputFile?: string;
  excludes?: string[];
  includeHidden?: boolean;
  maxBytes?: string;
  embedBinary?: boolean;
  help?: boolean;
}

export function createCli(): CAC {
  const cli = cac('filetree-export');

  cli
    .usage('[root] [options]')
    .option('--output <file>', 'Document name, written inside the root directory')
    .option('--exclude <pattern>', 'Extra exclude glob, may be repeated')
    .option('--include-hidden', 'List entries whose name starts with a dot')
    .option('--exclude-hidden', 'Skip entries whose name starts with a dot')
    .option('--max-bytes <n>', 'Maximum bytes embedded per file')
    .option('--read-binary', 'Embed files that look binary');
  cli.help();

  return cli;
}

function asStringList(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  const values = Array.isArray(value) ? value : [value];
  return values.map((item) => String(item));
}

/**
 * Reads the command line into overrides for the environment configuration.
 * Flags that are absent stay undefined so the environment keeps its say.
 */
export function parseCliOverrides(argv: string[], cli: CAC = createCli()): CliOverrides {
  const parsed = cli.parse(argv, { run: false });
  const options: Record<string, unknown> = parsed.options;
  const overrides: CliOverrides = {};

  if (parsed.args.length > 0) overrides.rootDir = String(parsed.args[0]);
  if (options.output !== undefined) overrides.outputFile = String(options.output);

  const excludes = asStringList(options.exclude);
  if (excludes) overrides.excludes = excludes;

  if (options.includeHidden === true) overrides.includeHidden = true;
  if (options.excludeHidden === true) overrides.includeHidden = false;

  // mri turns numeric values into numbers; validation happens in loadConfig
  if (options.maxBytes !== undefined) overrides.maxBytes = String(options.maxBytes);
  if (options.readBinary === true) overrides.embedBinary = true;
  if (options.help === true) overrides.help = true;

  return overrides;
}
