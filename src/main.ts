#!/usr/bin/env node
import { parseCliOverrides } from './cli';
import { loadConfig } from './config';
import { confirmIncludeUnselected } from './confirmDialog';
import { DirectoryTree } from './directoryTree';
import { ConfigurationError, errorMessage } from './errors';
import { FileExport } from './fileExport';
import { logError, logInfo, logSuccess, logWarning } from './log';
import { PathFilter } from './pathFilter';
import { TreeUI } from './treeUI';

async function main(): Promise<void> {
  const overrides = parseCliOverrides(process.argv);
  if (overrides.help) return;

  const config = loadConfig(process.env, overrides);
  const filter = new PathFilter(config);

  const tree = new DirectoryTree(config, filter);
  tree.initialize();

  for (;;) {
    const intent = await new TreeUI(tree, config).run();
    if (intent === 'quit') break;

    const includeUnselected = await confirmIncludeUnselected();
    if (includeUnselected === null) continue;

    const fileExport = new FileExport(config, filter, tree);
    const result = fileExport.generate(includeUnselected);

    if (!result.ok) {
      // back to the browser with the selection intact
      logError(`Could not write ${config.outputFile}: ${result.error}`);
      continue;
    }

    [...tree.warnings, ...fileExport.warnings].forEach(logWarning);
    logSuccess(`${config.outputFile} written to ${result.outputPath}`);
    return;
  }

  tree.warnings.forEach(logWarning);
  logInfo('Nothing exported.');
}

main().catch((error: unknown) => {
  logError(errorMessage(error));
  process.exit(error instanceof ConfigurationError ? 2 : 1);
});
