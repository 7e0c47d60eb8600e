#!/usr/bin/env node
import { runUpdate } from './pipeline/update.js';
import { enableVerbose, logger } from './utils/logger.js';

const USAGE = `Usage: tahoe-conditions <command> [options]

Commands:
  update          Fetch every enabled resort and rewrite the JSON outputs

Options:
  -v, --verbose   Debug logging
  -h, --help      Show this help`;

interface CliArgs {
  command: string | null;
  verbose: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: null, verbose: false, help: false };
  for (const arg of argv) {
    if (arg === '-v' || arg === '--verbose') args.verbose = true;
    else if (arg === '-h' || arg === '--help') args.help = true;
    else if (!arg.startsWith('-') && args.command === null) args.command = arg;
    else throw new Error(`Unknown argument: ${arg}`);
  }
  return args;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.command !== 'update') {
    if (args.command) console.error(`Unknown command: ${args.command}\n`);
    console.error(USAGE);
    return 1;
  }

  if (args.verbose) enableVerbose();

  const { summary } = await runUpdate();
  const { open_resorts, closed_resorts, stale_resorts } = summary.counts;
  logger.info(`Update complete: ${open_resorts} open, ${closed_resorts} closed, ${stale_resorts} stale`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal(err, 'Update failed');
    process.exit(1);
  });
