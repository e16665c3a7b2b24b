#!/usr/bin/env node
import { log, setLogLevel } from '@workspace/logger';
import { cliInputSchema, parseArgs, runArgsSchema, toConfigInput } from './cli/args.js';
import { loadSpider } from './cli/load-spider.js';

function printHelp(): void {
  console.log(`hookspider CLI

Usage:
  npm run crawl -- help
  npm run crawl -- run ./spiders/books.ts
  npm run crawl -- run ./spiders/books.ts --workers=4 --downloadDelay=500
  npm run crawl -- run ./spiders/books.ts --retryTimes=2 --retryDelay=1000 --timeout=10000
  npm run crawl -- run ./spiders/books.ts --logLevel=debug

Commands:
  help    Show this help message
  run     Load a module whose default export is a Spider (instance or class) and run it

Run options:
  --workers        Concurrent workers (default: 2 x available CPUs).
  --downloadDelay  Pause in ms each worker takes before a fetch (default: 0).
  --retryTimes     Retries per task after the first attempt (default: 3).
  --retryDelay     Pause in ms before a retry (default: 3000).
  --timeout        Fetch timeout in ms (default: 30000).
  --logLevel       One of: fatal, error, warn, info, debug, trace, silent.
`);
}

async function main(): Promise<number> {
  const { command, positionals, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, positionals, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const parsedRunArgs = runArgsSchema.safeParse({
    ...parsedCliInput.data.options,
    module: parsedCliInput.data.positionals[0],
  });
  if (!parsedRunArgs.success) {
    console.error(parsedRunArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  if (parsedRunArgs.data.logLevel) {
    setLogLevel(parsedRunArgs.data.logLevel);
  }

  try {
    const spider = await loadSpider(parsedRunArgs.data.module);
    await spider.start({ config: toConfigInput(parsedRunArgs.data) });
    return 0;
  } catch (error) {
    log.error('Spider run failed', error instanceof Error ? error : { error: String(error) });
    return 1;
  }
}

const exitCode = await main();
process.exitCode = exitCode;
