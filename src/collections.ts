#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import type { ConfigOverrides } from './config.js';
import { runCollectionPipeline } from './pipeline/collections.js';

interface CliArgs extends ConfigOverrides {
  htmlFile?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--postcode' && argv[i + 1]) {
      args.postcode = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === '--address' && argv[i + 1]) {
      args.addressLine = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === '--html-file' && argv[i + 1]) {
      args.htmlFile = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === '--debug') {
      args.debug = true;
    }
  }
  return args;
}

async function main(): Promise<void> {
  const { htmlFile, ...overrides } = parseArgs(process.argv.slice(2));
  const config = loadConfig(process.env, overrides);
  await runCollectionPipeline(config, { htmlFile });
}

main().catch((error) => {
  console.error(`Collections run failed: ${String(error)}`);
  process.exitCode = 1;
});
