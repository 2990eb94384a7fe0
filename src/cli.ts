#!/usr/bin/env node

/**
 * bytefifo CLI entry point.
 */

import {
  isBrokenPipe,
  parseArgs,
  run,
  streamSink,
  usage,
  VERSION,
  type CliOptions,
} from "./command.js";

function die(msg: string): never {
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
}

// Reader went away (e.g. `bytefifo | head`): stop quietly
process.stdout.on("error", (err: Error) => {
  if (isBrokenPipe(err)) process.exit(0);
  die(err.message);
});

async function main(): Promise<void> {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    die(err instanceof Error ? err.message : String(err));
  }

  if (opts.help) {
    process.stdout.write(usage() + "\n");
    return;
  }

  if (opts.version) {
    process.stdout.write(`bytefifo v${VERSION}\n`);
    return;
  }

  await run(opts, {
    stdin: process.stdin,
    stdout: streamSink(process.stdout),
    stderr: (text) => {
      process.stderr.write(text);
    },
  });
}

main().catch((err: Error) => {
  if (isBrokenPipe(err)) process.exit(0);
  process.stderr.write(`Error: ${err.message}\n`);
  process.exit(1);
});
