#!/usr/bin/env node
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createPipeline } from './notifications/pipeline.js';
import { exitAfterFlush } from './utils/exit.js';

const log = logger.child({ component: 'main' });

// The assistant tool reads a non-zero exit as a hook failure, so every path ends in 0.
const EXIT_OK = 0;

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function parseHookInput(text: string): unknown {
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    log.warn({ err, length: text.length }, 'Hook input is not valid JSON');
    return {};
  }
}

async function main(): Promise<void> {
  // `session-relay <HookName>`; without an argument the kind comes from the input itself.
  const kindLabel = process.argv[2];
  const raw = parseHookInput(await readStdin());

  const pipeline = createPipeline(config);
  try {
    const result = await pipeline.process(kindLabel, raw);
    if (result?.logError) {
      console.error(`session-relay: ${result.logError.message} (${String(result.logError.context?.cause ?? 'unknown cause')})`);
    }
  } finally {
    pipeline.close();
  }
}

process.on('uncaughtException', (err) => {
  log.fatal({ err }, 'Uncaught exception');
  exitAfterFlush(logger, EXIT_OK);
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  exitAfterFlush(logger, EXIT_OK);
});

main()
  .catch((err) => {
    log.fatal({ err }, 'Hook relay failed');
    console.error(`session-relay: ${err instanceof Error ? err.message : String(err)}`);
  })
  .finally(() => {
    process.exitCode = EXIT_OK;
  });
