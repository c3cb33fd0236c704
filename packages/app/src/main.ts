import * as path from 'node:path';
import { describeError } from '@gramloop/core';
import { bootstrap } from './bootstrap.js';

async function main(): Promise<number> {
  const prompt = process.argv.slice(2).join(' ').trim();
  if (!prompt) {
    console.error('Usage: gramloop <prompt>');
    return 2;
  }

  const configPath = process.env['GRAMLOOP_CONFIG'] ?? path.resolve(process.cwd(), 'config/default.json5');
  const app = bootstrap({ configPath });

  const controller = new AbortController();
  const handleInterrupt = () => controller.abort();
  process.on('SIGINT', handleInterrupt);
  process.on('SIGTERM', handleInterrupt);

  try {
    const result = await app.ask(prompt, controller.signal);
    if (result.error) {
      app.logger.error(`${result.error.name}: ${result.error.message}`);
      return 1;
    }
    console.log(result.finalMessage?.content ?? '');
    return 0;
  } finally {
    process.off('SIGINT', handleInterrupt);
    process.off('SIGTERM', handleInterrupt);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${describeError(err)}`);
    process.exitCode = 1;
  },
);
