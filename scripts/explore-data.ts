import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { loadConfig } from '../src/config';
import { DatasetStore } from '../src/data';
import { exploreStore } from '../src/explorer';
import { handleError, logger } from '../src/utils';

async function main() {
  const config = loadConfig();
  // Keep the log channel quiet so it does not interleave with the menu
  logger.setLevel('warn');

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    console.log('\n\nInterrupted by user. Goodbye!');
    rl.close();
  });

  try {
    await exploreStore(new DatasetStore(config.storage.outputDir), {
      prompt: { ask: (question) => rl.question(question) },
      write: (text) => console.log(text),
    });
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  logger.error('Explorer', 'Explorer stopped', handleError(error).toJSON());
  process.exitCode = 1;
});
