import { logger } from '@collage/utils';
import { runCli } from './cli';

process.on('SIGINT', () => {
  logger.info('\nOperation cancelled by user.');
  process.exit(0);
});

process.exitCode = await runCli(process.argv.slice(2), { logger });
