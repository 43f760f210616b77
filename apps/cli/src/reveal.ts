/**
 * Show a written file in the system file manager
 *
 * Finder selects the file itself; Explorer opens its folder. Other
 * platforms are not supported.
 */

import { spawn } from 'node:child_process';
import * as path from 'node:path';
import type { Logger } from '@collage/utils';

export interface RevealCommand {
  command: string;
  args: string[];
}

export function revealCommand(
  filePath: string,
  platform: NodeJS.Platform = process.platform
): RevealCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: ['-R', filePath] };
    case 'win32':
      return { command: 'explorer', args: [path.dirname(filePath)] };
    default:
      return null;
  }
}

/**
 * Launch the file manager without waiting for it
 *
 * @returns false when the platform has no supported file manager
 */
export function revealInFileManager(
  filePath: string,
  logger: Logger,
  platform: NodeJS.Platform = process.platform
): boolean {
  const reveal = revealCommand(filePath, platform);
  if (!reveal) {
    logger.warn('Revealing the output is only supported on macOS and Windows');
    return false;
  }

  const child = spawn(reveal.command, reveal.args, { detached: true, stdio: 'ignore' });
  child.on('error', (error) => {
    logger.warn(`Could not open the file manager: ${error.message}`);
  });
  child.unref();
  return true;
}
