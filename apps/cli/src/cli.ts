/**
 * Collage command line
 *
 * `runCli` never throws and never exits the process; it reports through
 * the logger and resolves to the exit code.
 */

import { parseArgs } from 'node:util';
import {
  CollageService,
  ConfigError,
  SUPPORTED_EXTENSIONS,
  WriteError,
  describeError,
  isCollageError,
  type CollageOptions,
  type ImageBackend,
} from '@collage/core';
import { formatDurationMs, formatSize, logger as defaultLogger, type Logger } from '@collage/utils';
import { revealInFileManager } from './reveal';

export const SUPPORTED_FORMATS_LABEL = SUPPORTED_EXTENSIONS.map((ext) => ext.toUpperCase()).join(', ');

export const HELP_TEXT = `Usage: collage [options]

Create an image collage from your images.

Options:
  -c, --columns <n>       Number of columns in the collage (default: 5)
  -i, --input-dir <dir>   Input directory containing images (default: current directory)
  -o, --output <file>     Output filename; the extension selects the format (default: collage_output.jpg)
  -w, --width <px>        Target width for each image (default: 350)
  -t, --height <px>       Target height for each image (default: 600)
  -p, --padding <px>      Padding between images (default: 10)
  -b, --background <color>
                          Background color: a name, #RRGGBB or rgb(r, g, b) (default: white)
  -q, --quality <1-100>   Quality for JPEG, WebP and TIFF output (default: 95)
      --reveal            Show the collage in Finder or Explorer when done
  -h, --help              Show this help

Examples:
  collage
  collage --columns 3
  collage -c 3 -i my_images -o collages/my_collage.jpg -w 400 -t 600 -p 15 -b black

Supported image formats: ${SUPPORTED_FORMATS_LABEL}`;

export interface CliArgs {
  /** Only the options given on the command line */
  options: Partial<CollageOptions>;
  reveal: boolean;
  help: boolean;
}

const INTEGER_FLAGS = {
  columns: 'Number of columns',
  width: 'Width',
  height: 'Height',
  padding: 'Padding',
  quality: 'Quality',
} as const;

type IntegerFlag = keyof typeof INTEGER_FLAGS;

function parseInteger(value: string, flag: IntegerFlag, problems: string[]): number | undefined {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    problems.push(`${INTEGER_FLAGS[flag]} must be a whole number (got ${value})`);
    return undefined;
  }
  return Number(value);
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        columns: { type: 'string', short: 'c' },
        'input-dir': { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        width: { type: 'string', short: 'w' },
        height: { type: 'string', short: 't' },
        padding: { type: 'string', short: 'p' },
        background: { type: 'string', short: 'b' },
        quality: { type: 'string', short: 'q' },
        reveal: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw ConfigError.invalid(describeError(error));
  }
}

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws ConfigError on unknown flags, positionals or non-integer numbers
 *
 * @example
 * ```typescript
 * parseCliArgs(['-c', '3', '--background', 'black']);
 * // { options: { columns: 3, background: 'black' }, reveal: false, help: false }
 * ```
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);
  const problems: string[] = [];
  const integer = (flag: IntegerFlag): number | undefined => {
    const raw = values[flag];
    return raw === undefined ? undefined : parseInteger(raw, flag, problems);
  };

  const candidates: Partial<CollageOptions> = {
    inputDir: values['input-dir'],
    output: values.output,
    columns: integer('columns'),
    cellWidth: integer('width'),
    cellHeight: integer('height'),
    padding: integer('padding'),
    background: values.background,
    quality: integer('quality'),
  };
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const options: Partial<CollageOptions> = {};
  for (const [key, value] of Object.entries(candidates)) {
    if (value !== undefined) {
      Object.assign(options, { [key]: value });
    }
  }

  return { options, reveal: values.reveal ?? false, help: values.help ?? false };
}

export interface CliDependencies {
  /** Imaging backend; defaults to sharp */
  backend?: ImageBackend;
  logger?: Logger;
  /** Opens the written file in the file manager */
  reveal?: (filePath: string, logger: Logger) => void;
}

function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      logger.error(`Error: ${problem}`);
    }
    logger.error('Run with --help to see the available options.');
  } else if (error instanceof WriteError) {
    logger.error(error.message);
    logger.error('Please make sure you have write permissions in the output directory.');
  } else if (isCollageError(error)) {
    logger.error(`Error: ${error.message}`);
  } else {
    logger.error(`An unexpected error occurred: ${describeError(error)}`);
    logger.error('If this issue persists, please report it with the error message above.');
  }
  return 1;
}

/**
 * Run the collage command
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code: 0 on success, empty input or help, 1 on error
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const logger = deps.logger ?? defaultLogger;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    return reportFailure(error, logger);
  }

  if (args.help) {
    logger.info(HELP_TEXT);
    return 0;
  }

  const service = new CollageService({ backend: deps.backend, logger });
  try {
    const result = await service.create(args.options);
    if (result.status === 'empty') {
      logger.info(`Supported formats: ${SUPPORTED_FORMATS_LABEL}`);
      return 0;
    }

    const { output } = result;
    logger.info(
      `Collage successfully saved as: ${output.path} ` +
        `(${formatSize(output.bytes)}, ${formatDurationMs(result.durationMs)})`
    );
    if (result.skipped.length > 0) {
      logger.warn(`Skipped ${result.skipped.length} of ${result.total} images`);
    }
    if (args.reveal) {
      (deps.reveal ?? revealInFileManager)(output.path, logger);
    }
    return 0;
  } catch (error) {
    return reportFailure(error, logger);
  }
}
