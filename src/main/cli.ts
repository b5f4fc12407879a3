import { stringify } from 'csv-stringify/sync';
import { readFile, writeFile } from 'node:fs/promises';
import yargsParser from 'yargs-parser';
import { z } from 'zod';

import { loadConfig } from './config.js';
import { formatGroupedCsv, formatPerInstanceCsv } from './exportFormats.js';
import { extractTimeline, listProjectSequences } from './extract.js';
import logger, { addFileTransport, setLogLevel } from './logger.js';


export const usage = `Usage: prproj-clips -i <project.prproj> [options]

  -i, --input <path>      project file (gzipped or plain XML)
  -s, --sequence <name>   sequence to extract, by name or id (default: first sequence)
      --list-sequences    print the project's sequences and exit
      --per-instance      one row per distinct instance instead of grouped rows
      --visualization     print the timeline visualization payload as JSON
  -o, --out <path>        write to this file instead of stdout
      --fps <number>      override the sequence frame rate
      --cap <seconds>     ignore everything from this time on
      --config <path>     JSON5 file with extractor settings
      --log-file <path>   also write a debug log to this file
      --debug             verbose logging
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const cliArgsSchema = z.object({
  _: z.union([z.string(), z.number()]).array(),
  input: z.string().optional(),
  sequence: z.string().optional(),
  listSequences: z.boolean().default(false),
  perInstance: z.boolean().default(false),
  visualization: z.boolean().default(false),
  out: z.string().optional(),
  fps: z.number().positive().optional(),
  cap: z.number().nonnegative().optional(),
  config: z.string().optional(),
  logFile: z.string().optional(),
  debug: z.boolean().default(false),
});

export type CliOptions = Omit<z.infer<typeof cliArgsSchema>, '_' | 'input'> & { input: string };

export function parseCliArgs(args: string[]): CliOptions {
  const parsed = cliArgsSchema.safeParse(yargsParser(args, {
    boolean: ['list-sequences', 'per-instance', 'visualization', 'debug'],
    string: ['input', 'sequence', 'out', 'config', 'log-file'],
    number: ['fps', 'cap'],
    alias: { input: 'i', sequence: 's', out: 'o' },
  }));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(issue != null ? `Invalid --${issue.path.join('.')}: ${issue.message}` : 'Invalid arguments');
  }

  const { _: positional, input, ...rest } = parsed.data;
  const [firstPositional] = positional;
  const inputPath = input ?? (firstPositional != null ? String(firstPositional) : undefined);
  if (inputPath == null || inputPath === '') throw new UsageError('No project file given');
  if (rest.perInstance && rest.visualization) throw new UsageError('--per-instance and --visualization cannot be combined');
  return { ...rest, input: inputPath };
}

export interface CliOutput {
  write: (chunk: string) => unknown,
}

async function render(options: CliOptions) {
  const config = await loadConfig(options.config);
  const bytes = await readFile(options.input);

  if (options.listSequences) {
    const sequences = listProjectSequences(bytes, config);
    return stringify([['id', 'name'], ...sequences.map(({ id, name }) => [id, name])]);
  }

  const extraction = extractTimeline(bytes, { sequence: options.sequence, config, fpsOverride: options.fps, capSeconds: options.cap });
  if (extraction.warnings.length > 0) logger.warn(`Extracted with ${extraction.warnings.length} warning(s)`);

  if (options.visualization) return `${JSON.stringify(extraction.visualization, null, 2)}\n`;
  if (options.perInstance) return formatPerInstanceCsv(extraction.perInstanceRows);
  return formatGroupedCsv(extraction.groupedRows);
}

/** Resolves with the process exit code: 2 for bad arguments, 1 when the project could not be extracted */
export async function runCli(args: string[], output: CliOutput = process.stdout) {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    logger.error(err.message);
    output.write(usage);
    return 2;
  }

  if (options.logFile != null) addFileTransport(options.logFile);
  if (options.debug) setLogLevel('debug');

  try {
    const content = await render(options);
    if (options.out != null) {
      await writeFile(options.out, content);
      logger.info('Wrote', options.out);
    } else {
      output.write(content);
    }
    return 0;
  } catch (err) {
    logger.error('Extraction failed:', err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    return 1;
  }
}
