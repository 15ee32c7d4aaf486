import { Command, InvalidArgumentError } from 'commander';
import { readFileSync, writeFileSync } from 'fs';
import {
  type Events,
  type IndentChar,
  LineError,
  type LogLevel,
  type Version,
  configureLogging,
  createLogger,
  exportEventsJSON,
  isLogLevel,
  isVersion,
  loadLoggingFromEnv,
  parseEvents,
  serializeEvents,
} from '@osbkit/engine';
import { type EventsSource, readEventsSection } from './sectionReader.js';

const CLI_VERSION = '0.1.0';

const log = createLogger('cli');

type GlobalOptions = {
  logLevel?: LogLevel;
  debug?: boolean;
};

interface SourceOptions {
  version?: Version;
}

interface FormatOptions extends SourceOptions {
  toVersion?: Version;
  indent?: IndentChar;
  out?: string;
}

interface JsonOptions extends SourceOptions {
  out?: string;
}

function parseVersionOption(value: string): Version {
  const version = Number(value);
  if (!isVersion(version)) throw new InvalidArgumentError('Expected a format version of 1 or more.');
  return version;
}

function parseLogLevelOption(value: string): LogLevel {
  if (!isLogLevel(value)) throw new InvalidArgumentError('Expected one of none, error, warn, info, debug.');
  return value;
}

function parseIndentOption(value: string): IndentChar {
  if (value === 'space') return ' ';
  if (value === 'underscore') return '_';
  throw new InvalidArgumentError('Expected "space" or "underscore".');
}

interface LoadedEvents {
  source: EventsSource;
  events: Events;
}

/**
 * Read `file` and parse its events. Reports the failure and sets the exit
 * code when it does not parse.
 */
function loadEvents(file: string, options: SourceOptions, program: Command): LoadedEvents | undefined {
  const text = readFileSync(file, 'utf8');
  const source = readEventsSection(text);
  if (options.version !== undefined) {
    if (source.versionFromHeader && options.version !== source.version) {
      log.warn(`${file} declares version ${source.version}; reading it as version ${options.version}`);
    }
    source.version = options.version;
  }
  log.debug(`reading ${file} at version ${source.version}`);

  try {
    return { source, events: parseEvents(source.body, source.version, { file }) };
  } catch (err) {
    if (!(err instanceof LineError)) throw err;
    const line = source.lineOffset + err.lineIndex + 1;
    console.error(`Validation failed for ${file}:`);
    console.error(`  - line ${line}: [${err.code}] ${err.error.message}`);
    if (program.opts<GlobalOptions>().debug) console.error(err.format(source.body));
    process.exitCode = 2;
    return undefined;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('osbkit')
    .description('Parse, check and rewrite the [Events] section of beatmap and storyboard files')
    .version(CLI_VERSION, '-V, --cli-version', 'output the CLI version');

  program
    .option('--log-level <level>', 'Log level: none, error, warn, info, debug', parseLogLevelOption)
    .option('--debug', 'Print the offending source line on errors')
    .hook('preAction', () => {
      loadLoggingFromEnv();
      const level = program.opts<GlobalOptions>().logLevel;
      if (level !== undefined) configureLogging({ level });
    });

  program
    .command('check')
    .description('Parse the events and report the first error; exit 0 if valid')
    .argument('<file>', 'Path to a .osu or .osb file, or a bare events body')
    .option('--version <n>', 'Format version, overriding the file header', parseVersionOption)
    .action((file: string, options: SourceOptions) => {
      const loaded = loadEvents(file, options, program);
      if (!loaded) return;
      console.log(`OK: ${file} parsed (${loaded.events.length} events, version ${loaded.source.version})`);
      process.exitCode = 0;
    });

  program
    .command('format')
    .description('Write the events back out, optionally at another format version')
    .argument('<file>', 'Path to a .osu or .osb file, or a bare events body')
    .option('--version <n>', 'Format version, overriding the file header', parseVersionOption)
    .option('--to-version <n>', 'Format version to write at (defaults to the input version)', parseVersionOption)
    .option('--indent <style>', 'Command indentation: space or underscore', parseIndentOption)
    .option('-o, --out <path>', 'Write to a file instead of stdout')
    .action((file: string, options: FormatOptions) => {
      const loaded = loadEvents(file, options, program);
      if (!loaded) return;
      const target = options.toVersion ?? loaded.source.version;
      const text = serializeEvents(loaded.events, target, { indent: options.indent });
      if (text === undefined) {
        console.error(`Cannot write ${file} at version ${target}: an event there has no textual form`);
        process.exitCode = 2;
        return;
      }
      if (options.out) {
        writeFileSync(options.out, `${text}\n`, 'utf8');
        console.log(`[OK] Wrote ${options.out}`);
      } else {
        console.log(text);
      }
      process.exitCode = 0;
    });

  program
    .command('json')
    .description('Export the parsed events as JSON')
    .argument('<file>', 'Path to a .osu or .osb file, or a bare events body')
    .option('--version <n>', 'Format version, overriding the file header', parseVersionOption)
    .option('-o, --out <path>', 'Write to a file instead of stdout')
    .action((file: string, options: JsonOptions) => {
      const loaded = loadEvents(file, options, program);
      if (!loaded) return;
      const text = exportEventsJSON(loaded.events, loaded.source.version, { outPath: options.out });
      if (options.out) console.log(`[OK] Exported JSON file: ${options.out}`);
      else console.log(text);
      process.exitCode = 0;
    });

  return program;
}

/** Run the CLI over `argv` as given by `process.argv`. */
export async function run(argv: readonly string[]): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
