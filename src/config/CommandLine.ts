import { parseArgs } from 'node:util';
import { CommandLineOptions } from '../interfaces/PruneConfig';
import { ConfigurationError, ConfigurationManager } from './ConfigurationManager';

export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'argv');
    this.name = 'UsageError';
  }
}

export function usage(program: string): string {
  return `usage: ${program} [options] policy...

options:
  -q, --quiet              do not show warnings about invalid or unmatched input lines
  -e, --extract <regexp>   extract the timestamp from each input line using the provided regexp, which must contain up to one capture group
  -o, --only               only print the part of the line matching the regexp
  -p, --parse <format>     parse the timestamp as unix (seconds, the default), unix-ms, iso (ISO 8601) or using a date-fns pattern (see the examples below)
  -L, --local-time         use the local timezone rather than UTC if no timezone is parsed from the timestamp
  -v, --invert             output the snapshots to keep instead of the ones to prune
  -w, --why                explain why each snapshot is being kept to stderr
  -s, --summarize          summarize retention policy results to stderr
  -h, --help               show this help text

policy: N@unit:X
  - keep the last N snapshots every X units
  - omit the N@ to keep an infinite number of snapshots
  - if :X is omitted, it defaults to :1
  - there may only be one N specified for each unit:X pair
  - if no policy is given, SNAPKEEP_POLICY is used

unit:
  last       snapshot count (X must be 1)
  secondly   clock seconds (can also use the format #h#m#s, omitting any zeroed units)
  daily      calendar days
  monthly    calendar months
  yearly     calendar years

notes:
  - output lines consist of filtered input lines
  - input is read from stdin, and should consist of timestamps (or more if --extract is set)
  - invalid/unmatched input lines are ignored, or passed through if --invert is set (and a warning is printed unless --quiet is set)
  - snapshots are ordered by their UTC time
  - timezones will only affect the exact point at which calendar days/months/years are split

parse patterns (date-fns, see date-fns.org/docs/parse):
  EEE MMM d HH:mm:ss yyyy          Mon Jan 2 15:04:05 2006
  dd MMM yy HH:mm XXX              02 Jan 06 15:04 -07:00
  yyyy-MM-dd'T'HH:mm:ss            2006-01-02T15:04:05
  yyyyMMdd-HHmmss                  20060102-150405
`;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        quiet: { type: 'boolean', short: 'q' },
        extract: { type: 'string', short: 'e' },
        only: { type: 'boolean', short: 'o' },
        parse: { type: 'string', short: 'p' },
        'local-time': { type: 'boolean', short: 'L' },
        invert: { type: 'boolean', short: 'v' },
        why: { type: 'boolean', short: 'w' },
        summarize: { type: 'boolean', short: 's' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse the program arguments (without the node executable and script path)
 */
export function parseCommandLine(argv: string[]): CommandLineOptions {
  const { values, positionals } = readArgs(argv);
  const options: CommandLineOptions = {
    quiet: values.quiet ?? false,
    only: values.only ?? false,
    localTime: values['local-time'] ?? false,
    invert: values.invert ?? false,
    why: values.why ?? false,
    summarize: values.summarize ?? false,
    help: values.help ?? false,
    rules: positionals
  };

  if (values.extract !== undefined) {
    options.extract = values.extract;
  }
  if (values.parse !== undefined) {
    try {
      options.parse = ConfigurationManager.parseTimestampFormat(values.parse, '--parse');
    } catch (error) {
      throw new UsageError(error instanceof Error ? error.message : String(error));
    }
  }

  return options;
}
