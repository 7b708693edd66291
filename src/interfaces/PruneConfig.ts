import { Policy } from '../retention/Policy';
import { LogLevel } from './Logger';

export type NamedTimestampFormat = 'unix' | 'unix-ms' | 'iso';

export const NAMED_TIMESTAMP_FORMATS: readonly NamedTimestampFormat[] = ['unix', 'unix-ms', 'iso'];

/**
 * One of the named formats, or else a date-fns pattern such as
 * "EEE MMM dd HH:mm:ss yyyy"
 */
export type TimestampFormat = string;

export function isNamedTimestampFormat(format: TimestampFormat): format is NamedTimestampFormat {
  return NAMED_TIMESTAMP_FORMATS.some(named => named === format);
}

/**
 * Settings read from the environment
 */
export interface PruneConfig {
  logLevel: LogLevel;
  /** Policy used when none is given on the command line */
  defaultPolicy?: Policy;
  parseFormat: TimestampFormat;
}

/**
 * Options given on the command line
 */
export interface CommandLineOptions {
  quiet: boolean;
  extract?: string;
  only: boolean;
  parse?: TimestampFormat;
  localTime: boolean;
  invert: boolean;
  why: boolean;
  summarize: boolean;
  help: boolean;
  rules: string[];
}
