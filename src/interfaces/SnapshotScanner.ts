import { Timestamp } from '../retention/time';
import { TimestampFormat } from './PruneConfig';

/**
 * A non-empty input line and the snapshot time read from it
 */
export interface ScannedLine {
  /** 1-based line number in the input */
  lineNumber: number;

  /** Text to output for this snapshot (the matched part with --only) */
  line: string;

  /** Null if the timestamp could not be extracted or parsed */
  timestamp: Timestamp | null;
}

export interface SnapshotScannerOptions {
  /** Regexp with up to one capture group locating the timestamp */
  extract?: RegExp;
  only: boolean;
  /** Named format or date-fns pattern */
  format: TimestampFormat;
  localTime: boolean;
  quiet: boolean;
}

/**
 * Interface for reading snapshot times from line-oriented input
 */
export interface SnapshotScanner {
  /**
   * Read every line of the input until it ends
   * @param input stream of newline-separated snapshot lines
   */
  scan(input: NodeJS.ReadableStream): Promise<ScannedLine[]>;

  /**
   * Read one line; returns null for an empty line
   */
  scanLine(text: string, lineNumber: number): ScannedLine | null;

  /**
   * Parse a timestamp string in the configured format
   */
  parseTimestamp(text: string): Timestamp | null;
}
