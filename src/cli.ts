#!/usr/bin/env node
import { ConfigurationError, ConfigurationManager } from './config/ConfigurationManager';
import { UsageError, parseCommandLine, usage } from './config/CommandLine';
import { Logger } from './clients/Logger';
import { InputError, SnapshotScanner, compileExtract } from './clients/SnapshotScanner';
import { Logger as ILogger } from './interfaces/Logger';
import { CommandLineOptions, PruneConfig } from './interfaces/PruneConfig';
import { ScannedLine } from './interfaces/SnapshotScanner';
import { PolicyParseError } from './retention/errors';
import { Policy, parsePolicy } from './retention/Policy';
import { prune } from './retention/prune';
import { Timestamp, formatTimestamp } from './retention/time';
import { EnvironmentConfig } from './types/EnvironmentConfig';

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 2;

export interface ApplicationStreams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  env: EnvironmentConfig;
}

/**
 * Command-line application: reads snapshot lines, prunes them against the
 * policy and writes the lines to discard (or keep, when inverted)
 */
class SnapshotPruneApplication {
  private logger: ILogger;
  private readonly injectedLogger: boolean;

  constructor(
    private readonly streams: ApplicationStreams,
    logger?: ILogger,
    private readonly program: string = 'snapkeep'
  ) {
    this.injectedLogger = logger !== undefined;
    this.logger = logger ?? new Logger();
  }

  /**
   * Run once over the whole input, returning the exit code
   */
  async run(argv: string[]): Promise<number> {
    try {
      const config = ConfigurationManager.loadConfiguration(this.streams.env);
      if (!this.injectedLogger) {
        this.logger = new Logger(config.logLevel, this.program);
      }
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const options = parseCommandLine(argv);
      if (options.help) {
        this.streams.stdout.write(usage(this.program));
        return EXIT_SUCCESS;
      }

      const policy = this.resolvePolicy(options, config);
      if (!policy) {
        this.streams.stdout.write(usage(this.program));
        return EXIT_USAGE;
      }

      const scanner = new SnapshotScanner(
        {
          ...(options.extract !== undefined && { extract: compileExtract(options.extract) }),
          only: options.only,
          format: options.parse ?? config.parseFormat,
          localTime: options.localTime,
          quiet: options.quiet
        },
        this.logger
      );
      const lines = await scanner.scan(this.streams.stdin);

      this.pruneLines(lines, policy, options);
      return EXIT_SUCCESS;
    } catch (error) {
      return this.fail(error);
    }
  }

  private resolvePolicy(options: CommandLineOptions, config: PruneConfig): Policy | undefined {
    if (options.rules.length > 0) {
      return parsePolicy(...options.rules);
    }
    return config.defaultPolicy;
  }

  private pruneLines(lines: ScannedLine[], policy: Policy, options: CommandLineOptions): void {
    const snapshots: Timestamp[] = [];
    const snapshotLines: number[] = [];
    lines.forEach((line, i) => {
      if (line.timestamp) {
        snapshots.push(line.timestamp);
        snapshotLines.push(i);
      }
    });

    const { keep, need } = prune(snapshots, policy);

    const discard = new Array<boolean>(lines.length).fill(false);
    keep.forEach((reasons, at) => {
      discard[snapshotLines[at]] = reasons.length === 0;
    });
    lines.forEach((line, i) => {
      if (discard[i] !== options.invert) {
        this.streams.stdout.write(`${line.line}\n`);
      }
    });

    let pruned = 0;
    keep.forEach((reasons, at) => {
      if (reasons.length === 0) {
        pruned++;
      } else if (options.why) {
        this.logger.logRetentionReason(
          at + 1,
          keep.length,
          formatTimestamp(snapshots[at]),
          reasons.map(period => period.toString())
        );
      }
    });

    if (options.summarize) {
      let widest = 0;
      policy.each((_, count) => {
        widest = Math.max(widest, count);
      });
      const width = String(widest).length;
      policy.each((period, count) => {
        this.logger.logPolicySummary(period.toString(), count, need.get(period), width);
      });
      this.logger.logPruneComplete(pruned, keep.length);
    }
  }

  private fail(error: unknown): number {
    if (error instanceof PolicyParseError) {
      this.logger.error(`invalid policy: ${error.message}`, error, { tag: 'fatal' });
    } else if (error instanceof UsageError) {
      this.logger.error(`${error.message} (see --help)`, error, { tag: 'fatal' });
    } else if (error instanceof ConfigurationError || error instanceof InputError) {
      this.logger.error(error.message, error, { tag: 'fatal' });
    } else {
      throw error;
    }
    return EXIT_USAGE;
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new SnapshotPruneApplication({
    stdin: process.stdin,
    stdout: process.stdout,
    env: process.env
  });
  process.exitCode = await app.run(process.argv.slice(2));
}

// Export for testing
export { SnapshotPruneApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running snapkeep:', error);
    process.exitCode = 1;
  });
}
