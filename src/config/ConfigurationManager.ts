import { LogLevel } from '../interfaces/Logger';
import { PruneConfig, TimestampFormat, isNamedTimestampFormat } from '../interfaces/PruneConfig';
import { PolicyParseError } from '../retention/errors';
import { Policy } from '../retention/Policy';
import { EnvironmentConfig } from '../types/EnvironmentConfig';
import { TimestampPattern, TimestampPatternError } from '../utils/TimestampPattern';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: EnvironmentConfig = process.env): PruneConfig {
    const config: PruneConfig = {
      logLevel: this.parseLogLevel(env.LOG_LEVEL),
      parseFormat: this.parseTimestampFormat(env.SNAPKEEP_PARSE)
    };

    const policyText = env.SNAPKEEP_POLICY?.trim();
    if (policyText) {
      try {
        config.defaultPolicy = Policy.fromText(policyText);
      } catch (error) {
        if (error instanceof PolicyParseError) {
          throw new ConfigurationError(`SNAPKEEP_POLICY is invalid: ${error.message}`, 'SNAPKEEP_POLICY');
        }
        throw error;
      }
    }

    return config;
  }

  static parseLogLevel(value: string | undefined): LogLevel {
    if (value === undefined || value === '') {
      return LogLevel.INFO;
    }
    const lower = value.toLowerCase();
    const level = Object.values(LogLevel).find(candidate => candidate === lower);
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }

  /**
   * Accepts a named format as is, and anything else as a date-fns pattern
   */
  static parseTimestampFormat(value: string | undefined, field = 'SNAPKEEP_PARSE'): TimestampFormat {
    if (value === undefined || value === '') {
      return 'unix';
    }
    if (isNamedTimestampFormat(value)) {
      return value;
    }
    try {
      return new TimestampPattern(value).pattern;
    } catch (error) {
      if (error instanceof TimestampPatternError) {
        throw new ConfigurationError(`${field} is not a valid timestamp pattern: ${error.message}`, field);
      }
      throw error;
    }
  }

  /**
   * Create a sanitized version of config for logging
   */
  static sanitizeForLogging(config: PruneConfig): Record<string, unknown> {
    return {
      logLevel: config.logLevel,
      parseFormat: config.parseFormat,
      defaultPolicy: config.defaultPolicy?.toText()
    };
  }
}
