import { ConfigurationError, ConfigurationManager } from '../src/config/ConfigurationManager';
import { LogLevel } from '../src/interfaces/Logger';

describe('ConfigurationManager', () => {
  describe('loadConfiguration', () => {
    it('should use defaults for an empty environment', () => {
      const config = ConfigurationManager.loadConfiguration({});

      expect(config).toEqual({
        logLevel: LogLevel.INFO,
        parseFormat: 'unix',
      });
    });

    it('should load all settings', () => {
      const config = ConfigurationManager.loadConfiguration({
        LOG_LEVEL: 'Debug',
        SNAPKEEP_POLICY: ' yearly 1@last   7@daily ',
        SNAPKEEP_PARSE: 'iso',
      });

      expect(config.logLevel).toBe(LogLevel.DEBUG);
      expect(config.parseFormat).toBe('iso');
      expect(config.defaultPolicy?.toText()).toBe('1@last 7@daily yearly');
    });

    it('should ignore an empty policy', () => {
      const config = ConfigurationManager.loadConfiguration({ SNAPKEEP_POLICY: '   ' });

      expect(config.defaultPolicy).toBeUndefined();
    });

    it('should read process.env by default', () => {
      const originalEnv = process.env;
      process.env = { ...originalEnv, SNAPKEEP_PARSE: 'unix-ms' };
      try {
        expect(ConfigurationManager.loadConfiguration().parseFormat).toBe('unix-ms');
      } finally {
        process.env = originalEnv;
      }
    });

    describe('validation', () => {
      it('should reject an unknown log level', () => {
        expect(() => ConfigurationManager.loadConfiguration({ LOG_LEVEL: 'verbose' })).toThrow(
          new ConfigurationError('LOG_LEVEL must be one of: error, warn, info, debug', 'LOG_LEVEL')
        );
      });

      it('should accept a date-fns pattern as the timestamp format', () => {
        expect(ConfigurationManager.loadConfiguration({ SNAPKEEP_PARSE: 'EEE MMM d HH:mm:ss yyyy' }).parseFormat).toBe(
          'EEE MMM d HH:mm:ss yyyy'
        );
      });

      it('should reject an invalid timestamp pattern', () => {
        const load = () => ConfigurationManager.loadConfiguration({ SNAPKEEP_PARSE: 'yyyy-MM-dd jj' });

        expect(load).toThrow(ConfigurationError);
        expect(load).toThrow('SNAPKEEP_PARSE is not a valid timestamp pattern: ');
      });

      it('should reject an invalid policy naming the variable', () => {
        let caught: unknown;
        try {
          ConfigurationManager.loadConfiguration({ SNAPKEEP_POLICY: 'daily daily' });
        } catch (error) {
          caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught).toMatchObject({
          field: 'SNAPKEEP_POLICY',
          message: 'SNAPKEEP_POLICY is invalid: rule "daily": duplicate daily:1',
        });
      });
    });
  });

  describe('sanitizeForLogging', () => {
    it('should render the policy as text', () => {
      const config = ConfigurationManager.loadConfiguration({ SNAPKEEP_POLICY: '3@monthly' });

      expect(ConfigurationManager.sanitizeForLogging(config)).toEqual({
        logLevel: 'info',
        parseFormat: 'unix',
        defaultPolicy: '3@monthly',
      });
    });
  });
});
