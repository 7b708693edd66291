import { Readable } from 'stream';
import { InputError, SnapshotScanner, compileExtract } from '../src/clients/SnapshotScanner';
import { Logger } from '../src/interfaces/Logger';
import { SnapshotScannerOptions } from '../src/interfaces/SnapshotScanner';

describe('SnapshotScanner', () => {
  let mockLogger: jest.Mocked<Logger>;

  const defaults: SnapshotScannerOptions = {
    only: false,
    format: 'unix',
    localTime: false,
    quiet: false,
  };

  const scanner = (options: Partial<SnapshotScannerOptions> = {}) =>
    new SnapshotScanner({ ...defaults, ...options }, mockLogger);

  beforeEach(() => {
    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
      logConfigurationStart: jest.fn(),
      logSkippedLine: jest.fn(),
      logRetentionReason: jest.fn(),
      logPolicySummary: jest.fn(),
      logPruneComplete: jest.fn(),
    };
  });

  describe('scanLine', () => {
    it('should parse unix timestamps', () => {
      expect(scanner().scanLine('1700000000', 1)).toEqual({
        lineNumber: 1,
        line: '1700000000',
        timestamp: { instant: new Date(1700000000000), offset: 0 },
      });
    });

    it('should trim whitespace but output the original line', () => {
      const scanned = scanner().scanLine('  1700000000\t', 2);

      expect(scanned?.line).toBe('  1700000000\t');
      expect(scanned?.timestamp?.instant).toEqual(new Date(1700000000000));
    });

    it('should skip empty lines', () => {
      expect(scanner().scanLine('', 3)).toBeNull();
    });

    it('should keep unparseable lines and warn', () => {
      expect(scanner().scanLine('yesterday', 4)).toEqual({ lineNumber: 4, line: 'yesterday', timestamp: null });
      expect(mockLogger.logSkippedLine).toHaveBeenCalledWith(4, 'failed to parse unix timestamp "yesterday"');
    });

    it('should not warn when quiet', () => {
      scanner({ quiet: true }).scanLine('yesterday', 4);

      expect(mockLogger.logSkippedLine).not.toHaveBeenCalled();
    });

    it('should extract the timestamp with a capture group', () => {
      const scanned = scanner({ extract: /backup-(\d+)\.tar/ }).scanLine('x backup-1700000000.tar y', 1);

      expect(scanned?.line).toBe('x backup-1700000000.tar y');
      expect(scanned?.timestamp?.instant).toEqual(new Date(1700000000000));
    });

    it('should extract the whole match without a capture group', () => {
      const scanned = scanner({ extract: /\d{10}/ }).scanLine('snap@1700000000', 1);

      expect(scanned?.timestamp?.instant).toEqual(new Date(1700000000000));
    });

    it('should output only the match when requested', () => {
      const scanned = scanner({ extract: /backup-(\d+)\.tar/, only: true }).scanLine('x backup-1700000000.tar y', 1);

      expect(scanned?.line).toBe('backup-1700000000.tar');
    });

    it('should warn about lines the regexp does not match', () => {
      const scanned = scanner({ extract: /backup-(\d+)/ }).scanLine('nothing here', 7);

      expect(scanned).toEqual({ lineNumber: 7, line: 'nothing here', timestamp: null });
      expect(mockLogger.logSkippedLine).toHaveBeenCalledWith(7, 'no match for --extract in "nothing here"');
    });
  });

  describe('parseTimestamp', () => {
    it('should parse milliseconds', () => {
      expect(scanner({ format: 'unix-ms' }).parseTimestamp('1700000000123')).toEqual({
        instant: new Date(1700000000123),
        offset: 0,
      });
    });

    it('should parse negative unix timestamps', () => {
      expect(scanner().parseTimestamp('-86400')?.instant.toISOString()).toBe('1969-12-31T00:00:00.000Z');
    });

    it('should reject fractional unix timestamps', () => {
      expect(scanner().parseTimestamp('1700000000.5')).toBeNull();
    });

    describe('iso', () => {
      const iso = () => scanner({ format: 'iso' });

      it('should parse UTC times', () => {
        expect(iso().parseTimestamp('2024-03-10T12:30:00Z')).toEqual({
          instant: new Date('2024-03-10T12:30:00.000Z'),
          offset: 0,
        });
      });

      it('should keep the offset of the time', () => {
        expect(iso().parseTimestamp('2024-03-10T12:30:00+02:00')).toEqual({
          instant: new Date('2024-03-10T10:30:00.000Z'),
          offset: 120,
        });
        expect(iso().parseTimestamp('2024-03-10T12:30:00-0530')).toEqual({
          instant: new Date('2024-03-10T18:00:00.000Z'),
          offset: -330,
        });
      });

      it('should treat times without an offset as UTC', () => {
        expect(iso().parseTimestamp('2024-03-10')).toEqual({
          instant: new Date('2024-03-10T00:00:00.000Z'),
          offset: 0,
        });
        expect(iso().parseTimestamp('2024-03-10 12:30:45.25')?.instant.toISOString()).toBe(
          '2024-03-10T12:30:45.250Z'
        );
      });

      it('should use the host offset for local times', () => {
        const parsed = scanner({ format: 'iso', localTime: true }).parseTimestamp('2024-03-10T12:30:00');
        const expected = new Date(2024, 2, 10, 12, 30, 0);

        expect(parsed).toEqual({ instant: expected, offset: 0 - expected.getTimezoneOffset() });
      });

      it.each(['2024-02-30T00:00:00Z', '2024-13-01', '2024-03-10T24:00:00Z', 'March 10', '1700000000'])(
        'should reject %p',
        text => {
          expect(iso().parseTimestamp(text)).toBeNull();
        }
      );
    });
  });

  describe('date-fns patterns', () => {
    it('should parse a pattern without a zone as UTC', () => {
      expect(scanner({ format: 'EEE MMM d HH:mm:ss yyyy' }).parseTimestamp('Sun Sep 8 23:33:14 2013')).toEqual({
        instant: new Date('2013-09-08T23:33:14.000Z'),
        offset: 0,
      });
    });

    it('should use the host time zone for a pattern without a zone with localTime', () => {
      const parsed = scanner({ format: 'EEE MMM d HH:mm:ss yyyy', localTime: true }).parseTimestamp(
        'Sun Sep 8 23:33:14 2013'
      );
      const expected = new Date(2013, 8, 8, 23, 33, 14);

      expect(parsed).toEqual({ instant: expected, offset: 0 - expected.getTimezoneOffset() });
    });

    it('should parse a pattern with a zone', () => {
      expect(scanner({ format: 'dd MMM yyyy HH:mm XXX' }).parseTimestamp('08 Sep 2013 23:33 -07:00')).toEqual({
        instant: new Date('2013-09-09T06:33:00.000Z'),
        offset: 0,
      });
    });

    it('should name the pattern when a line does not match it', () => {
      const scanned = scanner({ format: 'yyyyMMdd-HHmmss' }).scanLine('latest', 2);

      expect(scanned?.timestamp).toBeNull();
      expect(mockLogger.logSkippedLine).toHaveBeenCalledWith(
        2,
        'failed to parse timestamp "latest" using pattern "yyyyMMdd-HHmmss"'
      );
    });
  });

  describe('scan', () => {
    it('should read every line of the stream', async () => {
      const input = Readable.from(['1700000000\n17000', '00060\n\n', 'bad\n1700000120']);

      const lines = await scanner({ quiet: true }).scan(input);

      expect(lines.map(({ lineNumber, line }) => [lineNumber, line])).toEqual([
        [1, '1700000000'],
        [2, '1700000060'],
        [4, 'bad'],
        [5, '1700000120'],
      ]);
      expect(lines.map(({ timestamp }) => timestamp?.instant.getTime() ?? null)).toEqual([
        1700000000000,
        1700000060000,
        null,
        1700000120000,
      ]);
    });
  });
});

describe('compileExtract', () => {
  it('should compile a regexp with one capture group', () => {
    expect(compileExtract('snap-(\\d+)').exec('snap-42')?.[1]).toBe('42');
  });

  it('should reject more than one capture group', () => {
    expect(() => compileExtract('(\\d+)-(\\d+)')).toThrow(
      new InputError('--extract regexp is invalid: must contain up to one capture group')
    );
  });

  it('should reject invalid syntax', () => {
    expect(() => compileExtract('snap-(')).toThrow(/^--extract regexp is invalid: /);
  });
});
