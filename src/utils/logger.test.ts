/**
 * Tests for Logger Utilities
 */

import path from 'node:path';
import { expect, describe, it, beforeEach, afterEach } from 'vitest';
import * as logger from './logger';
import { Verbosity } from '../interfaces/logger';
import { captureOutput } from '../../test-config/mocks/test-helpers';

describe('Logger Utilities', () => {
  let output: ReturnType<typeof captureOutput>;

  beforeEach(() => {
    output = captureOutput();
  });

  afterEach(() => {
    output.restore();
    logger.detachRunLog();
  });

  describe('Verbosity Levels', () => {
    it('should define the correct verbosity levels', () => {
      expect(Verbosity.Quiet).toBe(0);
      expect(Verbosity.Normal).toBe(1);
      expect(Verbosity.Info).toBe(2);
      expect(Verbosity.Verbose).toBe(3);
    });

    it('should raise Normal to Info for dry runs only', () => {
      expect(logger.consoleVerbosity(Verbosity.Normal, true)).toBe(Verbosity.Info);
      expect(logger.consoleVerbosity(Verbosity.Normal, false)).toBe(
        Verbosity.Normal,
      );
      expect(logger.consoleVerbosity(Verbosity.Quiet, true)).toBe(Verbosity.Quiet);
      expect(logger.consoleVerbosity(Verbosity.Verbose, true)).toBe(
        Verbosity.Verbose,
      );
    });
  });

  describe('Color helpers', () => {
    it('should wrap text with ANSI codes', () => {
      expect(logger.red('error')).toBe('\x1b[31merror\x1b[0m');
      expect(logger.green('success')).toBe('\x1b[32msuccess\x1b[0m');
      expect(logger.yellow('warning')).toBe('\x1b[33mwarning\x1b[0m');
      expect(logger.blue('info')).toBe('\x1b[34minfo\x1b[0m');
      expect(logger.bold('bold text')).toBe('\x1b[1mbold text\x1b[0m');
    });
  });

  describe('log', () => {
    it('should log message when level is within current verbosity', () => {
      logger.log('Test message', Verbosity.Normal, Verbosity.Normal);

      expect(output.lines).toEqual(['Test message\n']);
    });

    it('should not log message when level is above current verbosity', () => {
      logger.log('Test message', Verbosity.Verbose, Verbosity.Normal);

      expect(output.lines).toEqual([]);
    });

    it('should suppress repeated messages when duplicates are not allowed', () => {
      logger.log('Repeated once', Verbosity.Normal, Verbosity.Normal, false);
      logger.log('Repeated once', Verbosity.Normal, Verbosity.Normal, false);

      expect(output.lines).toEqual(['Repeated once\n']);
    });
  });

  describe('error', () => {
    it('should log error message even when quiet', () => {
      logger.error('Error message');

      expect(output.lines).toEqual([`${logger.red('❌ Error message')}\n`]);
    });
  });

  describe('warning', () => {
    it('should log warning message when verbosity is Normal', () => {
      logger.warning('Warning shown', Verbosity.Normal);

      expect(output.text()).toContain('Warning shown');
    });

    it('should not log warning message when verbosity is Quiet', () => {
      logger.warning('Warning hidden', Verbosity.Quiet);

      expect(output.lines).toEqual([]);
    });
  });

  describe('info', () => {
    it('should log info message when verbosity is Info', () => {
      logger.info('Info shown', Verbosity.Info);

      expect(output.lines).toEqual([`${logger.blue('ℹ️  Info shown')}\n`]);
    });

    it('should not log info message when verbosity is Normal', () => {
      logger.info('Info hidden at normal', Verbosity.Normal);

      expect(output.lines).toEqual([]);
    });

    it('should not log info message when verbosity is Quiet', () => {
      logger.info('Info hidden', Verbosity.Quiet);

      expect(output.lines).toEqual([]);
    });
  });

  describe('success', () => {
    it('should log success message when verbosity is Info', () => {
      logger.success('Success message', Verbosity.Info);

      expect(output.text()).toContain('Success message');
    });

    it('should not log success message when verbosity is Normal', () => {
      logger.success('Success message', Verbosity.Normal);

      expect(output.lines).toEqual([]);
    });

    it('should not log success message when verbosity is Quiet', () => {
      logger.success('Success message', Verbosity.Quiet);

      expect(output.lines).toEqual([]);
    });
  });

  describe('verbose', () => {
    it('should log verbose message when verbosity is Verbose', () => {
      logger.verbose('Verbose message', Verbosity.Verbose);

      expect(output.lines).toEqual(['Verbose message\n']);
    });

    it('should not log verbose message when verbosity is Normal', () => {
      logger.verbose('Verbose message', Verbosity.Normal);

      expect(output.lines).toEqual([]);
    });
  });

  describe('always', () => {
    it('should always log message regardless of verbosity', () => {
      logger.always('Always message');

      expect(output.lines).toEqual(['Always message\n']);
    });
  });

  describe('run log', () => {
    const attachMemoryLog = (): string[] => {
      const records: string[] = [];
      logger.attachRunLog({
        write: (msg: string) => {
          records.push(msg);
        },
      });
      return records;
    };

    it('should name the file after the run start time', () => {
      const date = new Date(2024, 2, 5, 7, 8, 9);

      expect(logger.createRunLogPath('/var/log', date)).toBe(
        path.join('/var/log', 'backup-verify-20240305_070809.log'),
      );
    });

    it('should record every level regardless of console verbosity', () => {
      const records = attachMemoryLog();

      logger.verbose('decided to skip a.txt', Verbosity.Quiet);
      logger.info('scanning', Verbosity.Quiet);
      logger.warning('probe failed', Verbosity.Quiet);
      logger.error('upload failed');

      expect(output.lines).toEqual([`${logger.red('❌ upload failed')}\n`]);
      expect(records.map((line) => JSON.parse(line))).toEqual([
        expect.objectContaining({ level: 20, msg: 'decided to skip a.txt' }),
        expect.objectContaining({ level: 30, msg: 'scanning' }),
        expect.objectContaining({ level: 40, msg: 'probe failed' }),
        expect.objectContaining({ level: 50, msg: 'upload failed' }),
      ]);
    });

    it('should strip colour codes and skip blank messages', () => {
      const records = attachMemoryLog();

      logger.always(logger.green('  Uploaded: 3  '));
      logger.always('');

      expect(records).toHaveLength(1);
      expect(JSON.parse(records[0]).msg).toBe('Uploaded: 3');
    });

    it('should stop recording once detached', () => {
      const records = attachMemoryLog();

      logger.detachRunLog();
      logger.always('after detach');

      expect(records).toEqual([]);
    });
  });
});
