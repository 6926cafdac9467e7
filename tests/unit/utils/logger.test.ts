/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    // Reset singleton state
    logger.setLevel('info');
    logger.setOutput('stdout');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] test message'));
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should send warnings to console.warn', () => {
      const log = new Logger();

      log.warn('careful');

      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] careful'));
    });

    it('should send errors to console.error', () => {
      const log = new Logger();

      log.error('broken');

      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] broken'));
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('broken');
      log.info('done');

      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('output', () => {
    it('should send debug and info lines to stderr when switched', () => {
      const log = new Logger();
      log.setLevel('debug');
      log.setOutput('stderr');

      log.debug('unit loaded');
      log.info('done');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] unit loaded'));
    });
  });

  describe('child', () => {
    it('should nest prefixes and inherit level and output', () => {
      const parent = new Logger();
      parent.setLevel('debug');
      parent.setOutput('stderr');

      const child = parent.child('accessors').child('Foo');
      child.debug('sites');

      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] [accessors:Foo] sites'));
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should leave the parent unprefixed', () => {
      const parent = new Logger();
      parent.child('accessors');

      parent.info('plain');

      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[INFO] plain'));
      expect(consoleSpy.log).not.toHaveBeenCalledWith(expect.stringContaining('[accessors]'));
    });
  });

  describe('data payloads', () => {
    it('should print structured data after the message', () => {
      const log = new Logger();

      log.info('unit', { edits: 2 });

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(consoleSpy.log).toHaveBeenLastCalledWith(expect.stringContaining('"edits": 2'));
    });
  });
});
