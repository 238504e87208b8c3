import { jest, describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { createLogger, formatData } from '../../utils/logger.js';

describe('logger', () => {
  const log = () => jest.mocked(console.log);
  const error = () => jest.mocked(console.error);

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('drops messages below the current level', () => {
    const logger = createLogger({ level: 'WARN' });

    logger.info('[OK] Parses book title.');
    logger.warn('[FAIL] Parses url of book cover image.');

    expect(log()).toHaveBeenCalledTimes(1);
    expect(String(log().mock.calls[0][0])).toMatch(
      /^\[\d{4}-\d\d-\d\dT[\d:.]+Z\] \x1b\[33m\[WARN\]\x1b\[0m \[FAIL\] Parses url of book cover image\.$/
    );
  });

  test('sends errors to stderr', () => {
    const logger = createLogger();

    logger.browser.error('launch', 'Executable does not exist');

    expect(log()).not.toHaveBeenCalled();
    expect(String(error().mock.calls[0][0])).toContain('[ERROR]\x1b[0m Browser Error: launch\nExecutable does not exist');
  });

  test('setLevel changes what gets through', () => {
    const logger = createLogger();

    logger.debug('hidden');
    logger.setLevel('DEBUG');
    logger.debug('shown');

    expect(logger.getLevel()).toBe('DEBUG');
    expect(log()).toHaveBeenCalledTimes(1);
    expect(String(log().mock.calls[0][0])).toContain('[DEBUG]\x1b[0m shown');
  });

  test('writes to the console only unless a log directory is given', () => {
    expect(createLogger().getLogFilePath()).toBeNull();
  });

  describe('with a log directory', () => {
    let logDir: string;

    beforeEach(() => {
      logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webparser-logs-'));
    });

    afterEach(() => {
      fs.rmSync(logDir, { recursive: true, force: true });
    });

    test('appends uncoloured lines to a per-process file', async () => {
      const logger = createLogger({ logDir });
      const logFilePath = logger.getLogFilePath();

      expect(logFilePath).toBe(path.join(logDir, `webparser-${process.pid}.log`));

      logger.info('[OK] get webpage https://books.test/dp/1');
      logger.warn('[FAIL] Parses url of book cover image.', 'Cover url not found.');
      logger.debug('below the level');

      logger.close();
      // close() ends the stream; the last write lands asynchronously
      await waitForContent(logFilePath ?? '', 'Cover url not found.\n');

      const lines = fs.readFileSync(logFilePath ?? '', 'utf8').split('\n');
      expect(lines).toHaveLength(4);
      expect(lines[0]).toMatch(
        /^\[\d{4}-\d\d-\d\dT[\d:.]+Z\] \[INFO\] \[OK\] get webpage https:\/\/books\.test\/dp\/1$/
      );
      expect(lines[1]).toMatch(/^\[[^\]]+\] \[WARN\] \[FAIL\] Parses url of book cover image\.$/);
      expect(lines[2]).toBe('Cover url not found.');
      expect(lines[3]).toBe('');
      expect(lines.join('\n')).not.toContain('\x1b');
    });
  });
});

describe('formatData', () => {
  test('renders strings, errors and objects', () => {
    const failure = new Error('boom');

    expect(formatData(undefined)).toBe('');
    expect(formatData('Cover url not found.')).toBe('Cover url not found.');
    expect(formatData(failure)).toBe(`boom\n${failure.stack}`);
    expect(formatData({ url: 'https://books.test/' })).toBe("{ url: 'https://books.test/' }");
  });
});

async function waitForContent(file: string, ending: string): Promise<void> {
  for (let attempt = 0; attempt < 100; attempt++) {
    if (fs.existsSync(file) && fs.readFileSync(file, 'utf8').endsWith(ending)) {
      return;
    }
    await sleep(20);
  }
}
