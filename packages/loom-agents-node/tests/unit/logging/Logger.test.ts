/**
 * Tests for Logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import winston from 'winston';
import { Writable } from 'stream';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, parseLogLevel } from '../../../src/logging/Logger.js';

interface Captured {
  level: string;
  message: string;
  [key: string]: unknown;
}

function captureTransport(): { transport: winston.transport; lines: Captured[] } {
  const lines: Captured[] = [];
  const stream = new Writable({
    objectMode: true,
    write(info: Captured, _encoding, callback) {
      lines.push(info);
      callback();
    },
  });
  return { transport: new winston.transports.Stream({ stream }), lines };
}

// Transports receive entries on a later tick
const flush = async (): Promise<void> => {
  await new Promise((resolve) => setImmediate(resolve));
  await new Promise((resolve) => setImmediate(resolve));
};

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should pass messages and metadata to its transports', async () => {
    const { transport, lines } = captureTransport();
    const logger = new Logger({ console: false, extraTransports: [transport] });

    logger.info('Runtime ready', { storage: ':memory:' });
    await flush();

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('info');
    expect(lines[0]?.message).toBe('Runtime ready');
    expect(lines[0]?.storage).toBe(':memory:');
  });

  it('should drop messages below the configured level', async () => {
    const { transport, lines } = captureTransport();
    const logger = new Logger({ level: 'warn', console: false, extraTransports: [transport] });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');
    await flush();

    expect(lines.map((line) => line.level)).toEqual(['warn', 'error']);
  });

  it('should not enable file logging unless asked', () => {
    const logger = new Logger({ console: false });

    expect(logger.isFileLoggingEnabled()).toBe(false);
  });

  it('should fall back to console-only when the log directory cannot be created', async () => {
    const testDir = await mkdtemp(join(tmpdir(), 'agentloom-log-test-'));
    const blocker = join(testDir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    try {
      const logger = new Logger({ console: false, file: true, dir: join(blocker, 'logs') });

      expect(logger.isFileLoggingEnabled()).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0]?.[0])).toContain('File logging disabled');
    } finally {
      await rm(testDir, { recursive: true, force: true });
    }
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('error')).toBe('error');
  });

  it('should return undefined for anything else', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
