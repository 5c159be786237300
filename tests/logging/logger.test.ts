import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { format, transports } from 'winston';
import { createEngineLogger, profileLogger } from '../../src/logging/logger.js';

function capture(level = 'info') {
  const logger = createEngineLogger({ level });
  const stream = new PassThrough();
  const lines: string[] = [];
  stream.on('data', (chunk: Buffer) => lines.push(...chunk.toString('utf-8').trim().split('\n')));
  logger.clear();
  logger.add(new transports.Stream({ stream, format: format.json() }));
  return { logger, lines };
}

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10));
}

describe('createEngineLogger', () => {
  it('stamps entries with a timestamp', async () => {
    const { logger, lines } = capture();
    logger.info('ready');
    await settle();
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'info', message: 'ready' });
    expect(entry).toHaveProperty('timestamp');
  });

  it('filters below the configured level', async () => {
    const { logger, lines } = capture('warn');
    logger.info('hidden');
    logger.warn('shown');
    await settle();
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ message: 'shown' });
  });
});

describe('profileLogger', () => {
  it('tags entries with the profile name', async () => {
    const { logger, lines } = capture();
    profileLogger(logger, 'alice').info('Running step: Open login page');
    await settle();
    expect(JSON.parse(lines[0])).toMatchObject({ profile: 'alice', message: 'Running step: Open login page' });
  });
});
