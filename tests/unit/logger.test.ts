/**
 * Unit Tests - Logger
 */

import { createLogger } from '../../src/logging/logger';

function memoryDestination(): { lines: Array<Record<string, unknown>>; write(msg: string): void } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
}

describe('Logger', () => {
  it('should write JSON lines with level label, name and ISO time', () => {
    const destination = memoryDestination();
    const logger = createLogger({ name: 'test-store', destination });

    logger.info('GetRecord called with ID: 1', { id: 1 });

    expect(destination.lines).toHaveLength(1);
    expect(destination.lines[0]).toMatchObject({
      level: 'info',
      name: 'test-store',
      msg: 'GetRecord called with ID: 1',
      id: 1,
    });
    expect(destination.lines[0].time).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('should drop entries below the configured level', () => {
    const destination = memoryDestination();
    const logger = createLogger({ level: 'warn', destination });

    logger.info('hidden');
    logger.warn('shown');

    expect(destination.lines.map((line) => line.msg)).toEqual(['shown']);
  });

  it('should carry child bindings', () => {
    const destination = memoryDestination();
    const logger = createLogger({ destination }).child({ component: 'record-service' });

    logger.debug('not at info');
    logger.info('bound');

    expect(destination.lines).toEqual([expect.objectContaining({ component: 'record-service', msg: 'bound' })]);
  });

  it('should serialize errors under err', () => {
    const destination = memoryDestination();

    createLogger({ destination }).error('failed', new Error('boom'));

    expect(destination.lines[0]).toMatchObject({ level: 'error', msg: 'failed', err: { message: 'boom' } });
  });

  it('should not throw when the destination fails', () => {
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({
      destination: {
        write() {
          throw new Error('disk full');
        },
      },
    });

    expect(() => {
      logger.info('first');
      logger.info('second');
    }).not.toThrow();
    expect(stderr).toHaveBeenCalledTimes(1);

    stderr.mockRestore();
  });
});
