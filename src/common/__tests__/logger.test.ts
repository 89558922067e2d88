import { afterEach, describe, expect, jest, test } from '@jest/globals';

import { createConsoleTransport, errorMessage } from '../logger.js';

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should send every level to stderr', () => {
    const transport = createConsoleTransport();

    expect(Object.keys(transport.stderrLevels).sort()).toEqual(
      ['debug', 'error', 'http', 'info', 'silly', 'verbose', 'warn']
    );
  });

  test('should keep warnings off stdout', () => {
    const stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const transport = createConsoleTransport();

    transport.log?.(
      {
        level: 'warn',
        message: 'Agent a exhausted 5 loops',
        [Symbol.for('level')]: 'warn',
        [Symbol.for('message')]: 'WARN  [ReflexionLoop] Agent a exhausted 5 loops'
      },
      () => undefined
    );

    expect(stdout).not.toHaveBeenCalled();
  });

  test('should describe thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
