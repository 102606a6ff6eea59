import { createConsoleLogger, silentLogger } from '../logger';

describe('logger', () => {
  it('prefixes every line with the tag', () => {
    const sink = { debug: jest.fn(), warn: jest.fn() };
    const logger = createConsoleLogger('engine', sink);

    logger.debug('move e2e4', 1);
    logger.warn('rejected e2e5');

    expect(sink.debug).toHaveBeenCalledWith('[engine] move e2e4', 1);
    expect(sink.warn).toHaveBeenCalledWith('[engine] rejected e2e5');
  });

  it('defaults to the chess-engine tag on the console', () => {
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      createConsoleLogger().warn('hello');
      expect(spy).toHaveBeenCalledWith('[chess-engine] hello');
    } finally {
      spy.mockRestore();
    }
  });

  it('silentLogger accepts calls without output', () => {
    expect(() => {
      silentLogger.debug('x');
      silentLogger.warn('y');
    }).not.toThrow();
  });
});
