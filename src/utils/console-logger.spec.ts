import { ConsoleLogger, LogSink } from './console-logger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation();
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should skip debug output at the default info level', () => {
    const logger = new ConsoleLogger('quizmark');

    logger.debug('Read quiz');
    logger.info('Converted');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledWith('[quizmark] Converted');
  });

  it('should pass context through', () => {
    const logger = new ConsoleLogger('quizmark', 'debug');

    logger.debug('Read quiz', { questions: 3 });

    expect(debugSpy).toHaveBeenCalledWith('[quizmark] Read quiz', { questions: 3 });
  });

  it('should only write errors at the error level', () => {
    const logger = new ConsoleLogger('quizmark', 'error');
    const failure = new Error('boom');

    logger.info('hidden');
    logger.warn('hidden');
    logger.error('Conversion failed', failure, { file: 'quiz.md' });

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[quizmark] Conversion failed', failure, {
      file: 'quiz.md',
    });
  });

  it('should write warnings at the warn level', () => {
    const logger = new ConsoleLogger('cli', 'warn');

    logger.warn('Careful');
    logger.error('Failed');

    expect(warnSpy).toHaveBeenCalledWith('[cli] Careful');
    expect(errorSpy).toHaveBeenCalledWith('[cli] Failed');
  });

  it('should write error context even without a cause', () => {
    const logger = new ConsoleLogger('quizmark');

    logger.error('Cannot read input file', undefined, { file: 'quiz.md' });

    expect(errorSpy).toHaveBeenCalledWith('[quizmark] Cannot read input file', { file: 'quiz.md' });
  });

  it('should write through the given sink instead of the console', () => {
    const sink: jest.Mocked<LogSink> = {
      debug: jest.fn(),
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    };
    const logger = new ConsoleLogger('quizmark', 'info', sink);

    logger.info('Creating output directory', { dir: 'build' });
    logger.warn('Overwriting existing file');

    expect(sink.log).toHaveBeenCalledWith('[quizmark] Creating output directory', { dir: 'build' });
    expect(sink.warn).toHaveBeenCalledWith('[quizmark] Overwriting existing file');
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
