// tests/unit/logger.test.ts

import { Logger, LogLevel } from '../../src/core/logging/Logger';

describe('Logger', () => {
    let previous: LogLevel;
    let output: jest.SpyInstance;

    beforeEach(() => {
        previous = Logger.getLevel();
        output = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        Logger.setLevel(previous);
        output.mockRestore();
    });

    it('should be silent under test by default', () => {
        expect(previous).toBe(LogLevel.SILENT);
    });

    it('should drop entries below the current level', () => {
        Logger.setLevel(LogLevel.WARN);

        Logger.debug('Test', 'hidden');
        Logger.info('Test', 'hidden');
        Logger.warn('Test', 'shown');

        expect(output).toHaveBeenCalledTimes(1);
    });

    it('should write level, module, message and context on one line', () => {
        Logger.setLevel(LogLevel.DEBUG);
        Logger.info('Generator', 'registered', { cases: 2 });

        expect(output.mock.calls[0]?.[0]).toMatch(
            /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] \[Generator\] registered \{"cases":2\}$/
        );
    });

    it('should survive circular context', () => {
        const context: Record<string, unknown> = { name: 'loop' };
        context.self = context;

        expect(Logger.formatMessage('DEBUG', 'Test', 'cycle', context))
            .toMatch(/\[DEBUG\] \[Test\] cycle \{"name":"loop","self":"\[Circular\]"\}$/);
    });

    it('should append the stack of logged errors', () => {
        Logger.setLevel(LogLevel.ERROR);
        Logger.error('Test', 'failed', new Error('boom'));

        expect(output.mock.calls[0]?.[0]).toContain('[ERROR] [Test] failed Stack: Error: boom');
    });
});
