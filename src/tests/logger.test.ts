// src/defaults/logger.test.ts
/* eslint-disable no-console */
import { ConsoleLogger } from '../defaults/logger.js';
import { LogContext } from '../interfaces/logger.js';
import { MissingRolesError } from '../errors/index.js';

describe('ConsoleLogger', () => {
    let sink: jest.Mock;

    const entryAt = (call = 0): Record<string, unknown> => JSON.parse(String(sink.mock.calls[call][1]));

    beforeEach(() => {
        sink = jest.fn();
    });

    it('should default to the info level', () => {
        const logger = new ConsoleLogger({}, undefined, sink);
        logger.debug('Debug message');
        logger.info('Info message');
        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink.mock.calls[0][0]).toBe('info');
    });

    it('should respect minLevel setting', () => {
        const logger = new ConsoleLogger({}, 'warn', sink);
        logger.debug('Debug message');
        logger.info('Info message');
        logger.warn('Warn message');
        logger.error('Error message');

        expect(sink.mock.calls.map(call => call[0])).toEqual(['warn', 'error']);
    });

    it('should write every level at debug', () => {
        const logger = new ConsoleLogger({}, 'debug', sink);
        logger.debug('Debug message');
        logger.info('Info message');
        logger.warn('Warn message');
        logger.error('Error message');

        expect(sink.mock.calls.map(call => call[0])).toEqual(['debug', 'info', 'warn', 'error']);
    });

    it('should write structured JSON with bindings and context', () => {
        const logger = new ConsoleLogger({ service: 'billing' }, 'info', sink);
        const context: LogContext = { checkId: '123', required: ['admin'] };
        logger.info('Role granted: admin', context);

        const entry = entryAt();
        expect(entry).toMatchObject({
            level: 'info',
            message: 'Role granted: admin',
            service: 'billing',
            checkId: '123',
            required: ['admin'],
        });
        expect(typeof entry.timestamp).toBe('string');
    });

    it('should write errors in the log payload form', () => {
        const logger = new ConsoleLogger({}, 'info', sink);
        logger.error('Check failed', new MissingRolesError(['admin']), { checkId: 'abc' });

        expect(entryAt()).toMatchObject({
            checkId: 'abc',
            error: {
                type: 'MissingRolesError',
                message: 'Missing roles: admin',
                code: 'MISSING_ROLES',
                missing: ['admin'],
            },
        });
    });

    it('should describe non-Error values', () => {
        const logger = new ConsoleLogger({}, 'info', sink);
        logger.error('Check failed', 'timeout');
        expect(entryAt().error).toEqual({ type: 'UnknownError', message: 'timeout' });
    });

    it('should merge bindings into child loggers', () => {
        const logger = new ConsoleLogger({ service: 'billing' }, 'debug', sink);
        logger.child({ checkId: 'abc' }).debug('Role denied: admin');

        expect(entryAt()).toMatchObject({
            level: 'debug',
            message: 'Role denied: admin',
            service: 'billing',
            checkId: 'abc',
        });
    });

    it('should keep the entry when the context cannot be stringified', () => {
        const logger = new ConsoleLogger({}, 'info', sink);
        const circular: LogContext = {};
        circular.self = circular;
        logger.info('Circular', circular);

        expect(sink).toHaveBeenCalledTimes(1);
        expect(entryAt()).toMatchObject({ level: 'info', message: 'Circular', unserializableContext: true });
    });

    it('should write to the console method of the entry level by default', () => {
        const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
        try {
            new ConsoleLogger().warn('Careful');
            expect(warnSpy).toHaveBeenCalledTimes(1);
            expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toMatchObject({ level: 'warn', message: 'Careful' });
        } finally {
            warnSpy.mockRestore();
        }
    });
});
