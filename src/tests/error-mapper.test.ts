// src/utils/error-mapper.test.ts
import { describeThrown, mapErrorToLogPayload } from '../utils/error-mapper.js';
import { InvalidOptionsError, MissingRolesError, NoUserError, RolesAuthorizationError } from '../errors/index.js';

describe('Error Mapping Utilities', () => {
    describe('error classes', () => {
        it('should name errors after their class', () => {
            expect(new NoUserError().name).toBe('NoUserError');
            expect(new MissingRolesError(['admin']).name).toBe('MissingRolesError');
            expect(new InvalidOptionsError('bad').name).toBe('InvalidOptionsError');
        });

        it('should share the RolesAuthorizationError base', () => {
            expect(new NoUserError()).toBeInstanceOf(RolesAuthorizationError);
            expect(new MissingRolesError(['admin'])).toBeInstanceOf(RolesAuthorizationError);
            expect(new NoUserError()).toBeInstanceOf(Error);
        });

        it('should carry structured details', () => {
            expect(new NoUserError().details).toEqual({ reason: 'no_user' });
            expect(new MissingRolesError(['a', 'b'], ['a', 'b', 'c']).details).toEqual({
                reason: 'missing_roles',
                missing: ['a', 'b'],
            });
            expect(new InvalidOptionsError('bad', ['x: y']).details).toEqual({ issues: ['x: y'] });
        });

        it('should default the required roles to the missing ones', () => {
            expect(new MissingRolesError(['admin']).required).toEqual(['admin']);
        });
    });

    describe('mapErrorToLogPayload', () => {
        it('should map MissingRolesError with the missing roles', () => {
            expect(mapErrorToLogPayload(new MissingRolesError(['moose_feeder'], ['admin', 'moose_feeder']))).toEqual({
                type: 'MissingRolesError',
                message: 'Missing roles: moose_feeder',
                code: 'MISSING_ROLES',
                missing: ['moose_feeder'],
            });
        });

        it('should map NoUserError', () => {
            expect(mapErrorToLogPayload(new NoUserError())).toEqual({
                type: 'NoUserError',
                message: 'no logged in user, and none supplied as argument',
                code: 'NO_USER',
            });
        });

        it('should map InvalidOptionsError', () => {
            expect(mapErrorToLogPayload(new InvalidOptionsError('Invalid role checker options: x'))).toEqual({
                type: 'InvalidOptionsError',
                message: 'Invalid role checker options: x',
                code: 'INVALID_OPTIONS',
            });
        });

        it('should map other roles errors without a code', () => {
            expect(mapErrorToLogPayload(new RolesAuthorizationError('Something else'))).toEqual({
                type: 'RolesAuthorizationError',
                message: 'Something else',
            });
        });

        it('should map generic Error', () => {
            expect(mapErrorToLogPayload(new TypeError('Bad argument'))).toEqual({
                type: 'TypeError',
                message: 'Bad argument',
            });
        });

        it('should map values without a string form', () => {
            expect(mapErrorToLogPayload(Object.create(null))).toEqual({ type: 'UnknownError', message: '[object Object]' });
        });

        it('should map errors whose getters throw', () => {
            const hostile = new Error('unused');
            Object.defineProperty(hostile, 'name', {
                get: () => { throw new Error('no name'); },
            });
            expect(mapErrorToLogPayload(hostile)).toEqual({ type: 'UnknownError', message: '[object Error]' });
        });

        it('should map non-Error values', () => {
            expect(mapErrorToLogPayload('Just a string')).toEqual({ type: 'UnknownError', message: 'Just a string' });
            expect(mapErrorToLogPayload(null)).toEqual({ type: 'UnknownError', message: 'null' });
            expect(mapErrorToLogPayload({ code: 1 })).toEqual({ type: 'UnknownError', message: '[object Object]' });
        });
    });

    describe('describeThrown', () => {
        it('should use the string form when there is one', () => {
            expect(describeThrown(42)).toBe('42');
            expect(describeThrown(new Error('boom'))).toBe('Error: boom');
        });

        it('should fall back to the object tag', () => {
            expect(describeThrown(Object.create(null))).toBe('[object Object]');
        });
    });
});
