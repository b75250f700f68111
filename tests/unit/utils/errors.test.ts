import { describe, it, expect } from 'vitest';
import {
    AppError,
    ConfigurationError,
    DatabaseError,
    ExternalServiceError,
    NotFoundError,
    ValidationError,
    describeErrorChain,
    errorMessage,
    getHttpStatus
} from '../../../src/utils/errors';

describe('Error Taxonomy', () => {
    it('should name errors after their class and default the code to it', () => {
        const error = new ValidationError('Bad input', { fields: ['email'] });

        expect(error).toBeInstanceOf(AppError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ValidationError');
        expect(error.code).toBe('ValidationError');
        expect(error.details).toEqual({ fields: ['email'] });
    });

    it('should keep the cause', () => {
        const cause = new Error('ECONNRESET');
        const error = new ExternalServiceError('OpenAI completion failed', { service: 'openai', statusCode: 503, cause });

        expect(error.cause).toBe(cause);
        expect(error.details).toEqual({ service: 'openai', status_code: 503 });
    });

    it('should put resource and table details in snake case', () => {
        expect(new NotFoundError('Missing', { resourceType: 'Employee', resourceId: 'emp-1' }).details).toEqual({
            resource_type: 'Employee',
            resource_id: 'emp-1'
        });
        expect(new DatabaseError('Failed', { operation: 'find', table: 'employees' }).details).toEqual({
            operation: 'find',
            table: 'employees'
        });
        expect(new ConfigurationError('Missing key', { configKey: 'DATABASE_URL' }).details).toEqual({
            config_key: 'DATABASE_URL'
        });
    });

    describe('withContext', () => {
        it('should add context without overwriting existing details', () => {
            const error = new ValidationError('Bad input', { details: { stage: 'inner' } });

            const returned = error.withContext({ stage: 'outer', employee_id: 'emp-1' });

            expect(returned).toBe(error);
            expect(error.details).toEqual({ stage: 'inner', employee_id: 'emp-1' });
        });
    });

    it('should serialize to the HTTP error body', () => {
        const error = new NotFoundError('Employee emp-9 not found', { resourceType: 'Employee', resourceId: 'emp-9' });

        expect(error.toJSON()).toEqual({
            error: 'NotFoundError',
            message: 'Employee emp-9 not found',
            details: { resource_type: 'Employee', resource_id: 'emp-9' },
            type: 'NotFoundError'
        });
    });

    it('should map error classes to HTTP statuses', () => {
        expect(getHttpStatus(new ValidationError('x'))).toBe(400);
        expect(getHttpStatus(new NotFoundError('x'))).toBe(404);
        expect(getHttpStatus(new ExternalServiceError('x'))).toBe(502);
        expect(getHttpStatus(new DatabaseError('x'))).toBe(500);
        expect(getHttpStatus(new ConfigurationError('x'))).toBe(500);
        expect(getHttpStatus(new AppError('x'))).toBe(500);
    });

    it('should read messages from anything thrown', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage({ message: 'not an error' })).toBe('Unknown error');
    });

    it('should flatten the cause chain', () => {
        const root = new Error('connection refused');
        const error = new DatabaseError('Failed to find in employees', { cause: root });

        expect(describeErrorChain(error)).toEqual([
            { type: 'DatabaseError', message: 'Failed to find in employees', code: 'DatabaseError' },
            { type: 'Error', message: 'connection refused' }
        ]);
        expect(describeErrorChain('text')).toEqual([{ type: 'string', message: 'text' }]);
    });
});
