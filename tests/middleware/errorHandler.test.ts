/**
 * Error Handler Middleware Tests
 *
 * Validates unified error handling and response formatting
 */

import { describe, it, expect, beforeEach, jest, afterEach } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import { errorHandler, notFoundHandler } from '../../src/middleware/errorHandler.js';
import {
  AuthenticationError,
  ConfigurationError,
  CrossOwnerViolationError,
  DatabaseError,
  DuplicateEntryError,
  ErrorCode,
  RateLimitError,
  ResourceNotFoundError,
  ValidationError,
} from '../../src/errors/index.js';
import { logger } from '../../src/middleware/logging.js';

/**
 * App whose only route fails with the given error
 */
function failingApp(error: Error): express.Application {
  const app = express();
  app.use(express.json());
  app.get('/api/lists/123', (_req, _res, next) => next(error));
  app.post('/api/lists', (_req, res) => {
    res.status(201).json({});
  });
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  const originalEnv = process.env.NODE_ENV;
  const logSpy = jest.spyOn(logger, 'log');
  const errorSpy = jest.spyOn(logger, 'error');

  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  describe('ApplicationError Handling', () => {
    it.each([
      [new ValidationError('Invalid field'), 400],
      [new AuthenticationError('Invalid credentials'), 401],
      [new CrossOwnerViolationError(), 403],
      [new ResourceNotFoundError('list', 123), 404],
      [new DuplicateEntryError('ListItem', 'Media is already in this list'), 409],
      [new RateLimitError('TMDB', 60), 429],
    ])('should answer %p with its status code', async (error, status) => {
      const response = await request(failingApp(error)).get('/api/lists/123');

      expect(response.status).toBe(status);
      expect(response.body.error.status).toBe(status);
      expect(response.body.error.message).toBe(error.message);
    });

    it('should include the error code', async () => {
      const response = await request(failingApp(new DuplicateEntryError('User', 'Email already exists'))).get(
        '/api/lists/123'
      );

      expect(response.body).toEqual({
        error: {
          message: 'Email already exists',
          status: 409,
          code: ErrorCode.RESOURCE_DUPLICATE_ENTRY,
        },
      });
    });

    it('should include per-field details of validation errors', async () => {
      const error = new ValidationError('name: Required', undefined, undefined, [
        { field: 'name', message: 'Required', code: 'invalid_type' },
      ]);

      const response = await request(failingApp(error)).get('/api/lists/123');

      expect(response.body.error.details).toEqual([
        { field: 'name', message: 'Required', code: 'invalid_type' },
      ]);
    });

    it('should return operational database errors with message', async () => {
      const error = new DatabaseError('Query timeout exceeded', ErrorCode.DATABASE_QUERY_FAILED, true, {});

      const response = await request(failingApp(error)).get('/api/lists/123');

      expect(response.status).toBe(500);
      expect(response.body.error.message).toBe('Query timeout exceeded');
    });

    it('should hide the message of non-operational errors', async () => {
      const response = await request(failingApp(new ConfigurationError('TMDB_API_KEY'))).get(
        '/api/lists/123'
      );

      expect(response.status).toBe(500);
      expect(response.body.error.message).toBe('Internal server error');
      expect(response.body.error.code).toBe(ErrorCode.CONFIG_INVALID);
    });
  });

  describe('Generic Error Handling', () => {
    it('should answer generic errors with 500 and no code', async () => {
      const response = await request(failingApp(new Error('Unexpected error'))).get('/api/lists/123');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        error: {
          message: 'Internal server error',
          status: 500,
        },
      });
    });

    it('should answer malformed JSON with 400', async () => {
      const response = await request(failingApp(new Error('unused')))
        .post('/api/lists')
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(response.status).toBe(400);
      expect(response.body.error.status).toBe(400);
    });
  });

  describe('Development vs Production Mode', () => {
    it('should include stack trace in development mode', async () => {
      process.env.NODE_ENV = 'development';
      const error = new ValidationError('Invalid input');
      error.stack = 'Error: Invalid input\n  at file.ts:10:5';

      const response = await request(failingApp(error)).get('/api/lists/123');

      expect(response.body.error.stack).toBe('Error: Invalid input\n  at file.ts:10:5');
    });

    it('should exclude stack trace in production mode', async () => {
      process.env.NODE_ENV = 'production';

      const response = await request(failingApp(new ValidationError('Invalid input'))).get(
        '/api/lists/123'
      );

      expect(response.body.error.stack).toBeUndefined();
    });
  });

  describe('Logging', () => {
    it('should log client errors as warnings with request context', async () => {
      await request(failingApp(new ResourceNotFoundError('list', 123)))
        .get('/api/lists/123')
        .set('User-Agent', 'test-agent');

      expect(logSpy).toHaveBeenCalledWith(
        'warn',
        'Request error',
        expect.objectContaining({
          error: expect.objectContaining({
            name: 'ResourceNotFoundError',
            statusCode: 404,
            isOperational: true,
          }),
          request: expect.objectContaining({
            method: 'GET',
            url: '/api/lists/123',
            userAgent: 'test-agent',
          }),
        })
      );
    });

    it('should log server errors at error level', async () => {
      await request(failingApp(new ConfigurationError('TMDB_API_KEY'))).get('/api/lists/123');

      expect(logSpy).toHaveBeenCalledWith('error', 'Request error', expect.anything());
    });

    it('should log generic errors with basic context', async () => {
      await request(failingApp(new Error('Unexpected error'))).get('/api/lists/123');

      expect(errorSpy).toHaveBeenCalledWith(
        'Request error (generic)',
        expect.objectContaining({
          error: expect.objectContaining({
            name: 'Error',
            message: 'Unexpected error',
          }),
        })
      );
    });
  });
});

describe('notFoundHandler', () => {
  const unknownRoutes: Array<['get' | 'delete', string, string]> = [
    ['get', 'GET', '/api/nonexistent'],
    ['delete', 'DELETE', '/api/lists/123/items'],
  ];

  it.each(unknownRoutes)('should describe unknown %s routes', async (verb, method, url) => {
    const response = await request(failingApp(new Error('unused')))[verb](url);

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: {
        message: `Route ${method} ${url} not found`,
        status: 404,
      },
    });
  });
});
