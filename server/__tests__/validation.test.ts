import { describe, it, expect, vi } from 'vitest';
import type { Request, Response } from 'express';
import { chatRequestSchema } from '@shared/schema';
import { commonSchemas, validate } from '../middleware/validation';
import { ValidationError } from '../utils/errorHandler';

function mockRequest(body: unknown, params: Record<string, string> = {}) {
  const req = { body, params };
  return { req, request: req as unknown as Request };
}

const res = {} as unknown as Response;

describe('validate middleware', () => {
  it('replaces the body with the parsed value', () => {
    const next = vi.fn();
    const { req, request } = mockRequest({ message: '  Find papers about robotics  ', userId: 'user-1' });

    validate({ body: chatRequestSchema })(request, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ message: 'Find papers about robotics', userId: 'user-1' });
  });

  it('passes a ValidationError naming the failing field', () => {
    const next = vi.fn();
    const { request } = mockRequest({ message: '   ', userId: 'user-1' });

    validate({ body: chatRequestSchema })(request, res, next);

    const error = next.mock.calls[0][0];
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('message: Message is required');
  });

  it('validates route params', () => {
    const next = vi.fn();
    const { request } = mockRequest(undefined, { id: '' });

    validate({ params: commonSchemas.id })(request, res, next);

    expect(next.mock.calls[0][0].message).toBe('id: ID is required');
  });
});

describe('message list query', () => {
  it('coerces the limit from the query string', () => {
    const next = vi.fn();
    const req = { params: { id: 'c-1' }, query: { limit: '20' } };

    validate({ params: commonSchemas.id, query: commonSchemas.messageList })(req as unknown as Request, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.query).toEqual({ limit: 20 });
  });

  it('rejects a limit outside the allowed range', () => {
    const next = vi.fn();
    const req = { params: { id: 'c-1' }, query: { limit: '0' } };

    validate({ query: commonSchemas.messageList })(req as unknown as Request, res, next);

    expect(next.mock.calls[0][0]).toBeInstanceOf(ValidationError);
    expect(next.mock.calls[0][0].message).toBe('limit: Number must be greater than or equal to 1');
  });
});
