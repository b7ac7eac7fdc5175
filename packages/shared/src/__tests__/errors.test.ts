import { describe, it, expect } from 'vitest';
import { DomainError } from '@homestock/domain';
import { AppError, ErrorCode, toAppError } from '../errors';

describe('AppError', () => {
  it('creates an error with correct properties', () => {
    const err = new AppError(ErrorCode.NOT_FOUND, 'Resource not found', { resourceId: '123' });

    expect(err.code).toBe(ErrorCode.NOT_FOUND);
    expect(err.message).toBe('Resource not found');
    expect(err.httpStatus).toBe(404);
    expect(err.safeMeta).toEqual({ resourceId: '123' });
    expect(err.name).toBe('AppError');
  });

  it('serializes to JSON without internal details', () => {
    const err = new AppError(ErrorCode.FORBIDDEN, 'Not allowed', { groupId: '10' });
    const json = err.toJSON();

    expect(json).toEqual({ code: 'FORBIDDEN', message: 'Not allowed', groupId: '10' });
    expect(json).not.toHaveProperty('stack');
    expect(json).not.toHaveProperty('httpStatus');
  });

  it('defaults safeMeta to empty object', () => {
    expect(new AppError(ErrorCode.INTERNAL, 'fail').safeMeta).toEqual({});
  });
});

describe('toAppError', () => {
  it.each([
    [new DomainError('ITEM_NOT_FOUND', 'Item not found', { itemId: '5' }), ErrorCode.NOT_FOUND, 404],
    [new DomainError('DUPLICATE_REACTION', 'Reaction already exists'), ErrorCode.CONFLICT, 409],
    [new DomainError('NOT_AUTHORIZED', 'Not allowed'), ErrorCode.FORBIDDEN, 403],
    [new DomainError('INVALID_PRICE', 'Bad price'), ErrorCode.VALIDATION, 422],
    [new DomainError('CATEGORY_IN_USE', 'In use'), ErrorCode.CONFLICT, 409],
    [new DomainError('CONCURRENT_CONFLICT', 'Retry'), ErrorCode.CONFLICT, 409],
  ])('maps %s', (domainError, code, status) => {
    const err = toAppError(domainError);
    expect(err.code).toBe(code);
    expect(err.httpStatus).toBe(status);
    expect(err.cause).toBe(domainError);
  });

  it('carries the kind and details into safeMeta', () => {
    const err = toAppError(new DomainError('ITEM_NOT_FOUND', 'Item not found', { itemId: '5' }));
    expect(err.toJSON()).toEqual({ code: 'NOT_FOUND', message: 'Item not found', kind: 'ITEM_NOT_FOUND', itemId: '5' });
  });

  it('hides the message of a failed delete', () => {
    const err = toAppError(new DomainError('DELETE_FAILED', 'Deleting item 5 failed', { kind: 'item', id: '5' }));
    expect(err.code).toBe(ErrorCode.INTERNAL);
    expect(err.message).toBe('Internal error');
  });

  it('passes an AppError through', () => {
    const original = new AppError(ErrorCode.BAD_REQUEST, 'bad');
    expect(toAppError(original)).toBe(original);
  });

  it('turns unknown failures into INTERNAL', () => {
    const err = toAppError(new Error('connection refused'));
    expect(err.toJSON()).toEqual({ code: 'INTERNAL', message: 'Internal error' });
  });
});
