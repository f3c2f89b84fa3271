import { describe, it, expect } from 'vitest';
import {
  ApiError,
  ConfigurationError,
  ErrorCode,
  MigrationError,
  NetworkNotFoundError,
  exitCodeFor,
  getErrorCode,
} from '../../src/utils/errors.js';

describe('MigrationError', () => {
  it('should create error with code and message', () => {
    const error = new MigrationError(ErrorCode.API_INVALID_RESPONSE, 'Bad payload');

    expect(error.code).toBe(ErrorCode.API_INVALID_RESPONSE);
    expect(error.message).toBe('Bad payload');
    expect(error.name).toBe('MigrationError');
  });

  it('should serialize to JSON', () => {
    const error = new MigrationError(ErrorCode.CONFIG_INVALID, 'Missing', {
      context: { flag: '--org-id' },
    });

    expect(error.toJSON()).toEqual({
      code: ErrorCode.CONFIG_INVALID,
      message: 'Missing',
      cause: undefined,
      context: { flag: '--org-id' },
    });
  });

  it('should wrap plain errors once', () => {
    const original = new Error('disk full');
    const wrapped = MigrationError.fromError(original);

    expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(wrapped.cause).toBe(original);
    expect(MigrationError.fromError(wrapped)).toBe(wrapped);
  });
});

describe('ApiError', () => {
  it('should carry status and endpoint', () => {
    const error = new ApiError(401, '/organizations/O1/networks', 'Invalid API key');

    expect(error).toBeInstanceOf(MigrationError);
    expect(error.name).toBe('ApiError');
    expect(error.code).toBe(ErrorCode.API_REQUEST_FAILED);
    expect(error.context).toEqual({ status: 401, endpoint: '/organizations/O1/networks' });
    expect(error.message).toBe('Dashboard API Error [401] /organizations/O1/networks: Invalid API key');
  });
});

describe('NetworkNotFoundError', () => {
  it('should name the network and organization', () => {
    const error = new NetworkNotFoundError('O1', 'N3');

    expect(error.code).toBe(ErrorCode.NETWORK_NOT_FOUND);
    expect(error.message).toBe('Network N3 not found in organization O1');
  });
});

describe('exitCodeFor', () => {
  it('should use 2 for bad invocations and 1 for everything else', () => {
    expect(exitCodeFor(new ConfigurationError('bad flag'))).toBe(2);
    expect(exitCodeFor(new NetworkNotFoundError('O1', 'N3'))).toBe(1);
    expect(exitCodeFor(new Error('EACCES'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('getErrorCode', () => {
  it('should return UNKNOWN_ERROR for foreign errors', () => {
    expect(getErrorCode(new Error('x'))).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(getErrorCode(new ApiError(500, '/x', 'y'))).toBe(ErrorCode.API_REQUEST_FAILED);
  });
});
