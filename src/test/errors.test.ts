import { describe, expect, test } from 'vitest';
import {
  ConfigError,
  EXIT_CODES,
  FileSystemError,
  getExitCodeForError,
  isIxrError,
  isServiceError,
  ParseError,
  RecordError,
  ServiceAuthError,
  ServiceResponseError,
  ServiceTimeoutError,
  ServiceUnreachableError,
  ValidationError,
} from '../lib/errors.js';

describe('Error types', () => {
  describe('ConfigError', () => {
    test('has correct _tag', () => {
      const error = new ConfigError('Test error');
      expect(error._tag).toBe('ConfigError');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('ConfigError');
    });
  });

  describe('RecordError', () => {
    test('keeps the source it was read from', () => {
      const error = new RecordError('sw01.json', 'Record in sw01.json must be a JSON object');
      expect(error._tag).toBe('RecordError');
      expect(error.source).toBe('sw01.json');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('ServiceTimeoutError', () => {
    test('builds its message from service and timeout', () => {
      const error = new ServiceTimeoutError('jira', 30000);
      expect(error.message).toBe('Request to jira timed out after 30000ms');
      expect(error.service).toBe('jira');
      expect(error.timeoutMs).toBe(30000);
    });
  });

  describe('ServiceAuthError', () => {
    test('has status code', () => {
      const error = new ServiceAuthError('confluence', 'confluence denied access (403)', 403);
      expect(error._tag).toBe('ServiceAuthError');
      expect(error.statusCode).toBe(403);
    });
  });
});

describe('Type guards', () => {
  test('isServiceError accepts only service errors', () => {
    expect(isServiceError(new ServiceUnreachableError('jira', 'down'))).toBe(true);
    expect(isServiceError(new ServiceResponseError('jira', 'bad', 500))).toBe(true);
    expect(isServiceError(new ConfigError('missing'))).toBe(false);
    expect(isServiceError(new Error('plain'))).toBe(false);
  });

  test('isIxrError rejects plain errors and non-errors', () => {
    expect(isIxrError(new ParseError('bad json'))).toBe(true);
    expect(isIxrError(new Error('plain'))).toBe(false);
    expect(isIxrError('string')).toBe(false);
  });
});

describe('getExitCodeForError', () => {
  test('maps configuration problems to CONFIG_ERROR', () => {
    expect(getExitCodeForError(new ConfigError('x'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(getExitCodeForError(new ValidationError('x'))).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  test('maps record problems to RECORD_ERROR', () => {
    expect(getExitCodeForError(new RecordError('a.json', 'x'))).toBe(EXIT_CODES.RECORD_ERROR);
  });

  test('maps service errors', () => {
    expect(getExitCodeForError(new ServiceAuthError('jira', 'x', 401))).toBe(EXIT_CODES.AUTH_ERROR);
    expect(getExitCodeForError(new ServiceTimeoutError('jira', 5000))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(getExitCodeForError(new ServiceUnreachableError('jira', 'x'))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(getExitCodeForError(new ServiceResponseError('jira', 'x', 502))).toBe(EXIT_CODES.NETWORK_ERROR);
  });

  test('falls back to GENERAL_ERROR', () => {
    expect(getExitCodeForError(new FileSystemError('x'))).toBe(EXIT_CODES.GENERAL_ERROR);
    expect(getExitCodeForError(new ParseError('x'))).toBe(EXIT_CODES.GENERAL_ERROR);
  });
});
