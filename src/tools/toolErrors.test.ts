import { UserError } from 'fastmcp';
import { describe, expect, it, vi } from 'vitest';
import { InvalidInputError } from '../types.js';
import { errorMessage, failTool } from './toolErrors.js';

describe('failTool', () => {
  it('logs the failure and rethrows it as a UserError', () => {
    const log = { error: vi.fn() };

    expect(() => failTool('add table slide', new InvalidInputError('Table rows are required'), log)).toThrow(
      new UserError('Failed to add table slide: Table rows are required')
    );
    expect(log.error).toHaveBeenCalledWith(
      '[InvalidInput] Failed to add table slide: Table rows are required'
    );
  });

  it('marks errors it does not classify as unexpected', () => {
    const log = { error: vi.fn() };
    expect(() => failTool('list themes', new TypeError('boom'), log)).toThrow(UserError);
    expect(log.error).toHaveBeenCalledWith('[Unexpected] Failed to list themes: boom');
  });

  it('passes UserErrors through unchanged', () => {
    const original = new UserError('Already explained');
    expect(() => failTool('do it', original, { error: vi.fn() })).toThrow(original);
  });
});

describe('errorMessage', () => {
  it('stringifies non-errors', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('wrapped'))).toBe('wrapped');
  });
});
