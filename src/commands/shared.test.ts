import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { NotFoundError, validate } from '../errors.js';
import { collect, parseId, parseInteger, parseList, reportError, runAction } from './shared.js';

describe('command plumbing', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  describe('reportError', () => {
    it('prints one line per validation issue', () => {
      const schema = z.object({ rating: z.number().max(5, 'Rating must be 1-5') });
      let caught: unknown;
      try {
        validate(schema, { rating: 9 }, 'Invalid session');
      } catch (error) {
        caught = error;
      }

      reportError('Session stop', caught);

      expect(errorSpy.mock.calls).toEqual([['❌ Invalid session'], ['   • rating: Rating must be 1-5']]);
      expect(process.exitCode).toBe(1);
    });

    it('prints the message of other expected failures', () => {
      reportError('Project stats', new NotFoundError('Project', 4));

      expect(errorSpy.mock.calls).toEqual([['❌ Project not found: 4']]);
      expect(process.exitCode).toBe(1);
    });

    it('logs unexpected errors with the command label', () => {
      const boom = new TypeError('boom');

      reportError('Project list', boom);

      expect(errorSpy).toHaveBeenCalledWith('Project list error:', boom);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('runAction', () => {
    it('passes arguments through and leaves the exit code alone on success', async () => {
      const action = vi.fn((id: number, name: string) => {
        expect([id, name]).toEqual([3, 'thesis']);
      });

      await runAction('Project update', action)(3, 'thesis');

      expect(action).toHaveBeenCalledOnce();
      expect(process.exitCode).toBeUndefined();
    });

    it('reports a rejected action instead of throwing', async () => {
      const wrapped = runAction('Bookmark open', async () => {
        throw new NotFoundError('Bookmark', 12);
      });

      await expect(wrapped()).resolves.toBeUndefined();
      expect(errorSpy.mock.calls).toEqual([['❌ Bookmark not found: 12']]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('option parsers', () => {
    it('parses whole numbers only', () => {
      expect(parseInteger('25')).toBe(25);
      expect(parseInteger('-3')).toBe(-3);
      expect(() => parseInteger('2.5')).toThrow(InvalidArgumentError);
      expect(() => parseInteger('ten')).toThrow('Not a whole number.');
    });

    it('rejects ids below 1', () => {
      expect(parseId('7')).toBe(7);
      expect(() => parseId('0')).toThrow('Not a valid id.');
    });

    it('splits comma lists and drops blanks', () => {
      expect(parseList(' sql, db,,indexes ')).toEqual(['sql', 'db', 'indexes']);
    });

    it('collects repeated values', () => {
      expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
    });
  });
});
