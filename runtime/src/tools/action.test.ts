import { describe, it, expect, vi } from 'vitest';
import {
  dispatchAction,
  boolParam,
  intParam,
  invalidParameter,
  missingParameter,
  listParam,
  numberListParam,
  numberParam,
  stringParam,
  nonEmptyParam,
} from './action.js';
import { okResult } from './types.js';
import { silentLogger } from '../utils/logger.js';

describe('dispatchAction', () => {
  const handlers = {
    ping: async () => okResult('pong'),
    boom: async () => {
      throw new Error('kaput');
    },
  };

  it('routes to the named handler', async () => {
    const result = await dispatchAction('Demo', handlers, 'ping', {}, silentLogger);
    expect(result).toEqual({ success: true, output: 'pong', error: null });
  });

  it('reports unknown actions with the available list', async () => {
    const result = await dispatchAction('Demo', handlers, 'fly', {}, silentLogger);
    expect(result.success).toBe(false);
    expect(result.error).toBe('Unknown action: fly. Available actions: ping, boom');
    expect(result.metadata?.code).toBe('INVALID_ACTION');
  });

  it('does not treat inherited properties as actions', async () => {
    const result = await dispatchAction('Demo', handlers, 'toString', {}, silentLogger);
    expect(result.metadata?.code).toBe('INVALID_ACTION');
  });

  it('turns thrown errors into failed results', async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const result = await dispatchAction('Demo', handlers, 'boom', {}, logger);
    expect(result.error).toBe('Demo tool error: kaput');
    expect(result.metadata?.code).toBe('EXECUTION_FAILED');
    expect(logger.error).toHaveBeenCalledWith('Demo tool error: kaput');
  });
});

describe('parameter readers', () => {
  it('reads strings and stringifies scalars', () => {
    expect(stringParam({ a: 'x' }, 'a')).toBe('x');
    expect(stringParam({ a: 5 }, 'a')).toBe('5');
    expect(stringParam({ a: {} }, 'a')).toBeUndefined();
    expect(nonEmptyParam({ a: '' }, 'a')).toBeUndefined();
  });

  it('accepts numeric strings', () => {
    expect(numberParam({ n: '1.5' }, 'n')).toBe(1.5);
    expect(numberParam({ n: 'abc' }, 'n')).toBeUndefined();
    expect(numberParam({ n: '  ' }, 'n')).toBeUndefined();
    expect(intParam({ n: '7' }, 'n')).toBe(7);
    expect(intParam({ n: 7.5 }, 'n')).toBeUndefined();
  });

  it('accepts boolean spellings', () => {
    expect(boolParam({ b: 'TRUE' }, 'b')).toBe(true);
    expect(boolParam({ b: '0' }, 'b')).toBe(false);
    expect(boolParam({ b: 'maybe' }, 'b')).toBeUndefined();
  });

  it('parses number lists from arrays and strings', () => {
    expect(numberListParam({ r: [1, 5] }, 'r')).toEqual([1, 5]);
    expect(numberListParam({ r: '[2, 4]' }, 'r')).toEqual([2, 4]);
    expect(numberListParam({ r: '3,9' }, 'r')).toEqual([3, 9]);
    expect(numberListParam({ r: 'a,b' }, 'r')).toBeUndefined();
  });

  it('splits comma-separated lists', () => {
    expect(listParam({ d: 'task_1, task_2,' }, 'd')).toEqual(['task_1', 'task_2']);
    expect(listParam({ d: ['x', 3, ' y '] }, 'd')).toEqual(['x', 'y']);
    expect(listParam({}, 'd')).toBeUndefined();
  });
});

describe('parameter failures', () => {
  it('separates absent parameters from malformed ones', () => {
    expect(missingParameter('url is required')).toEqual({
      success: false,
      output: null,
      error: 'url is required',
      metadata: { code: 'MISSING_PARAMETER' },
    });
    expect(invalidParameter('count must be positive').metadata?.code).toBe('INVALID_PARAMETER');
  });
});
