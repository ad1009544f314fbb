import { describe, it, expect } from 'vitest';
import { DispatchError, classifyStatus, isDispatchError, toDispatchError } from '../../src/domain/index.js';

describe('classifyStatus', () => {
  it.each([
    [400, 'Client'],
    [404, 'Client'],
    [499, 'Client'],
    [500, 'Server'],
    [503, 'Server'],
    [302, 'Unknown'],
    [199, 'Unknown'],
  ] as const)('%i is %s', (status, expected) => {
    expect(classifyStatus(status)).toBe(expected);
  });
});

describe('DispatchError', () => {
  it('prefixes the message with a description of its kind', () => {
    expect(new DispatchError('run').message).toBe('An error has occurred during run');
    expect(new DispatchError('config', 'LOG_LEVEL is not set').message).toBe(
      'Invalid configuration: LOG_LEVEL is not set',
    );
  });

  it('carries status and status class for run errors', () => {
    const err = new DispatchError('run', 'Server 502', { status: 502 });
    expect(err.status).toBe(502);
    expect(err.statusClass).toBe('Server');
    expect(new DispatchError('io').statusClass).toBeUndefined();
  });

  it('keeps the wrapped failure as cause', () => {
    const inner = new TypeError('fetch failed');
    const err = toDispatchError('transport', inner);
    expect(err.kind).toBe('transport');
    expect(err.cause).toBe(inner);
    expect(err.message).toBe('Transport failure while sending payload: fetch failed');
  });

  it('passes existing DispatchErrors through unchanged', () => {
    const original = new DispatchError('request', 'bad url');
    expect(toDispatchError('transport', original)).toBe(original);
  });

  it('wraps non-Error values', () => {
    expect(toDispatchError('io', 'stream closed').message).toBe(
      'Unable to read collector response: stream closed',
    );
  });
});

describe('isDispatchError', () => {
  it('narrows by kind when given one', () => {
    const err = new DispatchError('serialization');
    expect(isDispatchError(err)).toBe(true);
    expect(isDispatchError(err, 'serialization')).toBe(true);
    expect(isDispatchError(err, 'run')).toBe(false);
    expect(isDispatchError(new Error('plain'))).toBe(false);
  });
});
