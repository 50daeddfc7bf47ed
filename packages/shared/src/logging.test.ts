import {afterEach, expect, test, vi} from 'vitest';
import {createLogContext, errorOrObject, getLogSink} from './logging.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

test('json sink writes one object per line to stderr', () => {
  const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const sink = getLogSink({level: 'info', format: 'json'});
  sink.log('warn', {tool: 'test'}, 'Skipping', 'line', 2);
  expect(spy).toHaveBeenCalledTimes(1);
  expect(JSON.parse(spy.mock.calls[0][0])).toEqual({
    level: 'WARN',
    tool: 'test',
    message: 'Skipping line 2',
  });
});

test('json sink merges a trailing object', () => {
  const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  getLogSink({level: 'info', format: 'json'}).log('info', undefined, 'Done', {
    lines: 3,
  });
  expect(JSON.parse(spy.mock.calls[0][0])).toEqual({
    level: 'INFO',
    lines: 3,
    message: 'Done',
  });
});

test('text sink prefixes the context', () => {
  const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const lc = createLogContext(
    {log: {level: 'debug', format: 'text'}},
    {tool: 'test'},
  );
  lc.info?.('hello');
  expect(spy).toHaveBeenCalledTimes(1);
  expect(spy.mock.calls[0][0]).toContain('tool=test');
  expect(spy.mock.calls[0][0]).toContain('hello');
});

test('log level filters messages', () => {
  const lc = createLogContext({log: {level: 'warn', format: 'text'}});
  expect(lc.debug).toBeUndefined();
  expect(lc.info).toBeUndefined();
  expect(lc.warn).toBeDefined();
});

test('errorOrObject', () => {
  const cause = new Error('inner');
  const err = new Error('outer', {cause});
  expect(errorOrObject(err)).toMatchObject({
    name: 'Error',
    errorMsg: 'outer',
    cause: {errorMsg: 'inner'},
  });
  expect(errorOrObject({a: 1})).toEqual({a: 1});
  expect(errorOrObject('text')).toBeUndefined();
});
