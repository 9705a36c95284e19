import { describe, it, expect } from 'vitest';
import { PassThrough, Readable } from 'stream';
import { LineReader } from '../../../src/wizard/line-reader.js';
import { InputReadError } from '../../../src/core/errors.js';

describe('LineReader', () => {
  it('hands out lines in order, then null', async () => {
    const reader = new LineReader(Readable.from(['alpha\nbeta\n']));
    expect(await reader.read()).toBe('alpha');
    expect(await reader.read()).toBe('beta');
    expect(await reader.read()).toBeNull();
    expect(await reader.read()).toBeNull();
  });

  it('returns a final line that has no terminator', async () => {
    const reader = new LineReader(Readable.from(['one\ntwo']));
    expect(await reader.read()).toBe('one');
    expect(await reader.read()).toBe('two');
    expect(await reader.read()).toBeNull();
  });

  it('strips CRLF terminators', async () => {
    const reader = new LineReader(Readable.from(['a b\r\nc\r\n']));
    expect(await reader.read()).toBe('a b');
    expect(await reader.read()).toBe('c');
  });

  it('keeps empty lines', async () => {
    const reader = new LineReader(Readable.from(['\nx\n']));
    expect(await reader.read()).toBe('');
    expect(await reader.read()).toBe('x');
  });

  it('resolves a pending read when the line arrives', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);

    const pending = reader.read();
    input.write('hello\n');
    expect(await pending).toBe('hello');

    const last = reader.read();
    input.end();
    expect(await last).toBeNull();
  });

  it('rejects reads with InputReadError when the input fails', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);

    const pending = reader.read();
    input.destroy(new Error('device gone'));

    await expect(pending).rejects.toBeInstanceOf(InputReadError);
    await expect(reader.read()).rejects.toThrow('read input: device gone');
  });

  it('reports end of input after close', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);
    reader.close();
    expect(await reader.read()).toBeNull();
  });
});
