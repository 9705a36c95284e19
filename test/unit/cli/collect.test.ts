import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { executeCollect, parseIndent, type CollectOptions } from '../../../src/cli/commands/collect.js';
import { globalsBanner } from '../../../src/wizard/prompts.js';
import { captureOutput, scriptedInput, silentLogger } from '../../helpers/streams.js';

const SESSION = ['x 42', 'n', 'a.txt', '/tmp', 't1', 'n', 'n', 'ls -a -l', 'n'];

const EXPECTED = {
  global: { x: 42 },
  files: [{ name: 'a.txt', path: '/tmp', template: 't1', local: null }],
  commands: [{ name: 'ls', args: ['-a', '-l'] }],
};

describe('executeCollect', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tmplwiz-collect-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function run(lines: string[], options: Partial<CollectOptions> = {}) {
    const stdout = captureOutput();
    const stderr = captureOutput();
    const code = await executeCollect(
      { dir: tmpDir, ...options },
      {
        stdin: scriptedInput(lines),
        stdout: stdout.stream,
        stderr: stderr.stream,
        logger: silentLogger(),
        env: {},
        globalDir: tmpDir,
      },
    );
    return { code, stdout: stdout.text(), stderr: stderr.text() };
  }

  it('prints the document after the prompts', async () => {
    const result = await run(SESSION);
    expect(result.code).toBe(0);
    expect(result.stderr).toBe('');
    expect(result.stdout.endsWith(`Add next value: y/n? ${JSON.stringify(EXPECTED)}\n`)).toBe(true);
  });

  it('writes the document to the output file instead of stdout', async () => {
    const target = path.join(tmpDir, 'wizard.json');
    const result = await run(SESSION, { output: target });

    expect(result.code).toBe(0);
    expect(await fs.readFile(target, 'utf-8')).toBe(`${JSON.stringify(EXPECTED)}\n`);
    expect(result.stdout).not.toContain('"global"');
  });

  it('indents as configured in the project file', async () => {
    await fs.writeFile(path.join(tmpDir, '.tmplwiz.yaml'), 'output:\n  indent: 2\n');
    const result = await run(SESSION);
    expect(result.stdout.endsWith(`${JSON.stringify(EXPECTED, null, 2)}\n`)).toBe(true);
  });

  it('exits 1 without a document when collection fails', async () => {
    const result = await run(['', 'n']);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe(globalsBanner({ yes: 'y', no: 'n' }));
    expect(result.stderr).toBe('\nfailed to process config: global variables: incorrect number of tokens\n');
  });

  it('honours --strict-answers', async () => {
    const result = await run(['n', 'a.txt', '/tmp', 't1', 'n', 'maybe'], { strictAnswers: true });
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(
      '\nfailed to process config: file parameters: unexpected answer "maybe": expected y or n\n',
    );
  });

  it('reports an unwritable output but still exits 0', async () => {
    const target = path.join(tmpDir, 'missing', 'wizard.json');
    const result = await run(SESSION, { output: target });
    expect(result.code).toBe(0);
    expect(result.stderr).toMatch(/^failed to produce output: ENOENT/);
  });

  it('exits 1 on invalid configuration before prompting', async () => {
    await fs.writeFile(path.join(tmpDir, '.tmplwiz.yaml'), 'answers:\n  policy: picky\n');
    const result = await run(SESSION);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toMatch(/^failed to load config: Invalid configuration: answers\.policy: /);
  });
});

describe('parseIndent', () => {
  it('accepts 0 through 8', () => {
    expect(parseIndent('0')).toBe(0);
    expect(parseIndent('8')).toBe(8);
  });

  it('rejects anything else', () => {
    expect(() => parseIndent('9')).toThrow('indent must be an integer from 0 to 8.');
    expect(() => parseIndent('1.5')).toThrow('indent must be an integer from 0 to 8.');
  });
});
