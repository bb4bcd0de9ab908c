/**
 * Unit Tests: CLI Commands
 *
 * Exit codes and printed lines for each command, driven through runCli with
 * a capturing IO and the in-memory engine.
 */
import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, runCli, type CliIO } from '../commands';
import {
  FakeEngine,
  RED,
  makeTempDir,
  run,
  writeFakeDocument,
} from '../../engine/__tests__/fakeEngine';

const NAME_KEY = 'p0_x10y10a60b20_{{name}}';

interface Captured extends CliIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

let dir: string;
let docPath: string;
let io: Captured;

function cli(...argv: string[]): Promise<number> {
  return runCli(argv, io, {}, { engine: new FakeEngine() });
}

beforeEach(async () => {
  dir = await makeTempDir();
  docPath = path.join(dir, 'form.pdf');
  io = captureIO();
  await writeFakeDocument(docPath, [[
    run('{{name}}', 10, 10, 60, 20, RED),
    run('Label', 100, 10, 140, 20),
  ]]);
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

// ─── usage ───────────────────────────────────────────────────

describe('usage', () => {
  test('no command prints usage and exits 2', async () => {
    expect(await cli()).toBe(EXIT_USAGE);
    expect(io.stdout).toEqual([USAGE]);
  });

  test('--help exits 0', async () => {
    expect(await cli('--help')).toBe(EXIT_OK);
    expect(io.stdout).toEqual([USAGE]);
  });

  test('unknown command', async () => {
    expect(await cli('frobnicate')).toBe(EXIT_USAGE);
    expect(io.stderr[0]).toBe('Error: Unknown command: frobnicate');
  });

  test('unknown option', async () => {
    expect(await cli('list', docPath, '--bogus')).toBe(EXIT_USAGE);
  });

  test('wrong argument count', async () => {
    expect(await cli('generate', docPath)).toBe(EXIT_USAGE);
    expect(io.stderr[0]).toBe('Error: Expected 2 arguments, got 1');
  });

  test('invalid configuration exits 1', async () => {
    const code = await runCli(['list', docPath], io, { LOG_LEVEL: 'loud' }, { engine: new FakeEngine() });
    expect(code).toBe(EXIT_FAILURE);
    expect(io.stderr[0].startsWith('Error [INVALID_CONFIG]: ')).toBe(true);
  });
});

// ─── generate / replace ──────────────────────────────────────

describe('generate', () => {
  test('with a filter writes only red fields', async () => {
    const out = path.join(dir, 'form.yaml');
    expect(await cli('generate', docPath, out, '--filter-color', 'red')).toBe(EXIT_OK);
    expect(io.stdout).toEqual([`Found 1 fields, mapping saved to ${out}`]);
    expect(await fs.readFile(out, 'utf8')).toBe(`"${NAME_KEY}": "{{name}}"\n`);
  });

  test('without a filter extracts all text', async () => {
    const out = path.join(dir, 'all.yaml');
    expect(await cli('generate', docPath, out)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([`Found 2 fields, mapping saved to ${out}`]);
  });

  test('mapping lists fields in reading order', async () => {
    await writeFakeDocument(docPath, [[
      run('{{city}}', 10, 50, 60, 60, RED),
      run('{{zip}}', 80, 10, 120, 20, RED),
      run('{{name}}', 10, 10, 60, 20, RED),
    ]]);
    const out = path.join(dir, 'form.yaml');

    expect(await cli('generate', docPath, out, '--filter-color', 'red')).toBe(EXIT_OK);
    expect(await fs.readFile(out, 'utf8')).toBe(
      `"${NAME_KEY}": "{{name}}"\n` +
        '"p0_x80y10a120b20_{{zip}}": "{{zip}}"\n' +
        '"p0_x10y50a60b60_{{city}}": "{{city}}"\n',
    );
  });

  test('unsupported filter color is a usage error', async () => {
    expect(await cli('generate', docPath, path.join(dir, 'x.yaml'), '--filter-color', 'blue')).toBe(EXIT_USAGE);
  });
});

describe('replace', () => {
  test('applies a mapping file', async () => {
    const mapping = path.join(dir, 'values.yaml');
    await fs.writeFile(mapping, `"${NAME_KEY}": "Alice"\n`, 'utf8');

    expect(await cli('replace', docPath, mapping)).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['Replaced 1 of 1 fields']);
  });

  test('nothing applied exits 1 and lists skipped keys', async () => {
    const mapping = path.join(dir, 'values.yaml');
    await fs.writeFile(mapping, '"p0_x300y300a350b310_{{gone}}": "x"\n', 'utf8');

    expect(await cli('replace', docPath, mapping)).toBe(EXIT_FAILURE);
    expect(io.stdout).toEqual([
      'skipped p0_x300y300a350b310_{{gone}}: no-matching-run',
      'Replaced 0 of 1 fields',
    ]);
  });

  test('missing document reports an open failure', async () => {
    const mapping = path.join(dir, 'values.yaml');
    await fs.writeFile(mapping, `"${NAME_KEY}": "Alice"\n`, 'utf8');

    expect(await cli('replace', path.join(dir, 'missing.pdf'), mapping)).toBe(EXIT_FAILURE);
    expect(io.stderr[0].startsWith('Error [DOCUMENT_OPEN_FAILED]: ')).toBe(true);
  });
});

// ─── clear / list / set ──────────────────────────────────────

describe('clear', () => {
  test('removes placeholders', async () => {
    expect(await cli('clear', docPath)).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['Removed 1 placeholders']);
  });

  test('invalid pattern is a usage error', async () => {
    expect(await cli('clear', docPath, '--pattern', '([')).toBe(EXIT_USAGE);
  });
});

describe('list', () => {
  test('prints red fields', async () => {
    expect(await cli('list', docPath)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([`${NAME_KEY}: "{{name}}"`]);
  });

  test('rejects a non-PDF path', async () => {
    expect(await cli('list', path.join(dir, 'notes.txt'))).toBe(EXIT_FAILURE);
    expect(io.stderr).toEqual([`Error [INVALID_PATH]: File must be a PDF: ${path.join(dir, 'notes.txt')}`]);
  });
});

describe('set', () => {
  test('sets a field by key', async () => {
    expect(await cli('set', docPath, `${NAME_KEY}=Alice`)).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['Replaced 1 of 1 fields']);
  });

  test('value may contain =', async () => {
    expect(await cli('set', docPath, `${NAME_KEY}=a=b`)).toBe(EXIT_OK);
  });

  test('assignment without a name is a usage error', async () => {
    expect(await cli('set', docPath, '=Alice')).toBe(EXIT_USAGE);
    expect(io.stderr[0]).toBe('Error: Expected name=value, got: =Alice');
  });
});
