/**
 * Unit Tests: Template Editor
 *
 * End-to-end find/replace/remove flows against the in-memory engine:
 * per-key outcomes, the styled -> plain fallback chain, and persistence.
 */
import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { TemplateEditor, withTemplateEditor } from '../templateEditor';
import { readMappingFile } from '../mappingFile';
import { UNENCODABLE_DETAIL } from '../replacementExecutor';
import { InvalidRequestError } from '../../errors';
import {
  FakeEngine,
  RED,
  makeTempDir,
  readFakeDocument,
  run,
  writeFakeDocument,
  type FakeEngineOptions,
} from './fakeEngine';
import type { RawTextRun } from '../../types';

const NAME_KEY = 'p0_x10y10a60b20_{{name}}';

let dir: string;
let docPath: string;

async function openWith(pages: RawTextRun[][], options: FakeEngineOptions = {}) {
  await writeFakeDocument(docPath, pages);
  const engine = new FakeEngine(options);
  const editor = await TemplateEditor.open(docPath, { engine });
  return { engine, editor };
}

function formPage(): RawTextRun[] {
  return [run('{{name}}', 10, 10, 60, 20, RED), run('Label', 100, 10, 140, 20)];
}

async function savedTexts(page = 0): Promise<string[]> {
  const doc = await readFakeDocument(docPath);
  return doc.pages[page].map((r) => r.text);
}

beforeEach(async () => {
  dir = await makeTempDir();
  docPath = path.join(dir, 'form.pdf');
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

// ─── findFields ──────────────────────────────────────────────

describe('findFields', () => {
  test('filters by color and writes a mapping file', async () => {
    const { editor } = await openWith([formPage()]);
    const mapping = path.join(dir, 'form.yaml');

    const runs = await editor.findFields({ colorFilter: 'red', mappingFile: mapping });

    expect(runs.map((r) => r.key)).toEqual([NAME_KEY]);
    expect(await readMappingFile(mapping)).toEqual({ [NAME_KEY]: '{{name}}' });
    await editor.close();
  });

  test('no mapping file when nothing matches', async () => {
    const { editor } = await openWith([[run('Label', 100, 10, 140, 20)]]);
    const mapping = path.join(dir, 'form.yaml');

    expect(await editor.findFields({ colorFilter: 'red', mappingFile: mapping })).toEqual([]);
    await expect(fs.access(mapping)).rejects.toThrow();
    await editor.close();
  });

  test('listTexts returns unique sorted texts', async () => {
    const { editor } = await openWith([[run('b', 0, 0, 1, 1), run('a', 0, 5, 1, 6), run('b', 0, 9, 1, 10)]]);
    expect(await editor.listTexts()).toEqual(['a', 'b']);
    await editor.close();
  });
});

// ─── replaceFields ───────────────────────────────────────────

describe('replaceFields', () => {
  test('applies valid keys and reports the rest', async () => {
    const { engine, editor } = await openWith([formPage()]);

    const report = await editor.replaceFields({
      'not-a-key': 'y',
      'p0_x300y300a350b310_{{gone}}': 'x',
      [NAME_KEY]: 'Alice',
    });

    expect(report.requested).toBe(3);
    expect(report.applied).toBe(1);
    expect(report.outcomes).toEqual([
      expect.objectContaining({ key: 'not-a-key', status: 'skipped', reason: 'malformed-key' }),
      { key: 'p0_x300y300a350b310_{{gone}}', status: 'skipped', reason: 'no-matching-run' },
      { key: NAME_KEY, status: 'applied', usedFallback: false },
    ]);

    expect(engine.calls.filter((c) => c.op === 'styled')).toEqual([
      {
        op: 'styled',
        page: 0,
        box: { x1: 10, y1: 10, x2: 60, y2: 20 },
        text: 'Alice',
        fontSize: 12,
        color: { r: 0, g: 0, b: 0 },
        fontFamily: 'Helvetica',
      },
    ]);
    expect(await savedTexts()).toEqual(['Label', 'Alice']);
    await editor.close();
  });

  test('falls back to plain text at the baseline', async () => {
    const { engine, editor } = await openWith([formPage()], { failStyled: true });

    const report = await editor.replaceFields({ [NAME_KEY]: 'Alice' });

    expect(report.outcomes).toEqual([{ key: NAME_KEY, status: 'applied', usedFallback: true }]);
    const plain = engine.calls.find((c) => c.op === 'plain');
    expect(plain).toEqual({
      op: 'plain',
      page: 0,
      position: { x: 10, y: 18 },
      text: 'Alice',
      fontSize: 12,
      fontName: 'Helvetica',
      color: { r: 0, g: 0, b: 0 },
    });
    await editor.close();
  });

  test('both insertions failing is reported, removal still persisted', async () => {
    const { engine, editor } = await openWith([formPage()], { failStyled: true, failPlain: true });

    const report = await editor.replaceFields({ [NAME_KEY]: 'Alice' });

    expect(report.applied).toBe(0);
    expect(report.outcomes).toEqual([
      { key: NAME_KEY, status: 'skipped', reason: 'insert-failed', detail: 'plain insertion unsupported' },
    ]);
    expect(engine.calls.filter((c) => c.op === 'save')).toHaveLength(1);
    expect(await savedTexts()).toEqual(['Label']);
    await editor.close();
  });

  test('replacement no font can encode leaves the field in place', async () => {
    const { engine, editor } = await openWith([formPage()], { unencodable: 'Ж' });

    const report = await editor.replaceFields({ [NAME_KEY]: 'Жанна' });

    expect(report.outcomes).toEqual([
      { key: NAME_KEY, status: 'skipped', reason: 'insert-failed', detail: UNENCODABLE_DETAIL },
    ]);
    expect(engine.calls).toEqual([]);
    expect(await savedTexts()).toEqual(['{{name}}', 'Label']);
    await editor.close();
  });

  test('occurrence drifted out of tolerance is skipped without saving', async () => {
    const { engine, editor } = await openWith([formPage()], { occurrenceShift: 15 });

    const report = await editor.replaceFields({ [NAME_KEY]: 'Alice' });

    expect(report.outcomes).toEqual([{ key: NAME_KEY, status: 'skipped', reason: 'occurrence-not-found' }]);
    expect(engine.calls).toEqual([]);
    await editor.close();
  });

  test('redaction that removes nothing is skipped', async () => {
    const { engine, editor } = await openWith([formPage()], { redactNothing: true });

    const report = await editor.replaceFields({ [NAME_KEY]: 'Alice' });

    expect(report.outcomes).toEqual([
      { key: NAME_KEY, status: 'skipped', reason: 'occurrence-not-found', detail: 'no glyphs inside region' },
    ]);
    expect(engine.calls.map((c) => c.op)).toEqual(['redact']);
    await editor.close();
  });

  test('empty replacement blanks the field', async () => {
    const { engine, editor } = await openWith([formPage()]);

    const report = await editor.replaceFields({ [NAME_KEY]: '' });

    expect(report.outcomes).toEqual([{ key: NAME_KEY, status: 'applied', usedFallback: false }]);
    expect(engine.calls.map((c) => c.op)).toEqual(['redact', 'save']);
    expect(await savedTexts()).toEqual(['Label']);
    await editor.close();
  });

  test('target on a page beyond the document is not matched', async () => {
    const { editor } = await openWith([formPage()]);
    const report = await editor.replaceFields({ 'p5_x10y10a60b20_{{name}}': 'Alice' });
    expect(report.outcomes).toEqual([
      { key: 'p5_x10y10a60b20_{{name}}', status: 'skipped', reason: 'no-matching-run' },
    ]);
    await editor.close();
  });

  test('empty request throws', async () => {
    const { editor } = await openWith([formPage()]);
    await expect(editor.replaceFields({})).rejects.toBeInstanceOf(InvalidRequestError);
    await editor.close();
  });

  test('new runs are visible after a replace', async () => {
    const { editor } = await openWith([formPage()]);
    await editor.replaceFields({ [NAME_KEY]: 'Alice' });

    const runs = await editor.findFields();
    expect(runs.map((r) => r.text)).toEqual(['Label', 'Alice']);
    await editor.close();
  });
});

// ─── removePlaceholders ──────────────────────────────────────

describe('removePlaceholders', () => {
  test('strips placeholders and reinserts leftover text at the top-left point', async () => {
    const { engine, editor } = await openWith([[
      run('Name: {{name}}', 10, 10, 100, 20),
      run('{{x}}', 10, 30, 40, 40),
      run('Plain', 10, 50, 40, 60),
    ]]);

    const report = await editor.removePlaceholders();

    expect(report).toEqual({ success: true, removed: 2 });
    expect(engine.calls.filter((c) => c.op === 'plain')).toEqual([
      {
        op: 'plain',
        page: 0,
        position: { x: 10, y: 10 },
        text: 'Name:',
        fontSize: 12,
        fontName: 'Helvetica',
        color: { r: 0, g: 0, b: 0 },
      },
    ]);
    expect(await savedTexts()).toEqual(['Plain', 'Name:']);
    await editor.close();
  });

  test('a run the redaction could not touch gets no reinserted text', async () => {
    const { engine, editor } = await openWith(
      [[run('Name: {{x}}', 10, 10, 100, 20), run('{{y}}', 10, 30, 40, 40)]],
      { unredactable: ['Name: {{x}}'] },
    );

    expect(await editor.removePlaceholders()).toEqual({ success: true, removed: 1 });
    expect(engine.calls.filter((c) => c.op === 'plain')).toEqual([]);
    expect(await savedTexts()).toEqual(['Name: {{x}}']);
    await editor.close();
  });

  test('nothing to remove leaves the file untouched', async () => {
    const { engine, editor } = await openWith([[run('Plain', 10, 50, 40, 60)]]);

    expect(await editor.removePlaceholders()).toEqual({ success: true, removed: 0 });
    expect(engine.calls).toEqual([]);
    await editor.close();
  });

  test('accepts a custom pattern string', async () => {
    const { editor } = await openWith([[run('[[x]]', 10, 10, 40, 20), run('{{y}}', 10, 30, 40, 40)]]);

    expect(await editor.removePlaceholders('\\[\\[.*?\\]\\]')).toEqual({ success: true, removed: 1 });
    expect(await savedTexts()).toEqual(['{{y}}']);
    await editor.close();
  });
});

// ─── withTemplateEditor ──────────────────────────────────────

describe('withTemplateEditor', () => {
  test('closes the document when the callback throws', async () => {
    await writeFakeDocument(docPath, [formPage()]);
    const engine = new FakeEngine();

    await expect(
      withTemplateEditor(docPath, async () => {
        throw new Error('boom');
      }, { engine }),
    ).rejects.toThrow('boom');
    expect(engine.closed).toBe(1);
  });

  test('returns the callback result', async () => {
    await writeFakeDocument(docPath, [formPage()]);
    const engine = new FakeEngine();

    const count = await withTemplateEditor(docPath, async (editor) => (await editor.findFields()).length, { engine });
    expect(count).toBe(2);
    expect(engine.closed).toBe(1);
  });
});
