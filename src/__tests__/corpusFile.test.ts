import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '../core/errors';
import type { Corpus } from '../core/types';
import {
  mergeCorpora,
  persistCorpus,
  readCorpus,
  repairCorpus,
  summarizeCorpus,
} from '../services/corpusFile';
import { makeRecord } from './helpers/records';

process.env.LOG_LEVEL = 'error';

describe('corpus files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'corpus-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeJson(name: string, value: unknown): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, JSON.stringify(value), 'utf8');
    return path;
  }

  describe('persistCorpus', () => {
    it('writes two-space JSON with readable non-ASCII text and a trailing newline', async () => {
      const record = makeRecord();
      const path = join(dir, 'nested', 'corpus.json');

      await persistCorpus(path, {
        version: 1,
        questions: [record],
        generatedAt: '2026-10-19T06:00:00Z',
        sourceSessions: ['令和6年春期'],
      });

      const text = await readFile(path, 'utf8');
      assert.strictEqual(
        text,
        `${JSON.stringify(
          {
            version: 1,
            generatedAt: '2026-10-19T06:00:00Z',
            sourceSessions: ['令和6年春期'],
            questions: [record],
          },
          null,
          2,
        )}\n`,
      );
      assert.ok(text.includes('"令和6年春期"'));
      assert.deepStrictEqual(await readdir(join(dir, 'nested')), ['corpus.json']);
    });

    it('refuses an invalid corpus before touching the target', async () => {
      const path = join(dir, 'corpus.json');
      await writeFile(path, 'previous contents', 'utf8');

      await assert.rejects(
        persistCorpus(path, {
          version: 1,
          questions: [makeRecord({ id: 'a' }), makeRecord({ id: 'a', text: 'dup' })],
        }),
        ValidationError,
      );
      assert.strictEqual(await readFile(path, 'utf8'), 'previous contents');
      assert.deepStrictEqual(await readdir(dir), ['corpus.json']);
    });

    it('removes its temporary file when the rename fails', async () => {
      const path = join(dir, 'taken');
      await mkdir(path);
      await writeFile(join(path, 'keep.txt'), 'x', 'utf8');

      await assert.rejects(persistCorpus(path, { version: 1, questions: [] }));
      assert.deepStrictEqual(await readdir(dir), ['taken']);
    });
  });

  describe('readCorpus', () => {
    it('rejects malformed JSON with a ValidationError', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{"version": 1, "questions": [', 'utf8');
      await assert.rejects(readCorpus(path), ValidationError);
    });
  });

  describe('repairCorpus', () => {
    it('drops invalid records and later duplicates and reports their ids', () => {
      const keep = makeRecord({ id: 'a' });
      const { corpus, droppedIds } = repairCorpus({
        version: 1,
        questions: [
          keep,
          makeRecord({ id: 'b', answerIndex: 9 }),
          { text: 'no id', choices: ['x'] },
          makeRecord({ id: 'a', text: 'second copy' }),
        ],
        generatedAt: '2026-01-01T00:00:00Z',
      });

      assert.deepStrictEqual(corpus, {
        version: 1,
        questions: [keep],
        generatedAt: '2026-01-01T00:00:00Z',
      });
      assert.deepStrictEqual(droppedIds, ['b', '<missing id>', 'a']);
    });

    it('discards metadata of the wrong type', () => {
      const { corpus, droppedIds } = repairCorpus({
        version: 'two',
        questions: [],
        generatedAt: 20260101,
        sourceSessions: ['令和6年春期', 7],
      });
      assert.deepStrictEqual(corpus, { version: 1, questions: [] });
      assert.deepStrictEqual(droppedIds, []);
    });

    it('turns a non-object into an empty corpus', () => {
      assert.deepStrictEqual(repairCorpus([1, 2]), {
        corpus: { version: 1, questions: [] },
        droppedIds: ['<invalid corpus>'],
      });
    });
  });

  describe('mergeCorpora', () => {
    const corpusA: Corpus = {
      version: 1,
      questions: [makeRecord({ id: 'a', text: 'A' }), makeRecord({ id: 'b', text: 'B' })],
      sourceSessions: ['令和5年秋期'],
    };

    it('merging a corpus with itself changes nothing', async () => {
      const path = await writeJson('a.json', corpusA);
      const out = join(dir, 'out.json');

      const result = await mergeCorpora(path, path, false, out);

      assert.strictEqual(result.added, 0);
      assert.strictEqual(result.replaced, 0);
      assert.deepStrictEqual(result.droppedIds, []);
      assert.deepStrictEqual(result.corpus.questions, corpusA.questions);
      assert.deepStrictEqual(JSON.parse(await readFile(out, 'utf8')).questions, corpusA.questions);
    });

    it('lets preferNew decide which side wins an id collision', async () => {
      const existing = await writeJson('existing.json', {
        version: 1,
        questions: [makeRecord({ id: 'x', answerIndex: 1 })],
      });
      const incoming = await writeJson('incoming.json', {
        version: 1,
        questions: [makeRecord({ id: 'x', answerIndex: 2 })],
      });

      const kept = await mergeCorpora(existing, incoming, false, join(dir, 'kept.json'));
      const replaced = await mergeCorpora(existing, incoming, true, join(dir, 'replaced.json'));

      assert.strictEqual(kept.corpus.questions[0]?.answerIndex, 1);
      assert.deepStrictEqual([kept.added, kept.replaced], [0, 0]);
      assert.strictEqual(replaced.corpus.questions[0]?.answerIndex, 2);
      assert.deepStrictEqual([replaced.added, replaced.replaced], [0, 1]);
    });

    it('appends new records after the existing ones and merges metadata', async () => {
      const existing = await writeJson('existing.json', corpusA);
      const incoming = await writeJson('incoming.json', {
        version: 2,
        generatedAt: '2026-10-19T06:00:00Z',
        sourceSessions: ['令和6年春期', '令和5年秋期'],
        questions: [
          makeRecord({ id: 'c', text: 'C' }),
          makeRecord({ id: 'a', text: 'A2' }),
        ],
      });

      const { corpus, added, replaced } = await mergeCorpora(existing, incoming, true);

      assert.deepStrictEqual(
        corpus.questions.map((record) => [record.id, record.text]),
        [
          ['a', 'A2'],
          ['b', 'B'],
          ['c', 'C'],
        ],
      );
      assert.deepStrictEqual([added, replaced], [1, 1]);
      assert.strictEqual(corpus.version, 2);
      assert.strictEqual(corpus.generatedAt, '2026-10-19T06:00:00Z');
      assert.deepStrictEqual(corpus.sourceSessions, ['令和5年秋期', '令和6年春期']);

      const written = JSON.parse(await readFile(existing, 'utf8'));
      assert.strictEqual(written.questions.length, 3);
    });

    it('starts from an empty corpus when the existing file is missing', async () => {
      const incoming = await writeJson('incoming.json', corpusA);
      const out = join(dir, 'fresh.json');

      const result = await mergeCorpora(join(dir, 'missing.json'), incoming, false, out);

      assert.strictEqual(result.added, 2);
      assert.deepStrictEqual(result.corpus.sourceSessions, ['令和5年秋期']);
    });

    it('repairs the existing corpus and reports what it dropped', async () => {
      const existing = await writeJson('existing.json', {
        version: 1,
        questions: [makeRecord({ id: 'a', text: 'A' }), makeRecord({ id: 'bad', choices: [] })],
      });
      const incoming = await writeJson('incoming.json', { version: 1, questions: [] });

      const result = await mergeCorpora(existing, incoming, false);

      assert.deepStrictEqual(result.droppedIds, ['bad']);
      assert.deepStrictEqual(
        result.corpus.questions.map((record) => record.id),
        ['a'],
      );
    });

    it('aborts on a malformed incoming corpus without writing', async () => {
      const existing = await writeJson('existing.json', corpusA);
      const before = await readFile(existing, 'utf8');
      const incoming = await writeJson('incoming.json', {
        version: 1,
        questions: [makeRecord({ id: 'z', answerIndex: 7 })],
      });

      await assert.rejects(mergeCorpora(existing, incoming, false), ValidationError);
      assert.strictEqual(await readFile(existing, 'utf8'), before);
    });
  });

  describe('summarizeCorpus', () => {
    it('counts per partition and per category', () => {
      assert.deepStrictEqual(
        summarizeCorpus({
          version: 1,
          questions: [
            makeRecord({ id: 'a', partitionKey: 2024, category: 'テクノロジ系' }),
            makeRecord({ id: 'b', partitionKey: 2019, category: 'テクノロジ系' }),
            makeRecord({ id: 'c', partitionKey: 2024, category: 'ストラテジ系' }),
          ],
        }),
        {
          total: 3,
          perPartition: { '2024': 2, '2019': 1 },
          perCategory: { 'テクノロジ系': 2, 'ストラテジ系': 1 },
        },
      );
    });
  });
});
