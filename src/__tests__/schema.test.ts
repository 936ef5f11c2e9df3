import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ValidationError } from '../core/errors';
import { UNKNOWN_ANSWER, validateCorpus, validateRecord } from '../core/schema';

const base = {
  id: 'p2024-q001',
  partitionKey: 2024,
  category: 'テクノロジ系 » 基礎理論',
  categoryPath: ['テクノロジ系', '基礎理論'],
  text: '2 + 2 は？',
  choices: ['1', '2', '3', '4'],
  answerIndex: 3,
  explanation: '',
  sourceUrl: 'https://quiz.example.test/q1',
};

describe('validateRecord', () => {
  it('accepts a well-formed record unchanged', () => {
    assert.deepStrictEqual(validateRecord(base), base);
  });

  it('rejects answerIndex equal to the number of choices', () => {
    assert.throws(
      () => validateRecord({ ...base, answerIndex: 4 }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.recordId === 'p2024-q001' &&
        err.message ===
          'Invalid record p2024-q001: answerIndex: answerIndex 4 is out of range for 4 choice(s)',
    );
  });

  it('accepts the unknown-answer sentinel', () => {
    assert.strictEqual(validateRecord({ ...base, answerIndex: UNKNOWN_ANSWER }).answerIndex, -1);
  });

  it('rejects answerIndex below -1', () => {
    assert.throws(() => validateRecord({ ...base, answerIndex: -2 }), ValidationError);
  });

  it('rejects an empty choice list', () => {
    assert.throws(
      () => validateRecord({ ...base, choices: [], answerIndex: -1 }),
      (err: unknown) => err instanceof ValidationError && err.recordId === 'p2024-q001',
    );
  });

  it('rejects blank choices and blank ids', () => {
    assert.throws(() => validateRecord({ ...base, choices: ['a', ' '], answerIndex: 0 }), ValidationError);
    assert.throws(
      () => validateRecord({ ...base, id: '  ' }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.recordId === undefined &&
        err.message.startsWith('Invalid record <missing id>: id: id must not be blank'),
    );
  });

  it('allows missing question text', () => {
    assert.strictEqual(validateRecord({ ...base, text: null }).text, null);
  });

  it('fills defaults for fields older corpora omit', () => {
    const record = validateRecord({
      id: 'p2019-q007',
      partitionKey: 2019,
      category: 'unknown',
      text: 'Q',
      choices: ['a', 'b'],
      answerIndex: 1,
    });
    assert.deepStrictEqual(record.categoryPath, []);
    assert.strictEqual(record.explanation, '');
    assert.strictEqual(record.sourceUrl, '');
  });

  it('strips unknown keys', () => {
    const record = validateRecord({ ...base, scratch: 'x' });
    assert.strictEqual('scratch' in record, false);
  });
});

describe('validateCorpus', () => {
  it('defaults the version and drops null metadata', () => {
    const corpus = validateCorpus({ questions: [base], generatedAt: null });
    assert.strictEqual(corpus.version, 1);
    assert.strictEqual(corpus.generatedAt, undefined);
    assert.strictEqual(corpus.questions.length, 1);
  });

  it('rejects repeated ids', () => {
    assert.throws(
      () => validateCorpus({ version: 1, questions: [base, { ...base, text: 'other' }] }),
      /duplicate record id p2024-q001/,
    );
  });

  it('rejects a corpus without a question list', () => {
    assert.throws(() => validateCorpus({ version: 1 }), ValidationError);
  });
});
