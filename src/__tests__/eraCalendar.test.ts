import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DateTime } from 'luxon';
import {
  eraToGregorian,
  generationTimestamp,
  startTimeToken,
} from '../core/eraCalendar';

describe('eraToGregorian', () => {
  it('converts Reiwa and Heisei years', () => {
    assert.strictEqual(eraToGregorian('令和6年春期'), 2024);
    assert.strictEqual(eraToGregorian('令和5年秋期'), 2023);
    assert.strictEqual(eraToGregorian('平成31年春期'), 2019);
    assert.strictEqual(eraToGregorian('平成21年秋期'), 2009);
  });

  it('reads 元年 as the first year of the era', () => {
    assert.strictEqual(eraToGregorian('令和元年秋期'), 2019);
  });

  it('folds full-width digits', () => {
    assert.strictEqual(eraToGregorian('令和６年春期'), 2024);
  });

  it('falls back to a four-digit Gregorian year', () => {
    assert.strictEqual(eraToGregorian('2025春'), 2025);
  });

  it('throws when the label carries no year', () => {
    assert.throws(() => eraToGregorian('特別回'), /Unable to parse year from label: 特別回/);
  });
});

describe('time tokens', () => {
  it('startTimeToken is whole Unix seconds', () => {
    const now = DateTime.fromMillis(1_700_000_000_900);
    assert.strictEqual(startTimeToken(now), '1700000000');
  });

  it('generationTimestamp is UTC without milliseconds', () => {
    const now = DateTime.fromISO('2026-10-19T15:04:05.123+09:00', { setZone: true });
    assert.strictEqual(generationTimestamp(now), '2026-10-19T06:04:05Z');
  });
});
