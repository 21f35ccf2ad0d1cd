import { describe, it, expect } from 'vitest';
import {
  annualReductionRate,
  coversScope,
  inTimeFrame,
  selectTarget,
  targetDefect,
} from '@/scoring/target_selection';
import type { TimeFrame, TimeFrameWindow } from '@/types/temperature';
import { makeTarget } from '../fixtures/temperature';

const WINDOWS: Record<TimeFrame, TimeFrameWindow> = {
  SHORT: { minExclusive: 0, maxInclusive: 5 },
  MID: { minExclusive: 5, maxInclusive: 15 },
  LONG: { minExclusive: 15, maxInclusive: 30 },
};

describe('target selection', () => {
  describe('coversScope', () => {
    it('requires every emission category of the scope', () => {
      const s1s2 = makeTarget('A', { scopes: ['S1', 'S2'] });
      expect(coversScope(s1s2, 'S1')).toBe(true);
      expect(coversScope(s1s2, 'S1S2')).toBe(true);
      expect(coversScope(s1s2, 'S3')).toBe(false);
      expect(coversScope(s1s2, 'S1S2S3')).toBe(false);
    });

    it('accepts a full-coverage target for any scope', () => {
      const all = makeTarget('A', { scopes: ['S1', 'S2', 'S3'] });
      expect(coversScope(all, 'S1S2S3')).toBe(true);
      expect(coversScope(all, 'S3')).toBe(true);
    });
  });

  describe('inTimeFrame', () => {
    it('uses the horizon from base year with exclusive lower bounds', () => {
      expect(inTimeFrame(makeTarget('A', { baseYear: 2020, targetYear: 2025 }), WINDOWS.SHORT)).toBe(true);
      expect(inTimeFrame(makeTarget('A', { baseYear: 2020, targetYear: 2025 }), WINDOWS.MID)).toBe(false);
      expect(inTimeFrame(makeTarget('A', { baseYear: 2020, targetYear: 2035 }), WINDOWS.MID)).toBe(true);
      expect(inTimeFrame(makeTarget('A', { baseYear: 2020, targetYear: 2050 }), WINDOWS.LONG)).toBe(true);
      expect(inTimeFrame(makeTarget('A', { baseYear: 2020, targetYear: 2051 }), WINDOWS.LONG)).toBe(false);
    });
  });

  describe('annualReductionRate', () => {
    it('spreads the reduction over the years from the start year', () => {
      expect(annualReductionRate(makeTarget('A', { reductionPct: 44 }))).toBe(4);
      expect(annualReductionRate(makeTarget('A', { reductionPct: 30, startYear: 2024 }))).toBe(5);
    });
  });

  describe('targetDefect', () => {
    it('accepts a well-formed target', () => {
      expect(targetDefect(makeTarget('A'))).toBeNull();
    });

    it('flags targets ending before they start', () => {
      expect(targetDefect(makeTarget('A', { baseYear: 2030, targetYear: 2030 }))).toBe(
        'target year 2030 is not after start year 2030'
      );
    });

    it('flags negative or missing reductions', () => {
      expect(targetDefect(makeTarget('A', { reductionPct: -5 }))).toBe(
        'reduction -5 is not a non-negative number'
      );
      expect(targetDefect(makeTarget('A', { reductionPct: Number.NaN }))).toBe(
        'reduction NaN is not a non-negative number'
      );
    });

    it('flags targets without scopes', () => {
      expect(targetDefect(makeTarget('A', { scopes: [] }))).toBe('no scope coverage');
    });
  });

  describe('selectTarget', () => {
    it('returns null when nothing qualifies', () => {
      expect(selectTarget([makeTarget('A')], 'S3', 'MID', WINDOWS)).toBeNull();
      expect(selectTarget([makeTarget('A')], 'S1S2', 'SHORT', WINDOWS)).toBeNull();
    });

    it('prefers validated targets over more ambitious pending ones', () => {
      const pending = makeTarget('A', { targetId: 'pending', status: 'pending', reductionPct: 60 });
      const validated = makeTarget('A', { targetId: 'validated', reductionPct: 40 });
      expect(selectTarget([pending, validated], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('validated');
    });

    it('then prefers the larger reduction', () => {
      const modest = makeTarget('A', { targetId: 'modest', reductionPct: 40 });
      const ambitious = makeTarget('A', { targetId: 'ambitious', reductionPct: 50 });
      expect(selectTarget([modest, ambitious], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('ambitious');
    });

    it('then prefers the later target year', () => {
      const early = makeTarget('A', { targetId: 'early', targetYear: 2028 });
      const late = makeTarget('A', { targetId: 'late', targetYear: 2030 });
      expect(selectTarget([late, early], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('late');
      expect(selectTarget([early, late], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('late');
    });

    it('then prefers an exact scope match', () => {
      const broad = makeTarget('A', { targetId: 'broad', scopes: ['S1', 'S2', 'S3'] });
      const exact = makeTarget('A', { targetId: 'exact', scopes: ['S1', 'S2'] });
      expect(selectTarget([broad, exact], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('exact');
    });

    it('keeps input order for full ties', () => {
      const first = makeTarget('A', { targetId: 'first' });
      const second = makeTarget('A', { targetId: 'second' });
      expect(selectTarget([first, second], 'S1S2', 'MID', WINDOWS)?.targetId).toBe('first');
    });
  });
});
