import { describe, it, expect } from 'vitest';
import { extractDate, matchConfidence, parsePmcFragments, parseSpatialLayout, parseTextFallback } from '../src/engine/pmc-layout.js';
import type { TextFragment } from '../src/engine/pmc-layout.js';

// box centred on (cx, cy)
const frag = (text: string, cx: number, cy: number): TextFragment => ({
  text,
  confidence: 0.9,
  box: { x: cx - 0.05, y: cy - 0.01, width: 0.1, height: 0.02 }
});

const labels = [frag('Fitness', 0.2, 0.3), frag('Form', 0.5, 0.3), frag('Fatigue', 0.8, 0.3)];

describe('parseSpatialLayout', () => {
  it('reads values sitting above their labels', () => {
    const res = parseSpatialLayout([frag('72', 0.2, 0.22), frag('-8', 0.5, 0.22), frag('80', 0.8, 0.22), ...labels]);
    expect(res).toMatchObject({ ctl: 72, tsb: -8, atl: 80, confidence: 0.95 });
  });

  it('strips trend glyphs from numbers', () => {
    const res = parseSpatialLayout([frag('72↑', 0.2, 0.22), frag('▼-8', 0.5, 0.22), frag('80', 0.8, 0.22), ...labels]);
    expect(res).toMatchObject({ ctl: 72, tsb: -8, atl: 80 });
  });

  it('falls back to the nearest number in the value row', () => {
    const res = parseSpatialLayout([frag('72', 0.3, 0.22), frag('-8', 0.55, 0.22), frag('80', 0.9, 0.22), ...labels]);
    expect(res).toMatchObject({ ctl: 72, tsb: -8, atl: 80, confidence: 0.95 });
  });

  it('picks up a stress total near a TSS label', () => {
    const res = parseSpatialLayout([frag('72', 0.2, 0.22), frag('-8', 0.5, 0.22), frag('80', 0.8, 0.22), ...labels, frag('95', 0.2, 0.55), frag('TSS', 0.2, 0.6)]);
    expect(res?.dailyStress).toBe(95);
  });

  it('returns null without numbers or labelled values', () => {
    expect(parseSpatialLayout(labels)).toBeNull();
    expect(parseSpatialLayout([frag('72', 0.2, 0.5), frag('Fitness', 0.2, 0.3)])).toBeNull();
  });
});

describe('parseTextFallback', () => {
  it('reads inline labelled values and a date', () => {
    const res = parseTextFallback('2026-03-10\nCTL: 72 ATL: 80 TSB: -8');
    expect(res).toMatchObject({ ctl: 72, atl: 80, tsb: -8, confidence: 0.95, effectiveDate: '2026-03-10' });
  });

  it('reads numbers placed next to their labels', () => {
    const res = parseTextFallback('72\nFitness\n80\nFatigue\n-8\nForm');
    expect(res.ctl).toBe(72);
    expect(res.atl).toBe(80);
    expect(res.tsb).toBeUndefined();
    expect(res.confidence).toBe(0.75);
  });

  it('reads a header table', () => {
    expect(parseTextFallback('CTL ATL TSB\n72 80 -8')).toMatchObject({ ctl: 72, atl: 80, tsb: -8, confidence: 0.8 });
    expect(parseTextFallback('CTL ATL\n72 80')).toMatchObject({ ctl: 72, atl: 80, tsb: undefined, confidence: 0.6 });
  });

  it('reads daily and weekly stress totals', () => {
    const res = parseTextFallback('Daily TSS: 85\nWeekly TSS: 450');
    expect(res.dailyStress).toBe(85);
    expect(res.weeklyStress).toBe(450);
    expect(res.confidence).toBe(0.2);
  });

  it('reads a stress total placed above its label', () => {
    expect(parseTextFallback('85\nTSS').dailyStress).toBe(85);
  });
});

describe('parsePmcFragments', () => {
  it('uses the text when the layout has no numbers', () => {
    const res = parsePmcFragments([frag('CTL: 72 ATL: 80 TSB: -8', 0.5, 0.5)]);
    expect(res).toMatchObject({ ctl: 72, atl: 80, tsb: -8, confidence: 0.95 });
    expect(res.effectiveDate).toBeUndefined();
  });
});

describe('helpers', () => {
  it('scores the number of matched values', () => {
    expect([3, 2, 1, 0].map(matchConfidence)).toEqual([0.95, 0.75, 0.5, 0.2]);
  });

  it('recognises common date formats', () => {
    expect(extractDate('as of 3/10/2026')).toBe('2026-03-10');
    expect(extractDate('3/10/26')).toBe('2026-03-10');
    expect(extractDate('March 10, 2026')).toBe('2026-03-10');
    expect(extractDate('no date here')).toBeUndefined();
  });
});
