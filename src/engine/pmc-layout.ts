import type { PmcObservation } from '../domain/calibration.js';
import { toISO } from '../utils/dates.js';

// Normalized to [0, 1], origin at the top-left, y grows downward
export interface TextBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TextFragment {
  text: string;
  confidence: number;
  box: TextBox;
}

interface Positioned {
  fragment: TextFragment;
  cx: number;
  cy: number;
}

interface NumberFragment extends Positioned {
  value: number;
}

const GLYPHS = /[↓↑⬇⬆▼▲↗↘↙↖→←•️]/gu;

const position = (fragment: TextFragment): Positioned => ({
  fragment,
  cx: fragment.box.x + fragment.box.width / 2,
  cy: fragment.box.y + fragment.box.height / 2
});

export function matchConfidence(matches: number): number {
  if (matches >= 3) return 0.95;
  if (matches === 2) return 0.75;
  if (matches === 1) return 0.5;
  return 0.2;
}

function labelsFor(items: Positioned[], word: string, abbr: string): Positioned[] {
  return items.filter((p) => {
    const t = p.fragment.text.trim().toLowerCase();
    return t.includes(word) || t === abbr;
  });
}

function parseNumberFragment(p: Positioned): NumberFragment | null {
  const cleaned = p.fragment.text.replace(GLYPHS, '').trim();
  if (!/^[+-]?\d+$/.test(cleaned)) return null;
  const value = Number(cleaned);
  if (value < -50 || value > 200) return null;
  return { ...p, value };
}

/**
 * Reads CTL/ATL/TSB from a PMC summary where each value sits above its
 * label (Fitness, Fatigue, Form). Returns null when no label gets a value.
 */
export function parseSpatialLayout(fragments: TextFragment[]): PmcObservation | null {
  const items = fragments.map(position);
  const rawText = fragments.map((f) => f.text).join('\n');

  const fitness = labelsFor(items, 'fitness', 'ctl');
  const form = labelsFor(items, 'form', 'tsb');
  const fatigue = labelsFor(items, 'fatigue', 'atl');

  const numbers = items.map(parseNumberFragment).filter((n): n is NumberFragment => n !== null);
  if (!numbers.length) return null;

  const above = (label: Positioned): number | undefined => {
    const aligned = numbers.filter((n) => Math.abs(n.cx - label.cx) < 0.08 && n.cy < label.cy);
    if (!aligned.length) return undefined;
    return aligned.reduce((best, n) => (Math.abs(n.cy - label.cy) < Math.abs(best.cy - label.cy) ? n : best)).value;
  };
  const firstAbove = (labels: Positioned[]) => {
    for (const label of labels) {
      const v = above(label);
      if (v !== undefined) return v;
    }
    return undefined;
  };

  let ctl = firstAbove(fitness);
  let tsb = firstAbove(form);
  let atl = firstAbove(fatigue);
  let matches = [ctl, tsb, atl].filter((v) => v !== undefined).length;

  const allLabels = [...fitness, ...form, ...fatigue];
  if (matches < 3 && allLabels.length >= 2) {
    const labelY = allLabels.reduce((s, l) => s + l.cy, 0) / allLabels.length;
    const row = numbers.filter((n) => n.cy <= labelY + 0.05).sort((a, b) => a.cx - b.cx);

    if (row.length >= 3) {
      const nearestX = (label: Positioned) =>
        row.reduce((best, n) => (Math.abs(n.cx - label.cx) < Math.abs(best.cx - label.cx) ? n : best)).value;

      for (const label of fitness) {
        if (ctl !== undefined) break;
        ctl = nearestX(label);
        matches++;
      }
      for (const label of form) {
        if (tsb !== undefined) break;
        const v = nearestX(label);
        if (v !== ctl) {
          tsb = v;
          matches++;
        }
      }
      for (const label of fatigue) {
        if (atl !== undefined) break;
        const v = nearestX(label);
        if (v !== ctl && v !== tsb) {
          atl = v;
          matches++;
        }
      }
    }
  }

  let dailyStress: number | undefined;
  const tssLabels = items.filter((p) => p.fragment.text.toLowerCase().includes('tss'));
  for (const label of tssLabels) {
    const hit = numbers.find((n) => Math.abs(n.cx - label.cx) < 0.25 && Math.abs(n.cy - label.cy) < 0.15 && n.value <= 500);
    if (hit) {
      dailyStress = hit.value;
      break;
    }
  }

  if (matches === 0) return null;
  return { ctl, atl, tsb, dailyStress, confidence: matchConfidence(matches), rawText };
}

// Text fallback

const MONTHS = ['january', 'february', 'march', 'april', 'may', 'june', 'july', 'august', 'september', 'october', 'november', 'december'];

function firstCapture(text: string, patterns: RegExp[]): number | undefined {
  for (const pattern of patterns) {
    const m = text.match(pattern);
    if (m?.[1] !== undefined) {
      const v = Number(m[1]);
      if (Number.isFinite(v)) return v;
    }
  }
  return undefined;
}

function lineNumber(line: string): number | undefined {
  const cleaned = line.replace(GLYPHS, '').replace(/tss/gi, '').trim();
  const m = cleaned.match(/([+-]?\d+\.?\d*)/);
  if (!m) return undefined;
  const v = Number(m[1]);
  return v > 0 && v < 500 ? v : undefined;
}

export function extractDate(text: string): string | undefined {
  const us = text.match(/(\d{1,2})\/(\d{1,2})\/(\d{2,4})/);
  if (us) {
    const year = us[3].length === 2 ? 2000 + Number(us[3]) : Number(us[3]);
    return toISO(new Date(year, Number(us[1]) - 1, Number(us[2])));
  }
  const iso = text.match(/(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return toISO(new Date(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3])));

  const long = text.match(/([A-Za-z]+) (\d{1,2}),? (\d{4})/);
  if (long) {
    const month = MONTHS.indexOf(long[1].toLowerCase());
    if (month >= 0) return toISO(new Date(Number(long[3]), month, Number(long[2])));
  }
  return undefined;
}

// "44" on one line, "Fitness" within three lines of it
function nearbyLabels(lines: string[]) {
  const res: { ctl?: number; atl?: number; tsb?: number } = {};
  lines.forEach((line, index) => {
    const value = lineNumber(line);
    if (value === undefined) return;
    for (let i = Math.max(0, index - 3); i <= Math.min(lines.length - 1, index + 3); i++) {
      if (i === index) continue;
      const label = lines[i].toLowerCase();
      if (res.ctl === undefined && /fitness|ctl|chronic/.test(label)) {
        res.ctl = value;
        return;
      }
      if (res.atl === undefined && /fatigue|atl|acute/.test(label)) {
        res.atl = value;
        return;
      }
      if (res.tsb === undefined && /form|tsb|balance/.test(label)) {
        res.tsb = value;
        return;
      }
    }
  });
  return res;
}

const DAILY_TSS = [
  /today[:\s]+([\d.]+)\s*tss/i,
  /daily\s*tss[:\s]+([\d.]+)/i,
  /tss[:\s]+([\d.]+)(?!.*week)/i,
  /([\d.]+)\s*tss\s*today/i,
  /today's\s*tss[:\s]+([\d.]+)/i
];

const WEEKLY_TSS = [
  /weekly\s*tss[:\s]+([\d.]+)/i,
  /7[\s-]*day\s*tss[:\s]+([\d.]+)/i,
  /week[:\s]+([\d.]+)\s*tss/i,
  /tss[:\s]+([\d.]+).*week/i,
  /([\d.]+)\s*tss\s*(?:this\s*)?week/i
];

function stressTotals(lines: string[]) {
  let daily: number | undefined;
  let weekly: number | undefined;
  for (const line of lines) {
    if (daily === undefined) {
      for (const pattern of DAILY_TSS) {
        const v = firstCapture(line, [pattern]);
        if (v !== undefined && v > 0 && v <= 500) {
          daily = v;
          break;
        }
      }
    }
    if (weekly === undefined) {
      for (const pattern of WEEKLY_TSS) {
        const v = firstCapture(line, [pattern]);
        if (v !== undefined && v > 0 && v <= 2000) {
          weekly = v;
          break;
        }
      }
    }
  }

  if (daily === undefined) {
    lines.forEach((line, index) => {
      if (daily !== undefined) return;
      const l = line.trim().toLowerCase();
      if (l !== 'tss' && !l.startsWith('tss ') && !l.endsWith(' tss')) return;
      for (let i = index - 1; i >= Math.max(0, index - 3); i--) {
        const v = lineNumber(lines[i]);
        if (v !== undefined) {
          daily = v;
          return;
        }
      }
    });
  }
  return { daily, weekly };
}

// CTL  ATL  TSB header followed by a row of numbers
function tableRow(lines: string[]) {
  const header = lines.findIndex((l) => /ctl/i.test(l) && /atl/i.test(l));
  if (header < 0 || header + 1 >= lines.length) return null;

  const numbers = lines[header + 1]
    .split(/\s+/)
    .map((t) => t.replace(/,/g, ''))
    .filter((t) => t !== '')
    .map(Number)
    .filter((v) => Number.isFinite(v));
  if (numbers.length < 2) return null;

  return {
    ctl: numbers[0],
    atl: numbers[1],
    tsb: numbers.length >= 3 ? numbers[2] : undefined,
    confidence: numbers.length >= 3 ? 0.8 : 0.6
  };
}

export function parseTextFallback(text: string): PmcObservation {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const { daily, weekly } = stressTotals(lines);
  const base = { dailyStress: daily, weeklyStress: weekly, rawText: text };

  let effectiveDate: string | undefined;
  for (const line of lines) {
    effectiveDate = extractDate(line);
    if (effectiveDate) break;
  }

  // header table before nearby labels
  const table = tableRow(lines);
  if (table) return { ...base, effectiveDate, ctl: table.ctl, atl: table.atl, tsb: table.tsb, confidence: table.confidence };

  let { ctl, atl, tsb } = nearbyLabels(lines);
  let matches = [ctl, atl, tsb].filter((v) => v !== undefined).length;

  if (matches === 0) {
    for (const line of lines) {
      if (ctl === undefined) {
        ctl = firstCapture(line, [/ctl[:\s]+([\d.]+)/i, /fitness[:\s]+([\d.]+)/i, /chronic[:\s]+([\d.]+)/i, /([\d.]+)\s*ctl/i]);
        if (ctl !== undefined) matches++;
      }
      if (atl === undefined) {
        atl = firstCapture(line, [/atl[:\s]+([\d.]+)/i, /fatigue[:\s]+([\d.]+)/i, /acute[:\s]+([\d.]+)/i, /([\d.]+)\s*atl/i]);
        if (atl !== undefined) matches++;
      }
      if (tsb === undefined) {
        tsb = firstCapture(line, [/tsb[:\s]+([+-]?[\d.]+)/i, /form[:\s]+([+-]?[\d.]+)/i, /balance[:\s]+([+-]?[\d.]+)/i, /([+-]?[\d.]+)\s*tsb/i]);
        if (tsb !== undefined) matches++;
      }
    }
  }

  return { ...base, effectiveDate, ctl, atl, tsb, confidence: matchConfidence(matches) };
}

export function parsePmcFragments(fragments: TextFragment[]): PmcObservation {
  const spatial = parseSpatialLayout(fragments);
  if (spatial) return spatial;
  return parseTextFallback(fragments.map((f) => f.text).join('\n'));
}
