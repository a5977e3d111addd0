/**
 * Score Parser - pure extraction of a 0-100 score and reasoning from model text.
 *
 * Score, in order of preference:
 * 1. A labelled line: `SCORE: 82`
 * 2. A fraction of 100: `82/100`
 * 3. `score ... 82` within the same line
 * 4. The first bare number in [0, 100]
 * Labelled and fractional values are clamped to [0, 100]; all are rounded.
 * No usable number raises ScoreParseError; there is no default score.
 */

import { ScoreParseError } from '@jobscout/core';

export interface ParsedScore {
  score: number;
  reasoning: string;
}

const NUMBER = String.raw`(\d{1,3}(?:\.\d+)?)`;
// Signed, so a negative score clamps to 0.
const SIGNED_NUMBER = String.raw`(-?\d{1,3}(?:\.\d+)?)`;
const LABELLED_SCORE = new RegExp(
  String.raw`^[\s*#>-]*(?:match\s+)?score\s*\**\s*[:=-]\s*\**\s*${SIGNED_NUMBER}`,
  'im',
);
const OUT_OF_100 = new RegExp(String.raw`${NUMBER}\s*(?:\/|out of)\s*100\b`, 'i');
const INLINE_SCORE = new RegExp(String.raw`\bscore\b[^\d\n]{0,20}?${SIGNED_NUMBER}`, 'i');
const BARE_NUMBER = /(?<![\d.])\d+(?:\.\d+)?(?![\d])/g;

const SECTION_LABELS = ['SCORE', 'REASONING', 'KEY_MATCHES', 'KEY_GAPS'] as const;
type SectionLabel = (typeof SECTION_LABELS)[number];

function clampScore(value: number): number {
  return Math.round(Math.min(100, Math.max(0, value)));
}

function extractScore(text: string): number | null {
  for (const pattern of [LABELLED_SCORE, OUT_OF_100, INLINE_SCORE]) {
    const m = text.match(pattern);
    if (m) return clampScore(Number(m[1]));
  }
  for (const m of text.matchAll(BARE_NUMBER)) {
    const value = Number(m[0]);
    if (value >= 0 && value <= 100) return Math.round(value);
  }
  return null;
}

/** Splits `LABEL: value` sections; a section runs until the next label line. */
function extractSections(text: string): Partial<Record<SectionLabel, string>> {
  const sections: Partial<Record<SectionLabel, string>> = {};
  const labelLine = new RegExp(String.raw`^\s*\**(${SECTION_LABELS.join('|')})\**\s*:\s*(.*)$`, 'i');
  let current: SectionLabel | null = null;
  const lines: string[] = [];

  const flush = () => {
    if (current) sections[current] = lines.join('\n').trim();
    lines.length = 0;
  };

  for (const line of text.split(/\r?\n/)) {
    const m = line.match(labelLine);
    const label = m ? SECTION_LABELS.find((l) => l === m[1].toUpperCase()) : undefined;
    if (m && label) {
      flush();
      current = label;
      lines.push(m[2]);
    } else if (current) {
      lines.push(line);
    }
  }
  flush();
  return sections;
}

function buildReasoning(text: string): string {
  const sections = extractSections(text);
  if (!sections.REASONING) return text.trim();

  let reasoning = sections.REASONING;
  if (sections.KEY_MATCHES) reasoning += `\n\nKey matches: ${sections.KEY_MATCHES}`;
  if (sections.KEY_GAPS && sections.KEY_GAPS.toLowerCase() !== 'none') {
    reasoning += `\nGaps: ${sections.KEY_GAPS}`;
  }
  return reasoning;
}

export function parseScoreResponse(text: string): ParsedScore {
  const score = extractScore(text);
  if (score === null) {
    throw new ScoreParseError('No numeric score found in model response', text);
  }
  return { score, reasoning: buildReasoning(text) };
}
