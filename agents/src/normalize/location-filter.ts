/**
 * Location Filter - decides whether a job's location fits the configured targets
 *
 * Precedence:
 * 1. Explicit remote markers include the job.
 * 2. A match against any target, directly or through the alias table
 *    (DC = Washington DC = District of Columbia, metro suburbs, state codes).
 * 3. Empty or unparseable locations include the job (fail-open). A location is
 *    parseable only when it resolves to a known area or state, or names a country.
 * 4. Everything else is excluded.
 *
 * Code-only, no LLM.
 */

import { z } from 'zod';
import aliasData from './location-aliases.json';

export type LocationDecisionReason =
  | 'remote'
  | 'target-match'
  | 'unparseable'
  | 'no-targets'
  | 'no-match';

export interface LocationDecision {
  include: boolean;
  reason: LocationDecisionReason;
  /** The configured target that matched, for `target-match`. */
  matchedTarget?: string;
}

const aliasTableSchema = z.object({
  states: z.record(z.string()),
  areas: z.array(
    z.object({
      id: z.string(),
      names: z.array(z.string()),
      codes: z.array(z.string()),
    }),
  ),
  countries: z.array(z.string()),
});

const aliasTable = aliasTableSchema.parse(aliasData);

const REMOTE_MARKERS =
  /\b(?:remote|remotely|telecommut\w*|telework\w*|work from home|work-from-home|wfh|anywhere)\b/i;

const PLACEHOLDERS = new Set([
  'n a',
  'na',
  'none',
  'unknown',
  'tbd',
  'tba',
  'not specified',
  'various',
  'various locations',
  'multiple locations',
  'see description',
  'location',
]);

/** Lowercase; periods dropped (`D.C.` -> `dc`); other punctuation to spaces. */
export function normalizeLocationText(text: string): string {
  return text
    .toLowerCase()
    .replace(/\./g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

interface NamePattern {
  name: string;
  areaId: string;
}

// Longest names first so `washington dc` is consumed before `washington`.
const NAME_PATTERNS: NamePattern[] = aliasTable.areas
  .flatMap((area) => area.names.map((name) => ({ name: normalizeLocationText(name), areaId: area.id })))
  .sort((a, b) => b.name.length - a.name.length);

const COUNTRY_NAMES = aliasTable.countries.map(normalizeLocationText);

const CODE_AREAS = new Map<string, string[]>();
for (const area of aliasTable.areas) {
  for (const code of area.codes) {
    const key = normalizeLocationText(code);
    CODE_AREAS.set(key, [...(CODE_AREAS.get(key) ?? []), area.id]);
  }
}

/**
 * Areas a location refers to. Names match as whole words anywhere; two-letter
 * codes only as a whole comma/slash separated segment (`Arlington, VA`,
 * `VA 22201`, `DC`), so words like "in" or "or" are never read as states.
 */
export function resolveAreas(location: string): Set<string> {
  const areas = new Set<string>();

  let remaining = ` ${normalizeLocationText(location)} `;
  for (const { name, areaId } of NAME_PATTERNS) {
    const needle = ` ${name} `;
    if (remaining.includes(needle)) {
      areas.add(areaId);
      remaining = remaining.split(needle).join(' | ');
    }
  }

  for (const segment of location.split(/[,/;]|\s+-\s+/)) {
    const normalized = normalizeLocationText(segment);
    const code = normalized.match(/^([a-z]{2})(?: \d{5})?$/)?.[1];
    if (!code) continue;
    for (const areaId of CODE_AREAS.get(code) ?? []) areas.add(areaId);
  }

  return areas;
}

export function isRemoteLocation(location: string): boolean {
  return REMOTE_MARKERS.test(location);
}

function namesCountry(normalized: string): boolean {
  const padded = ` ${normalized} `;
  return COUNTRY_NAMES.some((name) => padded.includes(` ${name} `));
}

export function isUnparseableLocation(location: string): boolean {
  const normalized = normalizeLocationText(location);
  if (!/[a-z]/.test(normalized)) return true;
  if (PLACEHOLDERS.has(normalized)) return true;
  return resolveAreas(location).size === 0 && !namesCountry(normalized);
}

function matchesTarget(location: string, locationAreas: Set<string>, target: string): boolean {
  const normalizedTarget = normalizeLocationText(target);
  if (!normalizedTarget) return false;
  if (` ${normalizeLocationText(location)} `.includes(` ${normalizedTarget} `)) return true;
  for (const area of resolveAreas(target)) {
    if (locationAreas.has(area)) return true;
  }
  return false;
}

export function isLocationMatch(
  location: string | null | undefined,
  targets: readonly string[],
): LocationDecision {
  const text = (location ?? '').trim();

  if (text && isRemoteLocation(text)) return { include: true, reason: 'remote' };

  const placeTargets = targets.filter((t) => t.trim() && !isRemoteLocation(t));
  if (text && placeTargets.length > 0) {
    const locationAreas = resolveAreas(text);
    const matched = placeTargets.find((t) => matchesTarget(text, locationAreas, t));
    if (matched) return { include: true, reason: 'target-match', matchedTarget: matched };
  }

  if (!text || isUnparseableLocation(text)) return { include: true, reason: 'unparseable' };
  if (targets.length === 0) return { include: true, reason: 'no-targets' };
  return { include: false, reason: 'no-match' };
}

export function stateNameForCode(code: string): string | undefined {
  return aliasTable.states[code.toUpperCase()];
}

export function stateCodeForName(name: string): string | undefined {
  const lower = name.trim().toLowerCase();
  return Object.keys(aliasTable.states).find((code) => aliasTable.states[code].toLowerCase() === lower);
}
