import { format, isValid, parse } from 'date-fns';
import { groupBy, sumBy } from 'lodash';
import { Card, RARITY_TIERS } from '../../models/Card';
import { patterns } from '../../utils/validation';
import { LoadIssue, issues } from './issues';

const WEIGHT_EPSILON = 1e-9;
const DATE_FORMAT = 'yyyy-MM-dd';

const isCalendarDate = (value: string): boolean =>
  patterns.isoDate.test(value) && isValid(parse(value, DATE_FORMAT, new Date(0)));

/** The date when it is a calendar date, otherwise nothing; the lint reports the rest. */
export const validReleaseDate = (value: unknown): string | undefined =>
  typeof value === 'string' && isCalendarDate(value) ? value : undefined;

/**
 * Release dates carry no ordering invariant; a missing, malformed or future
 * date is reported and otherwise ignored.
 */
export const lintReleaseDate = (setId: string, value: unknown, now: Date): LoadIssue | null => {
  if (value === undefined || value === null || value === '') {
    return issues.releaseDate(setId, null, 'missing');
  }
  if (typeof value !== 'string' || !isCalendarDate(value)) {
    return issues.releaseDate(setId, String(value), 'malformed');
  }
  if (value > format(now, DATE_FORMAT)) {
    return issues.releaseDate(setId, value, 'future');
  }
  return null;
};

/**
 * Pack weights of one rarity tier in one set should not exceed a probability
 * mass of 1. Only the per-card bound is enforced; this is advisory.
 */
export const lintPackWeights = (setId: string, cards: readonly Card[]): LoadIssue[] => {
  const byTier = groupBy(cards, (card) => card.mod_specific.rarity_tier);

  const found: LoadIssue[] = [];
  for (const tier of RARITY_TIERS) {
    const total = sumBy(byTier[tier] ?? [], (card) => card.mod_specific.pack_weight);
    if (total > 1 + WEIGHT_EPSILON) {
      found.push(issues.packWeightMass(setId, tier, Math.round(total * 1e6) / 1e6));
    }
  }
  return found;
};
