import { RarityTier } from '../../models/Card';
import { ValidationDetail } from '../../utils/validation';

/**
 * `error` issues dropped a set or a card, `warning` issues flag data that was
 * kept (or a duplicate that was skipped), `lint` issues are advisory only.
 */
export type IssueSeverity = 'error' | 'warning' | 'lint';

export interface FileDigest {
  sha: string;
  size: number;
}

export type LoadIssue =
  | { code: 'MalformedSet'; severity: 'error'; message: string; setId: string; reason: string }
  | { code: 'SetUnreachable'; severity: 'error'; message: string; setId: string; location: string; reason: string }
  | { code: 'SetIdMismatch'; severity: 'error'; message: string; setId: string; actualId: string }
  | {
      code: 'CardCountMismatch';
      severity: 'error';
      message: string;
      setId: string;
      declared: number;
      declaredInSet: number;
      actual: number;
    }
  | {
      code: 'InvalidCard';
      severity: 'error';
      message: string;
      setId: string;
      cardIndex: number;
      reason: string;
      details: ValidationDetail[];
    }
  | {
      code: 'DuplicateCardId';
      severity: 'warning';
      message: string;
      setId: string;
      cardIndex: number;
      cardId: number;
      keptInSet: string;
    }
  | {
      code: 'UnknownCardType';
      severity: 'warning';
      message: string;
      setId: string;
      cardIndex: number;
      cardId: number;
      type: string;
    }
  | { code: 'ManifestUnavailable'; severity: 'warning'; message: string; location: string; reason: string }
  | {
      code: 'ManifestMismatch';
      severity: 'warning';
      message: string;
      setId: string;
      key: string;
      expected: FileDigest | null;
      actual: FileDigest;
    }
  | {
      code: 'ReleaseDate';
      severity: 'lint';
      message: string;
      setId: string;
      value: string | null;
      problem: 'missing' | 'malformed' | 'future';
    }
  | { code: 'PackWeightMass'; severity: 'lint'; message: string; setId: string; tier: RarityTier; total: number }
  | {
      code: 'TagFormat';
      severity: 'lint';
      message: string;
      setId: string;
      cardIndex: number;
      cardId: number;
      tag: string;
      problem: 'format' | 'duplicate';
    };

export type LoadFailure =
  | { code: 'MalformedIndex'; source: string; message: string; details: ValidationDetail[] }
  | { code: 'DuplicateSetId'; source: string; message: string; setId: string }
  | { code: 'UnreachableSource'; source: string; message: string }
  | { code: 'LoadCancelled'; source: string; message: string; reason: 'aborted' | 'timeout' };

/** Issue constructors; each fills in the severity and a readable message. */
export const issues = {
  malformedSet: (setId: string, reason: string): LoadIssue => ({
    code: 'MalformedSet',
    severity: 'error',
    message: `Set ${setId} is malformed: ${reason}`,
    setId,
    reason,
  }),

  setUnreachable: (setId: string, location: string, reason: string): LoadIssue => ({
    code: 'SetUnreachable',
    severity: 'error',
    message: `Set ${setId} could not be fetched from ${location}: ${reason}`,
    setId,
    location,
    reason,
  }),

  setIdMismatch: (setId: string, actualId: string): LoadIssue => ({
    code: 'SetIdMismatch',
    severity: 'error',
    message: `Set ${setId} points at a document whose set_info.id is ${actualId}`,
    setId,
    actualId,
  }),

  cardCountMismatch: (setId: string, declared: number, declaredInSet: number, actual: number): LoadIssue => ({
    code: 'CardCountMismatch',
    severity: 'error',
    message: `Set ${setId} declares ${declared} cards (set_info: ${declaredInSet}) but contains ${actual}`,
    setId,
    declared,
    declaredInSet,
    actual,
  }),

  invalidCard: (setId: string, cardIndex: number, reason: string, details: ValidationDetail[]): LoadIssue => ({
    code: 'InvalidCard',
    severity: 'error',
    message: `Card #${cardIndex} of set ${setId} is invalid: ${reason}`,
    setId,
    cardIndex,
    reason,
    details,
  }),

  duplicateCardId: (setId: string, cardIndex: number, cardId: number, keptInSet: string): LoadIssue => ({
    code: 'DuplicateCardId',
    severity: 'warning',
    message: `Card id ${cardId} (#${cardIndex} of set ${setId}) is already used in set ${keptInSet}; skipped`,
    setId,
    cardIndex,
    cardId,
    keptInSet,
  }),

  unknownCardType: (setId: string, cardIndex: number, cardId: number, type: string): LoadIssue => ({
    code: 'UnknownCardType',
    severity: 'warning',
    message: `Card ${cardId} of set ${setId} has unrecognised type "${type}"; loaded as a non-monster card`,
    setId,
    cardIndex,
    cardId,
    type,
  }),

  manifestUnavailable: (location: string, reason: string): LoadIssue => ({
    code: 'ManifestUnavailable',
    severity: 'warning',
    message: `Manifest ${location} unavailable, documents not verified: ${reason}`,
    location,
    reason,
  }),

  manifestMismatch: (setId: string, key: string, expected: FileDigest | null, actual: FileDigest): LoadIssue => ({
    code: 'ManifestMismatch',
    severity: 'warning',
    message: expected
      ? `Set ${setId} (${key}) does not match the manifest: expected ${expected.sha}/${expected.size}, got ${actual.sha}/${actual.size}`
      : `Set ${setId} (${key}) is not listed in the manifest`,
    setId,
    key,
    expected,
    actual,
  }),

  releaseDate: (setId: string, value: string | null, problem: 'missing' | 'malformed' | 'future'): LoadIssue => ({
    code: 'ReleaseDate',
    severity: 'lint',
    message:
      problem === 'missing'
        ? `Set ${setId} has no release_date`
        : `Set ${setId} has a ${problem} release_date "${value}"`,
    setId,
    value,
    problem,
  }),

  packWeightMass: (setId: string, tier: RarityTier, total: number): LoadIssue => ({
    code: 'PackWeightMass',
    severity: 'lint',
    message: `Pack weights of ${tier} cards in set ${setId} add up to ${total}`,
    setId,
    tier,
    total,
  }),

  tagFormat: (
    setId: string,
    cardIndex: number,
    cardId: number,
    tag: string,
    problem: 'format' | 'duplicate'
  ): LoadIssue => ({
    code: 'TagFormat',
    severity: 'lint',
    message:
      problem === 'format'
        ? `Card ${cardId} of set ${setId} has tag "${tag}" that is not lowercase snake_case`
        : `Card ${cardId} of set ${setId} lists tag "${tag}" more than once`,
    setId,
    cardIndex,
    cardId,
    tag,
    problem,
  }),
};

/** True when no issue dropped or altered data. */
export const isConsistent = (list: readonly LoadIssue[]): boolean => list.every((issue) => issue.severity === 'lint');

export const countBySeverity = (list: readonly LoadIssue[]): Record<IssueSeverity, number> => {
  const counts: Record<IssueSeverity, number> = { error: 0, warning: 0, lint: 0 };
  for (const issue of list) {
    counts[issue.severity] += 1;
  }
  return counts;
};
