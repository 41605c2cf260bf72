import { LoadResult } from './loader';
import { countBySeverity } from './issues';

export const EXIT_CONSISTENT = 0;
export const EXIT_DATA_DROPPED = 1;
export const EXIT_FATAL = 2;

export const exitCodeFor = (result: LoadResult): number => {
  if (!result.ok) return EXIT_FATAL;
  return result.consistent ? EXIT_CONSISTENT : EXIT_DATA_DROPPED;
};

const plural = (count: number, word: string) => `${count} ${word}${count === 1 ? '' : 's'}`;

/**
 * Plain-text summary of a load for the command line.
 */
export const formatReport = (result: LoadResult): string => {
  if (!result.ok) {
    const { failure } = result;
    const lines = [`FATAL ${failure.code}: ${failure.message}`];
    if (failure.code === 'MalformedIndex') {
      for (const detail of failure.details) {
        lines.push(`  - ${detail.field}: ${detail.message}`);
      }
    }
    return lines.join('\n');
  }

  const { catalog, issues } = result;
  const info = catalog.repository;
  const lines = [
    `Repository ${info.name} v${info.version} (${catalog.source})`,
    `Loaded ${plural(catalog.setCount, 'set')}, ${plural(catalog.cardCount, 'card')}`,
  ];
  for (const set of catalog.listSets()) {
    lines.push(`  ${set.reference.id}  ${set.reference.name}  ${plural(set.cards.length, 'card')}`);
  }

  const counts = countBySeverity(issues);
  lines.push(
    `Issues: ${plural(counts.error, 'error')}, ${plural(counts.warning, 'warning')}, ${counts.lint} lint`
  );
  for (const issue of issues) {
    lines.push(`  [${issue.severity}] ${issue.code}: ${issue.message}`);
  }
  lines.push(result.consistent ? 'Result: consistent' : 'Result: data dropped or altered');
  return lines.join('\n');
};
