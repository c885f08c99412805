import { ConfigurationError } from '../config.js';

/**
 * Calculate Levenshtein distance between two strings for fuzzy matching
 */
function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  // Initialize first row and column
  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1, // insertion
          matrix[i - 1][j] + 1 // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}

/**
 * Names within a few edits of `name`, closest first
 */
export function findSimilarNames(name: string, available: readonly string[]): string[] {
  return available
    .map((candidate) => ({
      candidate,
      distance: levenshteinDistance(name.toLowerCase(), candidate.toLowerCase()),
    }))
    .filter(({ distance }) => {
      // max 3 edits or 30% of length, whichever is smaller
      const maxDistance = Math.min(3, Math.ceil(name.length * 0.3));
      return distance <= maxDistance;
    })
    .sort((a, b) => a.distance - b.distance)
    .map(({ candidate }) => candidate);
}

/**
 * Build the "does not exist" error for a target or action, with suggestions
 */
export function unknownNameError(
  kind: 'target' | 'action' | 'project',
  name: string,
  available: readonly string[]
): ConfigurationError {
  const lines = [`Specified ${kind} "${name}" does not exist`];
  const suggestions = findSimilarNames(name, available);
  if (suggestions.length === 1) {
    lines.push(`Did you mean '${suggestions[0]}'?`);
  } else if (suggestions.length > 1) {
    lines.push('Did you mean one of these?');
    suggestions.forEach((s) => lines.push(`  • ${s}`));
  }
  return new ConfigurationError(lines.join('\n'));
}
