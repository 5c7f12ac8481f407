export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) {
      intersection += 1;
    }
  }

  const union = a.size + b.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Salience-weighted Jaccard: sum of per-key minimums over sum of per-key maximums.
 * A key missing on one side counts as weight 0 there.
 */
export function weightedJaccard(
  a: Record<string, number>,
  b: Record<string, number>,
): number {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  if (keys.size === 0) {
    return 0;
  }

  let minSum = 0;
  let maxSum = 0;
  for (const key of keys) {
    const left = a[key] ?? 0;
    const right = b[key] ?? 0;
    minSum += Math.min(left, right);
    maxSum += Math.max(left, right);
  }
  return maxSum > 0 ? minSum / maxSum : 0;
}

export function phraseSet(values: string[]): Set<string> {
  const out = new Set<string>();
  for (const value of values) {
    const key = normalizePhraseKey(value);
    if (key) {
      out.add(key);
    }
  }
  return out;
}

export function normalizePhraseKey(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function roundTo(value: number, digits = 4): number {
  return Number(value.toFixed(digits));
}
