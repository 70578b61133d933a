export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
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

export function isNearDuplicate(
  tokens: ReadonlySet<string>,
  seen: readonly ReadonlySet<string>[],
  threshold: number,
): boolean {
  if (tokens.size === 0) {
    return false;
  }
  return seen.some((other) => jaccard(tokens, other) >= threshold);
}
