/**
 * Ratcliff/Obershelp similarity: twice the number of matching characters
 * divided by the combined length. Matching blocks are found by taking the
 * longest common substring and recursing on both sides of it.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

function matchingCharacters(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const { startA, startB, length } = longestCommonSubstring(a, b);
  if (length === 0) return 0;

  return (
    length +
    matchingCharacters(a.slice(0, startA), b.slice(0, startB)) +
    matchingCharacters(a.slice(startA + length), b.slice(startB + length))
  );
}

// Earliest block in `a` wins ties, then earliest in `b`.
function longestCommonSubstring(a: string, b: string): { startA: number; startB: number; length: number } {
  let best = { startA: 0, startB: 0, length: 0 };
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] !== b[j - 1]) continue;
      current[j] = previous[j - 1] + 1;
      if (current[j] > best.length) {
        best = { startA: i - current[j], startB: j - current[j], length: current[j] };
      }
    }
    previous = current;
  }

  return best;
}
