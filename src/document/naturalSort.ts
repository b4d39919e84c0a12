/**
 * Natural-order comparison of fragment number tokens.
 *
 * Tokens are split into numeric and non-numeric runs; numeric runs compare
 * as integers, the rest lexicographically. "2" < "10", "15" < "15-1" < "15-2",
 * "12" < "12а".
 */

const RUN_PATTERN = /\d+|\D+/gu;

function splitRuns(token: string): string[] {
  return token.match(RUN_PATTERN) ?? [];
}

function isNumericRun(run: string): boolean {
  return /^\d+$/u.test(run);
}

export function compareNumbers(a: string, b: string): number {
  const left = splitRuns(a);
  const right = splitRuns(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];

    if (isNumericRun(l) && isNumericRun(r)) {
      const diff = parseInt(l, 10) - parseInt(r, 10);
      if (diff !== 0) {
        return diff < 0 ? -1 : 1;
      }
      continue;
    }

    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  if (left.length === right.length) {
    return 0;
  }
  return left.length < right.length ? -1 : 1;
}
