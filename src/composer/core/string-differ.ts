/**
 * Single-region text diffing over UTF-16 code units.
 *
 * The view is patched one contiguous replacement at a time. When the real
 * difference is made of several disjoint edits, the first one is returned with
 * `hasMore` set and the caller diffs again against the patched text.
 */

export type StringDifferReplacement = {
  /** UTF-16 offset in the old text. */
  location: number;
  /** Number of old code units replaced. */
  length: number;
  text: string;
  hasMore: boolean;
};

export type ReconcileResult = {
  replacements: StringDifferReplacement[];
  /** True when the pass cap was hit and the rest was replaced in one go. */
  fallback: boolean;
};

/** Cells of the LCS table above which the middle is replaced as one region. */
export const MAX_LCS_CELLS = 10000;

export const MAX_DIFF_PASSES = 16;

const NBSP = "\u00A0";

// Unicode White_Space.
const WHITESPACE =
  /[\t-\r \u0085\u00A0\u1680\u2000-\u200A\u2028\u2029\u202F\u205F\u3000]/g;

type Removal = { location: number; length: number };
type Insertion = { location: number; length: number };

export function normalizeWhitespace(text: string): string {
  return text.replace(WHITESPACE, NBSP);
}

export function replacement(
  oldText: string,
  newText: string,
): StringDifferReplacement | null {
  const oldKey = normalizeWhitespace(oldText);
  const newKey = normalizeWhitespace(newText);
  if (oldKey === newKey) {
    return null;
  }

  const prefixLen = commonPrefixLength(oldKey, newKey);
  const suffixLen = commonSuffixLength(oldKey, newKey, prefixLen);
  const oldMiddle = oldKey.slice(prefixLen, oldKey.length - suffixLen);
  const newMiddle = newKey.slice(prefixLen, newKey.length - suffixLen);

  if (isDoubleSpaceToDot(oldMiddle, newMiddle)) {
    return {
      location: prefixLen,
      length: 2,
      text: newText.slice(prefixLen, prefixLen + 1),
      hasMore: false,
    };
  }

  if (
    oldMiddle.length === 0 ||
    newMiddle.length === 0 ||
    oldMiddle.length * newMiddle.length > MAX_LCS_CELLS
  ) {
    return {
      location: prefixLen,
      length: oldMiddle.length,
      text: newText.slice(prefixLen, newText.length - suffixLen),
      hasMore: false,
    };
  }

  const { removals, insertions } = diffMiddle(oldMiddle, newMiddle, prefixLen);
  const isComplex = removals.length > 1 || insertions.length > 1;

  const removal = removals[0];
  if (removal) {
    const insertion = insertions.find(
      (candidate) => candidate.location === removal.location,
    );
    if (insertion) {
      return {
        location: removal.location,
        length: removal.length,
        text: sliceInsertion(newText, insertion),
        hasMore: isComplex,
      };
    }
    return {
      location: removal.location,
      length: removal.length,
      text: "",
      hasMore: isComplex || insertions.length > 0,
    };
  }

  const insertion = insertions[0];
  if (!insertion) {
    // Middles differ only by characters that compare equal; nothing to patch.
    return null;
  }
  return {
    location: insertion.location,
    length: 0,
    text: sliceInsertion(newText, insertion),
    hasMore: isComplex,
  };
}

export function applyReplacement(
  text: string,
  change: Pick<StringDifferReplacement, "location" | "length" | "text">,
): string {
  return (
    text.slice(0, change.location) +
    change.text +
    text.slice(change.location + change.length)
  );
}

/**
 * Re-runs {@link replacement} against the progressively patched text until
 * the two strings reconcile. Past `maxPasses` the remaining difference is
 * returned as one full-region replacement.
 */
export function reconcileText(
  oldText: string,
  newText: string,
  options: { maxPasses?: number } = {},
): ReconcileResult {
  const maxPasses = Math.max(1, options.maxPasses ?? MAX_DIFF_PASSES);
  const replacements: StringDifferReplacement[] = [];
  let current = oldText;

  for (let pass = 0; pass < maxPasses; pass += 1) {
    const next = replacement(current, newText);
    if (!next) {
      return { replacements, fallback: false };
    }
    replacements.push(next);
    current = applyReplacement(current, next);
    if (!next.hasMore) {
      return { replacements, fallback: false };
    }
  }

  const rest = singleRegionReplacement(current, newText);
  if (rest) {
    replacements.push(rest);
  }
  return { replacements, fallback: true };
}

/** Prefix/suffix replacement covering the whole changed region. */
export function singleRegionReplacement(
  oldText: string,
  newText: string,
): StringDifferReplacement | null {
  const oldKey = normalizeWhitespace(oldText);
  const newKey = normalizeWhitespace(newText);
  if (oldKey === newKey) {
    return null;
  }
  const prefixLen = commonPrefixLength(oldKey, newKey);
  const suffixLen = commonSuffixLength(oldKey, newKey, prefixLen);
  return {
    location: prefixLen,
    length: oldKey.length - suffixLen - prefixLen,
    text: newText.slice(prefixLen, newText.length - suffixLen),
    hasMore: false,
  };
}

function commonPrefixLength(a: string, b: string): number {
  let prefixLen = 0;
  while (
    prefixLen < a.length &&
    prefixLen < b.length &&
    a.charCodeAt(prefixLen) === b.charCodeAt(prefixLen)
  ) {
    prefixLen += 1;
  }
  return prefixLen;
}

function commonSuffixLength(a: string, b: string, prefixLen: number): number {
  let suffixLen = 0;
  while (
    suffixLen < a.length - prefixLen &&
    suffixLen < b.length - prefixLen &&
    a.charCodeAt(a.length - 1 - suffixLen) ===
      b.charCodeAt(b.length - 1 - suffixLen)
  ) {
    suffixLen += 1;
  }
  return suffixLen;
}

function isDoubleSpaceToDot(oldMiddle: string, newMiddle: string): boolean {
  return oldMiddle === NBSP + NBSP && newMiddle === ".";
}

function sliceInsertion(newText: string, insertion: Insertion): string {
  return newText.slice(insertion.location, insertion.location + insertion.length);
}

/**
 * LCS over the changed middle. Removed offsets (old text) and inserted
 * offsets (new text) are merged into contiguous groups.
 */
function diffMiddle(
  oldMiddle: string,
  newMiddle: string,
  offset: number,
): { removals: Removal[]; insertions: Insertion[] } {
  const n = oldMiddle.length;
  const m = newMiddle.length;
  const cols = m + 1;

  // dp[i][j] is stored at dp[i * cols + j]
  const dp = new Int32Array((n + 1) * cols);
  for (let i = 1; i <= n; i += 1) {
    for (let j = 1; j <= m; j += 1) {
      if (oldMiddle.charCodeAt(i - 1) === newMiddle.charCodeAt(j - 1)) {
        dp[i * cols + j] = dp[(i - 1) * cols + (j - 1)] + 1;
      } else {
        dp[i * cols + j] = Math.max(
          dp[(i - 1) * cols + j],
          dp[i * cols + (j - 1)],
        );
      }
    }
  }

  const removedOffsets: number[] = [];
  const insertedOffsets: number[] = [];
  let i = n;
  let j = m;
  while (i > 0 || j > 0) {
    if (
      i > 0 &&
      j > 0 &&
      oldMiddle.charCodeAt(i - 1) === newMiddle.charCodeAt(j - 1)
    ) {
      i -= 1;
      j -= 1;
    } else if (
      j > 0 &&
      (i === 0 || dp[i * cols + (j - 1)] >= dp[(i - 1) * cols + j])
    ) {
      insertedOffsets.push(offset + j - 1);
      j -= 1;
    } else {
      removedOffsets.push(offset + i - 1);
      i -= 1;
    }
  }

  return {
    removals: groupContiguous(removedOffsets.reverse()),
    insertions: groupContiguous(insertedOffsets.reverse()),
  };
}

function groupContiguous(
  offsets: number[],
): Array<{ location: number; length: number }> {
  const groups: Array<{ location: number; length: number }> = [];
  for (const offset of offsets) {
    const last = groups[groups.length - 1];
    if (last && last.location + last.length === offset) {
      last.length += 1;
    } else {
      groups.push({ location: offset, length: 1 });
    }
  }
  return groups;
}
