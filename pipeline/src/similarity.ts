export const SIMILARITY_SCORER_IDS = ["gestalt", "token-dice"] as const;

export type SimilarityScorerId = (typeof SIMILARITY_SCORER_IDS)[number];

export const DEFAULT_SIMILARITY_SCORER: SimilarityScorerId = "gestalt";

/** Scores two texts in [0, 1]; 1 means equal after normalization. */
export interface SimilarityScorer {
  readonly id: SimilarityScorerId;
  score(left: string, right: string): number;
}

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "as",
  "at",
  "by",
  "for",
  "from",
  "in",
  "into",
  "of",
  "on",
  "or",
  "the",
  "to",
  "with"
]);

const STEP_CODE_PATTERN = "[A-Za-z]\\d+[a-z]?";
const LEADING_CODE = new RegExp(`^\\s*${STEP_CODE_PATTERN}\\s*[-–:.)]\\s*`);
const BRACKETED_CODE = new RegExp(`[\\[(]\\s*${STEP_CODE_PATTERN}\\s*[\\])]`, "g");
const STANDALONE_CODE = new RegExp(`\\b${STEP_CODE_PATTERN}\\b`, "g");

/**
 * Normalizes a title for comparison: step codes (leading, bracketed or standalone) are removed,
 * underscores and hyphens become spaces, punctuation is dropped and the rest is lower-cased.
 */
export function stripCodes(text: string): string {
  return text
    .replace(LEADING_CODE, "")
    .replace(BRACKETED_CODE, " ")
    .replace(STANDALONE_CODE, " ")
    .replace(/[_-]+/g, " ")
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

export function tokenizeForSearch(text: string): string[] {
  const unique = new Set<string>();
  for (const token of stripCodes(text).split(" ")) {
    if (token.length === 0 || STOP_WORDS.has(token)) {
      continue;
    }
    unique.add(token);
  }

  return [...unique].sort((left, right) => left.localeCompare(right));
}

interface MatchingBlock {
  leftStart: number;
  rightStart: number;
  size: number;
}

function findLongestMatch(
  left: string,
  right: string,
  leftLow: number,
  leftHigh: number,
  rightLow: number,
  rightHigh: number
): MatchingBlock {
  let best: MatchingBlock = { leftStart: leftLow, rightStart: rightLow, size: 0 };
  let previous = new Array<number>(rightHigh - rightLow + 1).fill(0);

  for (let i = leftLow; i < leftHigh; i += 1) {
    const current = new Array<number>(rightHigh - rightLow + 1).fill(0);
    for (let j = rightLow; j < rightHigh; j += 1) {
      if (left[i] !== right[j]) {
        continue;
      }

      const size = (previous[j - rightLow] ?? 0) + 1;
      current[j - rightLow + 1] = size;
      if (size > best.size) {
        best = { leftStart: i - size + 1, rightStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

/** Total length of the recursively found longest common blocks of two strings. */
export function countMatchingCharacters(left: string, right: string): number {
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) {
      break;
    }

    const [leftLow, leftHigh, rightLow, rightHigh] = next;
    const block = findLongestMatch(left, right, leftLow, leftHigh, rightLow, rightHigh);
    if (block.size === 0) {
      continue;
    }

    matched += block.size;
    pending.push([leftLow, block.leftStart, rightLow, block.rightStart]);
    pending.push([block.leftStart + block.size, leftHigh, block.rightStart + block.size, rightHigh]);
  }

  return matched;
}

export const gestaltScorer: SimilarityScorer = {
  id: "gestalt",
  score(left, right) {
    const a = stripCodes(left);
    const b = stripCodes(right);
    if (a.length + b.length === 0) {
      return 0;
    }

    return (2 * countMatchingCharacters(a, b)) / (a.length + b.length);
  }
};

export const tokenDiceScorer: SimilarityScorer = {
  id: "token-dice",
  score(left, right) {
    const leftTokens = tokenizeForSearch(left);
    const rightTokens = new Set(tokenizeForSearch(right));
    if (leftTokens.length + rightTokens.size === 0) {
      return 0;
    }

    const shared = leftTokens.filter((token) => rightTokens.has(token)).length;
    return (2 * shared) / (leftTokens.length + rightTokens.size);
  }
};

const SCORERS: Record<SimilarityScorerId, SimilarityScorer> = {
  gestalt: gestaltScorer,
  "token-dice": tokenDiceScorer
};

export function resolveSimilarityScorer(id: SimilarityScorerId = DEFAULT_SIMILARITY_SCORER): SimilarityScorer {
  return SCORERS[id];
}

export function isSimilarityScorerId(value: string): value is SimilarityScorerId {
  return (SIMILARITY_SCORER_IDS as readonly string[]).includes(value);
}
