export type SplitOptions = {
  unitSize: number;
  overlap: number;
};

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const PARAGRAPH_BOUNDARY = /\n\s*\n/;
const PARAGRAPH_SEPARATOR = "\n\n";

type Accumulator = {
  units: string[];
  current: string[];
};

/**
 * Sliding window of `unitSize` characters. A window that does not reach the
 * end of the text is shortened to end after its last ". " or newline, when
 * that break sits past the window midpoint.
 */
export function splitByCharacter(text: string, opts: SplitOptions): string[] {
  const { unitSize, overlap } = opts;
  const out: string[] = [];

  let start = 0;
  while (start < text.length) {
    let end = start + unitSize;

    if (end < text.length) {
      const window = text.slice(start, end);
      const breakPoint = Math.max(window.lastIndexOf(". "), window.lastIndexOf("\n"));
      if (breakPoint > Math.floor(unitSize / 2)) end = start + breakPoint + 1;
    }

    const piece = text.slice(start, end).trim();
    if (piece) out.push(piece);

    start = Math.max(end - overlap, start + 1);
  }

  return out;
}

function joinedLength(parts: string[], separator: string): number {
  return parts.join(separator).length;
}

/** Longest run of trailing parts whose joined length fits in `budget`. */
function trailingParts(parts: string[], budget: number, separator: string): string[] {
  const seed: string[] = [];
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i]!;
    if (joinedLength([part, ...seed], separator) > budget) break;
    seed.unshift(part);
  }
  return seed;
}

function flush(acc: Accumulator, separator: string): void {
  if (acc.current.length > 0) acc.units.push(acc.current.join(separator));
}

export function splitBySentence(text: string, opts: SplitOptions): string[] {
  const { unitSize, overlap } = opts;
  const sentences = text
    .trim()
    .split(SENTENCE_BOUNDARY)
    .filter((s) => s.length > 0);

  const acc = sentences.reduce<Accumulator>(
    (state, sentence) => {
      if (state.current.length === 0 || joinedLength([...state.current, sentence], " ") <= unitSize) {
        state.current.push(sentence);
        return state;
      }

      flush(state, " ");
      const seed = trailingParts(state.current, overlap, " ");
      return { units: state.units, current: [...seed, sentence] };
    },
    { units: [], current: [] }
  );

  flush(acc, " ");
  return acc.units;
}

/**
 * Paragraphs accumulate up to `unitSize`. A paragraph that is too large on its
 * own goes through `splitByCharacter`; on overflow only the last paragraph is
 * carried over, and only when it fits in `overlap`.
 */
export function splitByParagraph(text: string, opts: SplitOptions): string[] {
  const { unitSize, overlap } = opts;
  const paragraphs = text
    .split(PARAGRAPH_BOUNDARY)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const acc = paragraphs.reduce<Accumulator>(
    (state, paragraph) => {
      if (paragraph.length > unitSize) {
        flush(state, PARAGRAPH_SEPARATOR);
        state.units.push(...splitByCharacter(paragraph, opts));
        return { units: state.units, current: [] };
      }

      if (
        state.current.length === 0 ||
        joinedLength([...state.current, paragraph], PARAGRAPH_SEPARATOR) <= unitSize
      ) {
        state.current.push(paragraph);
        return state;
      }

      flush(state, PARAGRAPH_SEPARATOR);
      const last = state.current[state.current.length - 1];
      const carry = last !== undefined && last.length <= overlap ? [last] : [];
      return { units: state.units, current: [...carry, paragraph] };
    },
    { units: [], current: [] }
  );

  flush(acc, PARAGRAPH_SEPARATOR);
  return acc.units;
}
