export interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

export type OpcodeTag = "equal" | "replace" | "delete" | "insert";

export interface Opcode {
  tag: OpcodeTag;
  aStart: number;
  aEnd: number;
  bStart: number;
  bEnd: number;
}

// Below this length of `b` every element may anchor a match.
const AUTOJUNK_MIN_LENGTH = 200;

/**
 * Ratcliff/Obershelp matcher over two sequences of code points: find the
 * longest common block, then recurse on what lies left and right of it.
 *
 * When `b` has at least 200 elements, elements making up more than 1% of it
 * are "popular" and cannot start a block, though they can extend one.
 */
export class SequenceMatcher {
  private readonly a: string[];
  private readonly b: string[];
  private readonly b2j = new Map<string, number[]>();
  private matchingBlocks: MatchingBlock[] | null = null;

  constructor(a: string, b: string) {
    this.a = Array.from(a);
    this.b = Array.from(b);
    this.indexB();
  }

  private indexB(): void {
    this.b.forEach((element, index) => {
      const indices = this.b2j.get(element);
      if (indices) {
        indices.push(index);
      } else {
        this.b2j.set(element, [index]);
      }
    });

    const n = this.b.length;
    if (n < AUTOJUNK_MIN_LENGTH) {
      return;
    }

    const limit = Math.floor(n / 100) + 1;
    for (const [element, indices] of [...this.b2j.entries()]) {
      if (indices.length > limit) {
        this.b2j.delete(element);
      }
    }
  }

  findLongestMatch(aLow: number, aHigh: number, bLow: number, bHigh: number): MatchingBlock {
    let bestI = aLow;
    let bestJ = bLow;
    let bestSize = 0;
    let j2len = new Map<number, number>();

    for (let i = aLow; i < aHigh; i += 1) {
      const next = new Map<number, number>();
      const indices = this.b2j.get(this.a[i]) ?? [];

      for (const j of indices) {
        if (j < bLow) {
          continue;
        }
        if (j >= bHigh) {
          break;
        }

        const k = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestSize) {
          bestI = i - k + 1;
          bestJ = j - k + 1;
          bestSize = k;
        }
      }

      j2len = next;
    }

    while (bestI > aLow && bestJ > bLow && this.a[bestI - 1] === this.b[bestJ - 1]) {
      bestI -= 1;
      bestJ -= 1;
      bestSize += 1;
    }

    while (
      bestI + bestSize < aHigh &&
      bestJ + bestSize < bHigh &&
      this.a[bestI + bestSize] === this.b[bestJ + bestSize]
    ) {
      bestSize += 1;
    }

    return { aStart: bestI, bStart: bestJ, size: bestSize };
  }

  /** Non-overlapping common blocks in increasing order, ending with a zero-size sentinel. */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.matchingBlocks) {
      return this.matchingBlocks;
    }

    const aLength = this.a.length;
    const bLength = this.b.length;
    const queue: Array<[number, number, number, number]> = [[0, aLength, 0, bLength]];
    const found: MatchingBlock[] = [];

    while (queue.length > 0) {
      const range = queue.pop();
      if (!range) {
        continue;
      }

      const [aLow, aHigh, bLow, bHigh] = range;
      const block = this.findLongestMatch(aLow, aHigh, bLow, bHigh);
      if (block.size === 0) {
        continue;
      }

      found.push(block);
      if (aLow < block.aStart && bLow < block.bStart) {
        queue.push([aLow, block.aStart, bLow, block.bStart]);
      }
      if (block.aStart + block.size < aHigh && block.bStart + block.size < bHigh) {
        queue.push([block.aStart + block.size, aHigh, block.bStart + block.size, bHigh]);
      }
    }

    found.sort((left, right) => left.aStart - right.aStart || left.bStart - right.bStart);

    const collapsed: MatchingBlock[] = [];
    for (const block of found) {
      const previous = collapsed[collapsed.length - 1];
      if (
        previous &&
        previous.aStart + previous.size === block.aStart &&
        previous.bStart + previous.size === block.bStart
      ) {
        previous.size += block.size;
        continue;
      }
      collapsed.push({ ...block });
    }

    collapsed.push({ aStart: aLength, bStart: bLength, size: 0 });
    this.matchingBlocks = collapsed;
    return collapsed;
  }

  getOpcodes(): Opcode[] {
    const opcodes: Opcode[] = [];
    let i = 0;
    let j = 0;

    for (const block of this.getMatchingBlocks()) {
      let tag: OpcodeTag | null = null;
      if (i < block.aStart && j < block.bStart) {
        tag = "replace";
      } else if (i < block.aStart) {
        tag = "delete";
      } else if (j < block.bStart) {
        tag = "insert";
      }

      if (tag) {
        opcodes.push({ tag, aStart: i, aEnd: block.aStart, bStart: j, bEnd: block.bStart });
      }

      i = block.aStart + block.size;
      j = block.bStart + block.size;

      if (block.size > 0) {
        opcodes.push({ tag: "equal", aStart: block.aStart, aEnd: i, bStart: block.bStart, bEnd: j });
      }
    }

    return opcodes;
  }

  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) {
      return 1;
    }

    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
    return (2 * matches) / total;
  }

  sliceA(start: number, end: number): string {
    return this.a.slice(start, end).join("");
  }

  sliceB(start: number, end: number): string {
    return this.b.slice(start, end).join("");
  }
}

/** Overlap score in [0, 1]: 2 * matched / total length, 0 when either side is empty. */
export function similarityRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  return new SequenceMatcher(a, b).ratio();
}
