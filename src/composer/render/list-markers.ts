import type { BlockKind } from "../core/types";

export const BULLET_MARKER = "\u2022";

/**
 * A list marker drawn outside the text. `characterIndex` is a view offset,
 * never a model offset.
 */
export type ListMarkerInfo = {
  text: string;
  font: string;
  color: string;
  characterIndex: number;
  headIndent: number;
};

/**
 * Ordinal counters per list depth. Counters below the current depth are
 * dropped whenever a shallower item appears, and all of them when a block
 * outside any list is seen.
 */
export class ListMarkerCounter {
  private readonly counters = new Map<number, number>();

  next(kind: BlockKind): string | null {
    if (kind.type !== "listItem") {
      this.counters.clear();
      return null;
    }

    const depth = Math.max(1, kind.depth);
    for (const level of Array.from(this.counters.keys())) {
      if (level > depth) {
        this.counters.delete(level);
      }
    }

    if (kind.listType === "unordered") {
      this.counters.delete(depth);
      return BULLET_MARKER;
    }

    const count = (this.counters.get(depth) ?? 0) + 1;
    this.counters.set(depth, count);
    return `${count}.`;
  }
}
