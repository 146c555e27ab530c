import {
  createIndexMapper,
  type DecorationRegistry,
  type DecorationSpan,
} from "../core/mapping/index-mapper";
import type { Range } from "../core/types";
import { reconcileText } from "../core/string-differ";
import type { ComposerIntent } from "./intents";

export type NativeEditMapping = {
  intents: ComposerIntent[];
  /** The diff pass cap was hit; the tail is one region replacement. */
  fallback: boolean;
};

/**
 * Translates an edit made directly in the view into model `replace-range`
 * intents, one per diff pass. Each intent is expressed against the model as
 * it will be after the previous intents were applied.
 *
 * Returns null when the committed text no longer matches the registry, or
 * when an edit boundary falls inside view-only text.
 */
export function mapNativeEdit(
  committedViewText: string,
  liveViewText: string,
  registry: DecorationRegistry,
  maxPasses?: number,
): NativeEditMapping | null {
  if (committedViewText.length !== registry.viewLength) {
    return null;
  }

  const { replacements, fallback } = reconcileText(
    committedViewText,
    liveViewText,
    { maxPasses },
  );

  const intents: ComposerIntent[] = [];
  let current = registry;
  for (const change of replacements) {
    const viewRange = {
      start: change.location,
      end: change.location + change.length,
    };
    if (splitsDecoration(current, viewRange)) {
      return null;
    }
    const modelRange = createIndexMapper(current).toModel(viewRange);
    if (!modelRange) {
      return null;
    }
    intents.push({
      type: "replace-range",
      text: change.text,
      start: modelRange.start,
      end: modelRange.end,
    });
    current = shiftRegistry(current, viewRange, change.text.length);
  }

  return { intents, fallback };
}

/** Whether a boundary of `range` falls strictly inside a decoration. */
function splitsDecoration(registry: DecorationRegistry, range: Range): boolean {
  const inside = (offset: number) =>
    registry.spans.some(
      (span) => offset > span.viewStart && offset < span.viewEnd,
    );
  return inside(range.start) || inside(range.end);
}

/**
 * Registry after replacing `range` of the view with model content.
 * Decorations inside the range go with the replaced text.
 */
export function shiftRegistry(
  registry: DecorationRegistry,
  range: Range,
  insertedLength: number,
): DecorationRegistry {
  const removedLength = range.end - range.start;
  const viewDelta = insertedLength - removedLength;
  let hiddenRemoved = 0;
  const spans: DecorationSpan[] = [];

  for (const span of registry.spans) {
    if (span.viewEnd <= range.start) {
      spans.push(span);
    } else if (span.viewStart >= range.end) {
      spans.push({
        ...span,
        viewStart: span.viewStart + viewDelta,
        viewEnd: span.viewEnd + viewDelta,
      });
    } else {
      hiddenRemoved += span.viewEnd - span.viewStart;
    }
  }

  return {
    viewLength: registry.viewLength + viewDelta,
    modelLength:
      registry.modelLength + insertedLength - (removedLength - hiddenRemoved),
    spans,
  };
}
