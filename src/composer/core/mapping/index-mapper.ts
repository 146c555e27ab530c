import type { Range } from "../types";

/**
 * Which side of a decoration a model offset at its anchor lands on.
 * `"before"` keeps the offset in front of the decoration, `"after"` moves it
 * past the decoration.
 */
export type DecorationAssoc = "before" | "after";

export type DecorationKind = "list-marker" | "mention-overflow";

/** View-only code units with no counterpart in the model. */
export type DecorationSpan = {
  viewStart: number;
  viewEnd: number;
  assoc: DecorationAssoc;
  kind: DecorationKind;
};

export type DecorationRegistry = {
  viewLength: number;
  modelLength: number;
  spans: DecorationSpan[];
};

export type IndexMapper = {
  registry: DecorationRegistry;
  /**
   * Returns null when the range is out of bounds, reversed, or when
   * `liveViewLength` shows the view no longer matches the registry.
   */
  toModel(viewRange: Range, liveViewLength?: number): Range | null;
  toView(modelRange: Range, liveViewLength?: number): Range | null;
};

export const EMPTY_REGISTRY: DecorationRegistry = {
  viewLength: 0,
  modelLength: 0,
  spans: [],
};

export function createIndexMapper(registry: DecorationRegistry): IndexMapper {
  const { spans } = registry;

  const isStale = (liveViewLength: number | undefined) =>
    liveViewLength !== undefined && liveViewLength !== registry.viewLength;

  const isValid = (range: Range, length: number) =>
    Number.isInteger(range.start) &&
    Number.isInteger(range.end) &&
    range.start >= 0 &&
    range.start <= range.end &&
    range.end <= length;

  const viewToModelOffset = (viewOffset: number): number => {
    let hidden = 0;
    for (const span of spans) {
      if (span.viewEnd <= viewOffset) {
        hidden += span.viewEnd - span.viewStart;
        continue;
      }
      if (span.viewStart < viewOffset) {
        // Inside a decoration: snap to its anchor.
        return span.viewStart - hidden;
      }
      break;
    }
    return viewOffset - hidden;
  };

  const modelToViewOffset = (modelOffset: number): number => {
    let hidden = 0;
    for (const span of spans) {
      const anchor = span.viewStart - hidden;
      if (
        anchor < modelOffset ||
        (anchor === modelOffset && span.assoc === "after")
      ) {
        hidden += span.viewEnd - span.viewStart;
        continue;
      }
      break;
    }
    return modelOffset + hidden;
  };

  return {
    registry,
    toModel(viewRange, liveViewLength) {
      if (isStale(liveViewLength) || !isValid(viewRange, registry.viewLength)) {
        return null;
      }
      return {
        start: viewToModelOffset(viewRange.start),
        end: viewToModelOffset(viewRange.end),
      };
    },
    toView(modelRange, liveViewLength) {
      if (
        isStale(liveViewLength) ||
        !isValid(modelRange, registry.modelLength)
      ) {
        return null;
      }
      return {
        start: modelToViewOffset(modelRange.start),
        end: modelToViewOffset(modelRange.end),
      };
    },
  };
}

export class DecorationRegistryBuilder {
  private parts: string[] = [];
  private spans: DecorationSpan[] = [];
  private viewLengthValue = 0;
  private modelLengthValue = 0;

  get viewLength(): number {
    return this.viewLengthValue;
  }

  get modelLength(): number {
    return this.modelLengthValue;
  }

  /** Text present in both the model and the view. */
  appendContent(text: string): void {
    if (!text) {
      return;
    }

    this.parts.push(text);
    this.viewLengthValue += text.length;
    this.modelLengthValue += text.length;
  }

  appendDecoration(
    text: string,
    assoc: DecorationAssoc,
    kind: DecorationKind,
  ): void {
    if (!text) {
      return;
    }

    const viewStart = this.viewLengthValue;
    this.parts.push(text);
    this.viewLengthValue += text.length;
    this.spans.push({
      viewStart,
      viewEnd: this.viewLengthValue,
      assoc,
      kind,
    });
  }

  appendBuilt(built: { text: string; registry: DecorationRegistry }): void {
    if (!built.text) {
      return;
    }

    const base = this.viewLengthValue;
    this.parts.push(built.text);
    for (const span of built.registry.spans) {
      this.spans.push({
        ...span,
        viewStart: base + span.viewStart,
        viewEnd: base + span.viewEnd,
      });
    }
    this.viewLengthValue += built.registry.viewLength;
    this.modelLengthValue += built.registry.modelLength;
  }

  build(): { text: string; registry: DecorationRegistry } {
    return {
      text: this.parts.join(""),
      registry: {
        viewLength: this.viewLengthValue,
        modelLength: this.modelLengthValue,
        spans: this.spans.slice(),
      },
    };
  }
}
