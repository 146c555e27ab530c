import type { DecorationAssoc } from "./index-mapper";

export type DecorationStrategyKind = "gutter" | "literal";

/**
 * How list markers reach the view. The gutter strategy draws them outside the
 * text and inserts nothing; the literal strategy inserts the marker text, which
 * the index mapper then has to skip.
 */
export type DecorationStrategy = {
  kind: DecorationStrategyKind;
  listMarkerText(marker: string): string;
  listMarkerAssoc: DecorationAssoc;
};

export const gutterDecorationStrategy: DecorationStrategy = {
  kind: "gutter",
  listMarkerText: () => "",
  listMarkerAssoc: "after",
};

export const literalDecorationStrategy: DecorationStrategy = {
  kind: "literal",
  listMarkerText: (marker) => `${marker} `,
  listMarkerAssoc: "after",
};

export function resolveDecorationStrategy(
  strategy: DecorationStrategy | DecorationStrategyKind | undefined,
): DecorationStrategy {
  if (strategy === undefined || strategy === "gutter") {
    return gutterDecorationStrategy;
  }
  if (strategy === "literal") {
    return literalDecorationStrategy;
  }
  return strategy;
}
