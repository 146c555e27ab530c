import {
  DecorationRegistryBuilder,
  type DecorationAssoc,
  type DecorationKind,
  type DecorationRegistry,
} from "../core/mapping/index-mapper";
import type { BlockKind } from "../core/types";
import type { ListMarkerInfo } from "./list-markers";

export type Padding = {
  horizontal: number;
  vertical: number;
};

export type RenderStyle = {
  textColor: string;
  linkColor: string;
  listMarkerColor: string;
  codeBackgroundColor: string;
  quoteBorderColor: string;
  font: string;
  monospaceFont: string;
  /** Horizontal room reserved for a list marker, per nesting level. */
  listGutterWidth: number;
  quotePadding: Padding;
  codeBlockPadding: Padding;
};

export const defaultRenderStyle: RenderStyle = {
  textColor: "#1b1d22",
  linkColor: "#0467dd",
  listMarkerColor: "#1b1d22",
  codeBackgroundColor: "#f4f6fa",
  quoteBorderColor: "#c1c6cd",
  font: "system-ui, sans-serif",
  monospaceFont: "ui-monospace, monospace",
  listGutterWidth: 26,
  quotePadding: { horizontal: 12, vertical: 4 },
  codeBlockPadding: { horizontal: 10, vertical: 6 },
};

export type InlineStyle = {
  bold: boolean;
  italic: boolean;
  monospace: boolean;
  underline: boolean;
  strikeThrough: boolean;
  /** Inline-code background. */
  codeBackground: boolean;
  link: string | null;
  color: string;
};

export type MentionDisplayMode = "plain" | "pill" | "custom";

export type MentionStyle = {
  url: string;
  display: MentionDisplayMode;
  atRoom: boolean;
};

export type StyledSpan = {
  viewStart: number;
  viewEnd: number;
  text: string;
  style: InlineStyle;
  mention: MentionStyle | null;
  /** Set when the span is view-only. */
  decoration: DecorationKind | null;
};

export type ParagraphStyle = {
  firstLineHeadIndent: number;
  headIndent: number;
  tailIndent: number;
  spacingBefore: number;
  spacingAfter: number;
  container: "quote" | "code-block" | null;
};

export type StyledFragment = {
  blockId: string;
  kind: BlockKind;
  inQuote: boolean;
  /** Offsets of the fragment inside its document; zero when standalone. */
  viewStart: number;
  modelStart: number;
  text: string;
  spans: StyledSpan[];
  paragraph: ParagraphStyle;
  listMarker: ListMarkerInfo | null;
  registry: DecorationRegistry;
};

export type StyledDocument = {
  text: string;
  fragments: StyledFragment[];
  /** Separator spans between fragments are included. */
  spans: StyledSpan[];
  listMarkers: ListMarkerInfo[];
  registry: DecorationRegistry;
};

export class StyledTextBuilder {
  private readonly registry = new DecorationRegistryBuilder();
  private readonly spans: StyledSpan[] = [];

  get viewLength(): number {
    return this.registry.viewLength;
  }

  get modelLength(): number {
    return this.registry.modelLength;
  }

  appendContent(
    text: string,
    style: InlineStyle,
    mention: MentionStyle | null = null,
  ): void {
    if (!text) {
      return;
    }

    const viewStart = this.registry.viewLength;
    this.registry.appendContent(text);
    this.pushSpan(viewStart, text, style, mention, null);
  }

  appendDecoration(
    text: string,
    style: InlineStyle,
    assoc: DecorationAssoc,
    kind: DecorationKind,
    mention: MentionStyle | null = null,
  ): void {
    if (!text) {
      return;
    }

    const viewStart = this.registry.viewLength;
    this.registry.appendDecoration(text, assoc, kind);
    this.pushSpan(viewStart, text, style, mention, kind);
  }

  appendStyled(styled: {
    text: string;
    spans: StyledSpan[];
    registry: DecorationRegistry;
  }): void {
    const base = this.registry.viewLength;
    this.registry.appendBuilt(styled);
    for (const span of styled.spans) {
      this.spans.push({
        ...span,
        viewStart: base + span.viewStart,
        viewEnd: base + span.viewEnd,
      });
    }
  }

  build(): { text: string; spans: StyledSpan[]; registry: DecorationRegistry } {
    const { text, registry } = this.registry.build();
    return { text, spans: this.spans.slice(), registry };
  }

  private pushSpan(
    viewStart: number,
    text: string,
    style: InlineStyle,
    mention: MentionStyle | null,
    decoration: DecorationKind | null,
  ): void {
    this.spans.push({
      viewStart,
      viewEnd: viewStart + text.length,
      text,
      style,
      mention,
      decoration,
    });
  }
}

export function plainInlineStyle(style: RenderStyle): InlineStyle {
  return {
    bold: false,
    italic: false,
    monospace: false,
    underline: false,
    strikeThrough: false,
    codeBackground: false,
    link: null,
    color: style.textColor,
  };
}
