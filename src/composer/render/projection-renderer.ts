import {
  resolveDecorationStrategy,
  type DecorationStrategy,
  type DecorationStrategyKind,
} from "../core/mapping/decoration-strategy";
import { createIndexMapper } from "../core/mapping/index-mapper";
import type {
  AttributeSet,
  BlockKind,
  BlockProjection,
  InlineRun,
} from "../core/types";
import type { MentionDisplayHandler } from "../mentions/mention-display-cache";
import { isAtRoomMention } from "../mentions/mention-url";
import { ListMarkerCounter, type ListMarkerInfo } from "./list-markers";
import {
  defaultRenderStyle,
  plainInlineStyle,
  StyledTextBuilder,
  type InlineStyle,
  type MentionStyle,
  type Padding,
  type ParagraphStyle,
  type RenderStyle,
  type StyledDocument,
  type StyledFragment,
} from "./styled-text";

/** Counted by the engine as one code unit between consecutive blocks. */
export const BLOCK_SEPARATOR = "\n";
/** Keeps a multi-line code block inside one paragraph. */
export const CODE_LINE_SEPARATOR = "\u2028";
export const OBJECT_REPLACEMENT = "\uFFFC";

export type ProjectionRendererOptions = {
  style?: Partial<RenderStyle>;
  mentionHandler?: MentionDisplayHandler | null;
  decorationStrategy?: DecorationStrategy | DecorationStrategyKind;
};

export type RenderResult = {
  document: StyledDocument;
  /** Separator code units preceding each block. */
  indexDeltas: number[];
};

export type ViewLocation = {
  blockIndex: number;
  /** Null for a block without inline runs. */
  runIndex: number | null;
  offsetInRun: number;
};

type BlockLayout = {
  marker: string | null;
  continuesFromPrevious: boolean;
  continuesToNext: boolean;
};

type ResolvedMention = {
  text: string;
  style: InlineStyle;
  mention: MentionStyle | null;
};

const FLAT_PARAGRAPH: ParagraphStyle = {
  firstLineHeadIndent: 0,
  headIndent: 0,
  tailIndent: 0,
  spacingBefore: 0,
  spacingAfter: 0,
  container: null,
};

export class ProjectionRenderer {
  readonly style: RenderStyle;
  readonly mentionHandler: MentionDisplayHandler | null;
  readonly decorationStrategy: DecorationStrategy;

  constructor(options: ProjectionRendererOptions = {}) {
    this.style = { ...defaultRenderStyle, ...options.style };
    this.mentionHandler = options.mentionHandler ?? null;
    this.decorationStrategy = resolveDecorationStrategy(
      options.decorationStrategy,
    );
  }

  renderBlock(block: BlockProjection): StyledFragment {
    return this.buildFragment(block, {
      marker: new ListMarkerCounter().next(block.kind),
      continuesFromPrevious: false,
      continuesToNext: false,
    });
  }

  render(blocks: BlockProjection[]): RenderResult {
    const builder = new StyledTextBuilder();
    const counter = new ListMarkerCounter();
    const fragments: StyledFragment[] = [];
    const listMarkers: ListMarkerInfo[] = [];
    const indexDeltas: number[] = [];

    blocks.forEach((block, index) => {
      const previous = index > 0 ? blocks[index - 1] : undefined;
      const next = index < blocks.length - 1 ? blocks[index + 1] : undefined;

      if (previous) {
        builder.appendContent(
          BLOCK_SEPARATOR,
          this.blockBaseStyle(previous.kind),
        );
      }
      indexDeltas.push(index);

      const fragment = this.buildFragment(block, {
        marker: counter.next(block.kind),
        continuesFromPrevious: previous
          ? areSiblingsInSameContainer(previous, block)
          : false,
        continuesToNext: next ? areSiblingsInSameContainer(block, next) : false,
      });

      const viewStart = builder.viewLength;
      const modelStart = builder.modelLength;
      builder.appendStyled(fragment);

      const listMarker = fragment.listMarker
        ? {
            ...fragment.listMarker,
            characterIndex: viewStart + fragment.listMarker.characterIndex,
          }
        : null;
      if (listMarker) {
        listMarkers.push(listMarker);
      }
      fragments.push({ ...fragment, viewStart, modelStart, listMarker });
    });

    const { text, spans, registry } = builder.build();
    return {
      document: { text, fragments, spans, listMarkers, registry },
      indexDeltas,
    };
  }

  private buildFragment(
    block: BlockProjection,
    layout: BlockLayout,
  ): StyledFragment {
    const builder = new StyledTextBuilder();
    const paragraph = this.paragraphStyle(block, layout);

    if (layout.marker) {
      builder.appendDecoration(
        this.decorationStrategy.listMarkerText(layout.marker),
        { ...plainInlineStyle(this.style), color: this.style.listMarkerColor },
        this.decorationStrategy.listMarkerAssoc,
        "list-marker",
      );
    }

    for (const run of block.inlineRuns) {
      this.appendRun(builder, run, block.kind);
    }

    const { text, spans, registry } = builder.build();
    const listMarker: ListMarkerInfo | null = layout.marker
      ? {
          text: layout.marker,
          font: this.style.font,
          color: this.style.listMarkerColor,
          characterIndex: 0,
          headIndent: paragraph.headIndent,
        }
      : null;

    return {
      blockId: block.blockId,
      kind: block.kind,
      inQuote: block.inQuote,
      viewStart: 0,
      modelStart: 0,
      text,
      spans,
      paragraph,
      listMarker,
      registry,
    };
  }

  private appendRun(
    builder: StyledTextBuilder,
    run: InlineRun,
    blockKind: BlockKind,
  ): void {
    const isCodeBlock = blockKind.type === "codeBlock";

    switch (run.kind.type) {
      case "text": {
        const text = isCodeBlock
          ? run.kind.text.replace(/\n/g, CODE_LINE_SEPARATOR)
          : run.kind.text;
        builder.appendContent(
          text,
          this.inlineStyle(run.kind.attributes, blockKind),
        );
        return;
      }
      case "lineBreak":
        builder.appendContent(
          isCodeBlock ? CODE_LINE_SEPARATOR : "\n",
          this.blockBaseStyle(blockKind),
        );
        return;
      case "mention": {
        const runLength = run.endUtf16 - run.startUtf16;
        const resolved = this.resolveMention(
          run.kind.url,
          run.kind.displayText,
          blockKind,
        );
        // The run keeps exactly its model width; extra visible text is
        // view-only.
        const visible = resolved.text;
        const content =
          visible.length >= runLength
            ? visible.slice(0, runLength)
            : visible + OBJECT_REPLACEMENT.repeat(runLength - visible.length);
        builder.appendContent(content, resolved.style, resolved.mention);
        builder.appendDecoration(
          visible.slice(runLength),
          resolved.style,
          "after",
          "mention-overflow",
          resolved.mention,
        );
        return;
      }
    }
  }

  private resolveMention(
    url: string,
    displayText: string,
    blockKind: BlockKind,
  ): ResolvedMention {
    const base = this.blockBaseStyle(blockKind);
    const handler = this.mentionHandler;
    if (!handler) {
      return {
        text: displayText,
        style: { ...base, link: url, color: this.style.linkColor },
        mention: null,
      };
    }

    const atRoom = isAtRoomMention(url);
    const display = atRoom
      ? handler.resolveAtRoomMentionDisplay()
      : handler.resolveMentionDisplay(displayText, url);

    switch (display.type) {
      case "plain":
        return {
          text: displayText,
          style: base,
          mention: { url, display: "plain", atRoom },
        };
      case "pill":
        return {
          text: displayText,
          style: base,
          mention: { url, display: "pill", atRoom },
        };
      case "custom":
        return {
          text: display.text,
          style: base,
          mention: { url, display: "custom", atRoom },
        };
    }
  }

  private blockBaseStyle(kind: BlockKind): InlineStyle {
    const style = plainInlineStyle(this.style);
    return kind.type === "codeBlock" ? { ...style, monospace: true } : style;
  }

  private inlineStyle(attributes: AttributeSet, kind: BlockKind): InlineStyle {
    return {
      bold: attributes.bold,
      italic: attributes.italic,
      monospace: kind.type === "codeBlock" || attributes.inlineCode,
      underline: attributes.underline,
      strikeThrough: attributes.strikeThrough,
      codeBackground: attributes.inlineCode,
      link: attributes.linkUrl,
      color: attributes.linkUrl ? this.style.linkColor : this.style.textColor,
    };
  }

  private paragraphStyle(
    block: BlockProjection,
    layout: BlockLayout,
  ): ParagraphStyle {
    const base = this.baseParagraphStyle(block.kind, block.inQuote);
    return {
      ...base,
      spacingBefore: layout.continuesFromPrevious ? 0 : base.spacingBefore,
      spacingAfter: layout.continuesToNext ? 0 : base.spacingAfter,
    };
  }

  private baseParagraphStyle(kind: BlockKind, inQuote: boolean): ParagraphStyle {
    const { quotePadding, codeBlockPadding } = this.style;
    switch (kind.type) {
      case "codeBlock":
        return paddedParagraph(codeBlockPadding, "code-block");
      case "quote":
        return paddedParagraph(quotePadding, "quote");
      case "listItem": {
        const indent = this.listHeadIndent(kind.depth, inQuote);
        return {
          firstLineHeadIndent: indent,
          headIndent: indent,
          tailIndent: inQuote ? -quotePadding.horizontal : 0,
          spacingBefore: inQuote ? quotePadding.vertical : 0,
          spacingAfter: inQuote ? quotePadding.vertical : 0,
          container: inQuote ? "quote" : null,
        };
      }
      case "paragraph":
      case "generic":
        return inQuote ? paddedParagraph(quotePadding, "quote") : FLAT_PARAGRAPH;
    }
  }

  private listHeadIndent(depth: number, inQuote: boolean): number {
    const gutter = this.style.listGutterWidth;
    const baseIndent = inQuote ? this.style.quotePadding.horizontal : 0;
    return baseIndent + (Math.max(1, depth) - 1) * gutter + gutter;
  }
}

/**
 * Resolves a view offset of a rendered document to the inline run it falls
 * in. Offsets inside a decoration resolve to the decoration's anchor.
 */
export function locateViewOffset(
  blocks: BlockProjection[],
  document: StyledDocument,
  viewOffset: number,
): ViewLocation | null {
  const model = createIndexMapper(document.registry).toModel({
    start: viewOffset,
    end: viewOffset,
  });
  if (!model) {
    return null;
  }

  for (let blockIndex = 0; blockIndex < blocks.length; blockIndex += 1) {
    const block = blocks[blockIndex];
    const fragment = document.fragments[blockIndex];
    if (!fragment) {
      return null;
    }
    const local = model.start - fragment.modelStart;
    if (local < 0) {
      return null;
    }
    if (local > block.endUtf16 - block.startUtf16) {
      continue;
    }

    if (block.inlineRuns.length === 0) {
      return { blockIndex, runIndex: null, offsetInRun: 0 };
    }
    for (let runIndex = 0; runIndex < block.inlineRuns.length; runIndex += 1) {
      const run = block.inlineRuns[runIndex];
      const runStart = run.startUtf16 - block.startUtf16;
      const runEnd = run.endUtf16 - block.startUtf16;
      if (local >= runStart && local <= runEnd) {
        return { blockIndex, runIndex, offsetInRun: local - runStart };
      }
    }
    return null;
  }

  return null;
}

function paddedParagraph(
  padding: Padding,
  container: "quote" | "code-block",
): ParagraphStyle {
  return {
    firstLineHeadIndent: padding.horizontal,
    headIndent: padding.horizontal,
    tailIndent: -padding.horizontal,
    spacingBefore: padding.vertical,
    spacingAfter: padding.vertical,
    container,
  };
}

function areSiblingsInSameContainer(
  a: BlockProjection,
  b: BlockProjection,
): boolean {
  if (a.kind.type === "quote" && b.kind.type === "quote") {
    return true;
  }
  if (a.kind.type === "codeBlock" && b.kind.type === "codeBlock") {
    return true;
  }
  return a.inQuote && b.inQuote;
}
