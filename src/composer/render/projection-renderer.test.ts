import { describe, expect, it, vi } from "vitest";
import { createIndexMapper } from "../core/mapping/index-mapper";
import type {
  MentionDisplayHandler,
  TextDisplay,
} from "../mentions/mention-display-cache";
import { AT_ROOM_URL } from "../mentions/mention-url";
import {
  buildProjections,
  codeBlock,
  formatted,
  inQuote,
  lineBreakRun,
  listItem,
  mentionRun,
  paragraph,
  quote,
} from "../test/projections";
import { locateViewOffset, ProjectionRenderer } from "./projection-renderer";
import { defaultRenderStyle } from "./styled-text";

const ALICE = "https://example.org/#/@alice:example.org";

describe("ProjectionRenderer.renderBlock", () => {
  it("styles runs from their attributes", () => {
    const [block] = buildProjections([
      paragraph(
        "Hello ",
        formatted("world", { bold: true, linkUrl: "https://example.org" }),
      ),
    ]);
    const fragment = new ProjectionRenderer().renderBlock(block);

    expect(fragment.text).toBe("Hello world");
    expect(fragment.listMarker).toBeNull();
    expect(fragment.spans.map((span) => [span.viewStart, span.viewEnd])).toEqual(
      [
        [0, 6],
        [6, 11],
      ],
    );
    expect(fragment.spans[1]?.style).toEqual({
      bold: true,
      italic: false,
      monospace: false,
      underline: false,
      strikeThrough: false,
      codeBackground: false,
      link: "https://example.org",
      color: defaultRenderStyle.linkColor,
    });
  });

  it("marks inline code as monospace with a background", () => {
    const [block] = buildProjections([
      paragraph(formatted("x", { inlineCode: true, italic: true })),
    ]);
    const style = new ProjectionRenderer().renderBlock(block).spans[0]?.style;

    expect(style?.monospace).toBe(true);
    expect(style?.codeBackground).toBe(true);
    expect(style?.italic).toBe(true);
  });

  it("keeps code blocks in one paragraph", () => {
    const [block] = buildProjections([codeBlock("a\nb")]);
    const fragment = new ProjectionRenderer().renderBlock(block);

    expect(fragment.text).toBe("a\u2028b");
    expect(fragment.spans[0]?.style.monospace).toBe(true);
    expect(fragment.paragraph).toEqual({
      firstLineHeadIndent: 10,
      headIndent: 10,
      tailIndent: -10,
      spacingBefore: 6,
      spacingAfter: 6,
      container: "code-block",
    });
  });

  it("renders line breaks as one unit", () => {
    const [block] = buildProjections([paragraph("a", lineBreakRun, "b")]);
    const fragment = new ProjectionRenderer().renderBlock(block);

    expect(fragment.text).toBe("a\nb");
    expect(fragment.registry.modelLength).toBe(3);
  });
});

describe("ProjectionRenderer.render", () => {
  it("joins blocks with one separator unit", () => {
    const blocks = buildProjections([paragraph("ab"), paragraph("cd")]);
    const { document, indexDeltas } = new ProjectionRenderer().render(blocks);

    expect(document.text).toBe("ab\ncd");
    expect(indexDeltas).toEqual([0, 1]);
    expect(document.fragments.map((fragment) => fragment.viewStart)).toEqual([
      0, 3,
    ]);
    expect(document.fragments.map((fragment) => fragment.modelStart)).toEqual([
      0, 3,
    ]);
    expect(document.registry).toEqual({
      viewLength: 5,
      modelLength: 5,
      spans: [],
    });
    expect(blocks[1]?.startUtf16).toBe(3);
  });

  it("numbers ordered items per depth", () => {
    const blocks = buildProjections([
      listItem("ordered", 1, "a"),
      listItem("ordered", 1, "b"),
      listItem("ordered", 2, "c"),
      listItem("ordered", 2, "d"),
      listItem("ordered", 1, "e"),
      paragraph("f"),
      listItem("ordered", 1, "g"),
      listItem("unordered", 1, "h"),
    ]);
    const { document } = new ProjectionRenderer().render(blocks);

    expect(document.text).toBe("a\nb\nc\nd\ne\nf\ng\nh");
    expect(document.listMarkers.map((marker) => marker.text)).toEqual([
      "1.",
      "2.",
      "1.",
      "2.",
      "3.",
      "1.",
      "\u2022",
    ]);
    expect(
      document.listMarkers.map((marker) => marker.characterIndex),
    ).toEqual([0, 2, 4, 6, 8, 12, 14]);
    expect(document.listMarkers.map((marker) => marker.headIndent)).toEqual([
      26, 26, 52, 52, 26, 26, 26,
    ]);
  });

  it("indents list items inside a quote past the quote padding", () => {
    const blocks = buildProjections([inQuote(listItem("ordered", 2, "x"))]);
    const { document } = new ProjectionRenderer().render(blocks);

    expect(document.fragments[0]?.paragraph).toEqual({
      firstLineHeadIndent: 64,
      headIndent: 64,
      tailIndent: -12,
      spacingBefore: 4,
      spacingAfter: 4,
      container: "quote",
    });
  });

  it("takes the gutter width from the style", () => {
    const renderer = new ProjectionRenderer({ style: { listGutterWidth: 20 } });
    const fragment = renderer.renderBlock(
      buildProjections([listItem("unordered", 2, "x")])[0],
    );

    expect(fragment.listMarker?.headIndent).toBe(40);
  });

  it("collapses spacing between siblings of one quote", () => {
    const blocks = buildProjections([quote("a"), quote("b"), paragraph("c")]);
    const { document } = new ProjectionRenderer().render(blocks);
    const spacing = document.fragments.map((fragment) => [
      fragment.paragraph.spacingBefore,
      fragment.paragraph.spacingAfter,
    ]);

    expect(spacing).toEqual([
      [4, 0],
      [0, 4],
      [0, 0],
    ]);
  });

  it("inserts literal markers as decorations", () => {
    const renderer = new ProjectionRenderer({ decorationStrategy: "literal" });
    const blocks = buildProjections([
      listItem("unordered", 1, "ab"),
      paragraph("c"),
      listItem("ordered", 1, "x"),
    ]);
    const { document } = renderer.render(blocks);

    expect(document.text).toBe("\u2022 ab\nc\n1. x");
    expect(document.registry).toEqual({
      viewLength: 11,
      modelLength: 6,
      spans: [
        { viewStart: 0, viewEnd: 2, assoc: "after", kind: "list-marker" },
        { viewStart: 7, viewEnd: 10, assoc: "after", kind: "list-marker" },
      ],
    });

    const mapper = createIndexMapper(document.registry);
    expect(mapper.toView({ start: 0, end: 2 })).toEqual({ start: 2, end: 4 });
    expect(mapper.toView({ start: 5, end: 6 })).toEqual({ start: 10, end: 11 });
    expect(mapper.toModel({ start: 0, end: 11 })).toEqual({ start: 0, end: 6 });
  });
});

describe("mentions", () => {
  it("falls back to the display text as a link", () => {
    const blocks = buildProjections([
      paragraph("hi ", mentionRun(ALICE, "@alice")),
    ]);
    const { document } = new ProjectionRenderer().render(blocks);

    expect(document.text).toBe("hi @alice");
    expect(document.registry).toEqual({
      viewLength: 9,
      modelLength: 4,
      spans: [
        {
          viewStart: 4,
          viewEnd: 9,
          assoc: "after",
          kind: "mention-overflow",
        },
      ],
    });
    const [, content, overflow] = document.spans;
    expect(content?.text).toBe("@");
    expect(content?.style.link).toBe(ALICE);
    expect(content?.decoration).toBeNull();
    expect(overflow?.text).toBe("alice");
    expect(overflow?.decoration).toBe("mention-overflow");
  });

  it("asks the handler how to display a mention", () => {
    const handler: MentionDisplayHandler = {
      resolveMentionDisplay: vi.fn(
        (): TextDisplay => ({ type: "custom", text: "B" }),
      ),
      resolveAtRoomMentionDisplay: vi.fn(
        (): TextDisplay => ({ type: "plain" }),
      ),
    };
    const renderer = new ProjectionRenderer({ mentionHandler: handler });
    const blocks = buildProjections([
      paragraph(mentionRun(ALICE, "@bob", 2), mentionRun(AT_ROOM_URL, "@room")),
    ]);
    const { document } = renderer.render(blocks);

    expect(handler.resolveMentionDisplay).toHaveBeenCalledWith("@bob", ALICE);
    expect(handler.resolveAtRoomMentionDisplay).toHaveBeenCalledTimes(1);
    expect(document.text).toBe("B\uFFFC@room");
    expect(document.registry.modelLength).toBe(3);
    expect(document.spans[0]?.mention).toEqual({
      url: ALICE,
      display: "custom",
      atRoom: false,
    });
    expect(document.spans[1]?.mention).toEqual({
      url: AT_ROOM_URL,
      display: "plain",
      atRoom: true,
    });
  });
});

describe("locateViewOffset", () => {
  const blocks = buildProjections([
    paragraph("ab", mentionRun(ALICE, "@bob"), " x"),
    paragraph("cd"),
  ]);
  const { document } = new ProjectionRenderer().render(blocks);

  it("resolves offsets to runs", () => {
    expect(document.text).toBe("ab@bob x\ncd");
    expect(locateViewOffset(blocks, document, 1)).toEqual({
      blockIndex: 0,
      runIndex: 0,
      offsetInRun: 1,
    });
    expect(locateViewOffset(blocks, document, 8)).toEqual({
      blockIndex: 0,
      runIndex: 2,
      offsetInRun: 2,
    });
    expect(locateViewOffset(blocks, document, 9)).toEqual({
      blockIndex: 1,
      runIndex: 0,
      offsetInRun: 0,
    });
    expect(locateViewOffset(blocks, document, 10)).toEqual({
      blockIndex: 1,
      runIndex: 0,
      offsetInRun: 1,
    });
  });

  it("snaps offsets inside a mention to its end", () => {
    expect(locateViewOffset(blocks, document, 4)).toEqual({
      blockIndex: 0,
      runIndex: 1,
      offsetInRun: 1,
    });
  });

  it("returns null outside the document", () => {
    expect(locateViewOffset(blocks, document, 12)).toBeNull();
  });
});
