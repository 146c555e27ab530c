import { describe, expect, it } from "vitest";
import type { BlockProjection } from "../core/types";
import {
  AT_ROOM_URL,
  buildMentionUrl,
  collectMentionsState,
  parseMentionUrl,
} from "./mention-url";

describe("parseMentionUrl", () => {
  it("reads the sigil after the fragment slash", () => {
    expect(parseMentionUrl("https://example.org/#/@alice:example.org")).toEqual(
      { type: "user", identifier: "@alice:example.org" },
    );
    expect(parseMentionUrl("https://example.org/#/#lobby:example.org")).toEqual(
      { type: "room-alias", identifier: "#lobby:example.org" },
    );
    expect(parseMentionUrl("https://example.org/#/!abc:example.org")).toEqual({
      type: "room-id",
      identifier: "!abc:example.org",
    });
    expect(parseMentionUrl("https://example.org/#/%2Fshrug")).toEqual({
      type: "command",
      identifier: "/shrug",
    });
  });

  it("recognizes the at-room mention", () => {
    expect(parseMentionUrl(AT_ROOM_URL)).toEqual({ type: "at-room" });
  });

  it("returns null for anything else", () => {
    expect(parseMentionUrl("not a url")).toBeNull();
    expect(parseMentionUrl("https://example.org/page")).toBeNull();
    expect(parseMentionUrl("https://example.org/#/@")).toBeNull();
    expect(parseMentionUrl("https://example.org/#/alice")).toBeNull();
  });
});

describe("buildMentionUrl", () => {
  it("builds a url that parses back", () => {
    const url = buildMentionUrl("https://example.org/", "@", "bob:example.org");

    expect(url).toBe("https://example.org/#/@bob%3Aexample.org");
    expect(parseMentionUrl(url)).toEqual({
      type: "user",
      identifier: "@bob:example.org",
    });
  });
});

describe("collectMentionsState", () => {
  it("collects distinct mentions across blocks", () => {
    const mention = (nodeId: string, start: number, url: string) => ({
      nodeId,
      startUtf16: start,
      endUtf16: start + 1,
      kind: { type: "mention" as const, url, displayText: "x" },
    });
    const blocks: BlockProjection[] = [
      {
        blockId: "b1",
        kind: { type: "paragraph" },
        inQuote: false,
        startUtf16: 0,
        endUtf16: 2,
        inlineRuns: [
          mention("m1", 0, "https://example.org/#/@alice:example.org"),
          mention("m2", 1, AT_ROOM_URL),
        ],
      },
      {
        blockId: "b2",
        kind: { type: "paragraph" },
        inQuote: false,
        startUtf16: 3,
        endUtf16: 5,
        inlineRuns: [
          mention("m3", 3, "https://example.org/#/@alice:example.org"),
          mention("m4", 4, "https://example.org/#/#lobby:example.org"),
        ],
      },
    ];

    expect(collectMentionsState(blocks)).toEqual({
      userIds: ["@alice:example.org"],
      roomAliases: ["#lobby:example.org"],
      roomIds: [],
      hasAtRoomMention: true,
    });
  });
});
