import type { BlockProjection } from "../core/types";

/** Url carried by the at-room mention run. */
export const AT_ROOM_URL = "@room";
export const AT_ROOM_DISPLAY_TEXT = "@room";

export type MentionSigil = "@" | "#" | "!" | "/";

export type MentionTarget =
  | { type: "user"; identifier: string }
  | { type: "room-alias"; identifier: string }
  | { type: "room-id"; identifier: string }
  | { type: "command"; identifier: string }
  | { type: "at-room" };

export type MentionsState = {
  userIds: string[];
  roomAliases: string[];
  roomIds: string[];
  hasAtRoomMention: boolean;
};

export function isAtRoomMention(url: string): boolean {
  return url === AT_ROOM_URL;
}

/**
 * Parses `scheme://host/#/<sigil><identifier>`. The identifier keeps its
 * sigil, e.g. `@alice:example.org`.
 */
export function parseMentionUrl(url: string): MentionTarget | null {
  if (isAtRoomMention(url)) {
    return { type: "at-room" };
  }

  let fragment: string;
  try {
    const parsed = new URL(url);
    if (!parsed.hash.startsWith("#/")) {
      return null;
    }
    fragment = decodeURIComponent(parsed.hash.slice(2));
  } catch {
    return null;
  }

  if (fragment.length < 2) {
    return null;
  }

  switch (fragment[0]) {
    case "@":
      return { type: "user", identifier: fragment };
    case "#":
      return { type: "room-alias", identifier: fragment };
    case "!":
      return { type: "room-id", identifier: fragment };
    case "/":
      return { type: "command", identifier: fragment };
    default:
      return null;
  }
}

export function buildMentionUrl(
  baseUrl: string,
  sigil: MentionSigil,
  identifier: string,
): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  return `${base}/#/${sigil}${encodeURIComponent(identifier)}`;
}

/** Distinct mentions in document order. */
export function collectMentionsState(blocks: BlockProjection[]): MentionsState {
  const state: MentionsState = {
    userIds: [],
    roomAliases: [],
    roomIds: [],
    hasAtRoomMention: false,
  };

  const addUnique = (list: string[], value: string) => {
    if (!list.includes(value)) {
      list.push(value);
    }
  };

  for (const block of blocks) {
    for (const run of block.inlineRuns) {
      if (run.kind.type !== "mention") {
        continue;
      }
      const target = parseMentionUrl(run.kind.url);
      switch (target?.type) {
        case "at-room":
          state.hasAtRoomMention = true;
          break;
        case "user":
          addUnique(state.userIds, target.identifier);
          break;
        case "room-alias":
          addUnique(state.roomAliases, target.identifier);
          break;
        case "room-id":
          addUnique(state.roomIds, target.identifier);
          break;
        default:
          break;
      }
    }
  }

  return state;
}
