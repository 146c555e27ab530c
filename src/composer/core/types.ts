/** A `[start, end)` range of UTF-16 code units. */
export type Range = {
  start: number;
  end: number;
};

/**
 * Selection in model index space. Callers may hand over a backwards
 * selection (`start > end`); it is normalized before reaching the engine.
 */
export type Selection = Range;

export type AttributeSet = {
  bold: boolean;
  italic: boolean;
  strikeThrough: boolean;
  underline: boolean;
  inlineCode: boolean;
  linkUrl: string | null;
};

export type InlineRunKind =
  | { type: "text"; text: string; attributes: AttributeSet }
  | { type: "mention"; url: string; displayText: string }
  | { type: "lineBreak" };

export type InlineRun = {
  nodeId: string;
  startUtf16: number;
  endUtf16: number;
  kind: InlineRunKind;
};

export type ListType = "ordered" | "unordered";

export type BlockKind =
  | { type: "paragraph" }
  | { type: "quote" }
  | { type: "codeBlock" }
  | { type: "listItem"; listType: ListType; depth: number }
  | { type: "generic" };

export type BlockProjection = {
  blockId: string;
  kind: BlockKind;
  inQuote: boolean;
  /** First content code unit. */
  startUtf16: number;
  /** Exclusive; never includes the inter-block separator. */
  endUtf16: number;
  inlineRuns: InlineRun[];
};

export type ActionState = "enabled" | "disabled" | "reversed";

export type ComposerAction =
  | "bold"
  | "italic"
  | "strike-through"
  | "underline"
  | "inline-code"
  | "link"
  | "undo"
  | "redo"
  | "ordered-list"
  | "unordered-list"
  | "indent"
  | "unindent"
  | "code-block"
  | "quote";

export const COMPOSER_ACTIONS: readonly ComposerAction[] = [
  "bold",
  "italic",
  "strike-through",
  "underline",
  "inline-code",
  "link",
  "undo",
  "redo",
  "ordered-list",
  "unordered-list",
  "indent",
  "unindent",
  "code-block",
  "quote",
];

export type InlineFormat =
  | "bold"
  | "italic"
  | "strike-through"
  | "underline"
  | "inline-code";

export type TextUpdate =
  | { type: "keep" }
  | {
      type: "replace-all";
      replacementText: string;
      start: number;
      end: number;
    }
  | { type: "select"; start: number; end: number };

export type MenuStateUpdate =
  | { type: "keep" }
  | {
      type: "update";
      /** Only the entries that changed. */
      actionStates: Partial<Record<ComposerAction, ActionState>>;
    };

export type SuggestionKey = "@" | "#" | "/";

export type SuggestionPattern = {
  key: SuggestionKey;
  text: string;
  start: number;
  end: number;
};

export type MenuAction =
  | { type: "keep" }
  | { type: "none" }
  | { type: "suggestion"; pattern: SuggestionPattern };

export const EMPTY_ATTRIBUTES: AttributeSet = Object.freeze({
  bold: false,
  italic: false,
  strikeThrough: false,
  underline: false,
  inlineCode: false,
  linkUrl: null,
});
