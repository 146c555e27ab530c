import type { ComposerAction, InlineFormat, Range } from "../core/types";

export type ComposerIntent =
  | { type: "replace-text"; text: string }
  | { type: "replace-range"; text: string; start: number; end: number }
  | { type: "insert-paragraph" }
  | { type: "backspace" }
  | { type: "delete-range"; start: number; end: number }
  | { type: "toggle-inline-format"; format: InlineFormat }
  | { type: "toggle-list"; ordered: boolean }
  | { type: "toggle-code-block" }
  | { type: "toggle-quote" }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "indent" }
  | { type: "unindent" }
  | { type: "set-link"; url: string }
  | { type: "remove-link" }
  | { type: "insert-link"; url: string; text: string }
  | { type: "update-selection"; start: number; end: number }
  | { type: "insert-mention"; url: string; text: string }
  | { type: "insert-at-room-mention" };

export type ComposerIntentType = ComposerIntent["type"];

/** Orders a possibly backwards selection. */
export function normalizeSelection(start: number, end: number): Range {
  return start <= end ? { start, end } : { start: end, end: start };
}

/**
 * The intent a toolbar button for `action` dispatches. `link` needs a url and
 * has no parameterless intent.
 */
export function intentForAction(action: ComposerAction): ComposerIntent | null {
  switch (action) {
    case "bold":
    case "italic":
    case "strike-through":
    case "underline":
    case "inline-code":
      return { type: "toggle-inline-format", format: action };
    case "link":
      return null;
    case "undo":
      return { type: "undo" };
    case "redo":
      return { type: "redo" };
    case "ordered-list":
      return { type: "toggle-list", ordered: true };
    case "unordered-list":
      return { type: "toggle-list", ordered: false };
    case "indent":
      return { type: "indent" };
    case "unindent":
      return { type: "unindent" };
    case "code-block":
      return { type: "toggle-code-block" };
    case "quote":
      return { type: "toggle-quote" };
  }
}
