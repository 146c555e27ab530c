import type {
  BlockProjection,
  InlineFormat,
  MenuAction,
  MenuStateUpdate,
  Selection,
  TextUpdate,
} from "../core/types";

export type ComposerUpdate = {
  textUpdate: TextUpdate;
  menuState: MenuStateUpdate;
  menuAction: MenuAction;
};

/**
 * The document engine. Every call is synchronous and not reentrant; a call
 * that throws leaves the engine in its pre-call state.
 */
export type ComposerEngine = {
  replaceText(text: string): ComposerUpdate;
  replaceTextIn(text: string, start: number, end: number): ComposerUpdate;
  enter(): ComposerUpdate;
  backspace(): ComposerUpdate;
  deleteIn(start: number, end: number): ComposerUpdate;
  toggleInlineFormat(format: InlineFormat): ComposerUpdate;
  toggleList(ordered: boolean): ComposerUpdate;
  toggleCodeBlock(): ComposerUpdate;
  toggleQuote(): ComposerUpdate;
  undo(): ComposerUpdate;
  redo(): ComposerUpdate;
  indent(): ComposerUpdate;
  unindent(): ComposerUpdate;
  setLink(url: string): ComposerUpdate;
  removeLinks(): ComposerUpdate;
  insertLink(url: string, text: string): ComposerUpdate;
  select(start: number, end: number): ComposerUpdate;
  insertMention(url: string, text: string): ComposerUpdate;
  insertAtRoomMention(): ComposerUpdate;
  setContentFromHtml(html: string): ComposerUpdate;
  getBlockProjections(): BlockProjection[];
  getSelection(): Selection;
};
