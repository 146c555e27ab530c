import { EditorSelection, EditorState, Transaction } from "@codemirror/state";
import type { Range } from "../core/types";

/** The live text buffer the controller keeps in step with the engine. */
export type ComposerView = {
  readonly text: string;
  readonly length: number;
  /** View index space. */
  readonly selection: Range;
  /** Whether the host can apply small patches instead of full replaces. */
  readonly incrementalPatch: boolean;
  applyPatch(location: number, length: number, text: string): void;
  replaceAll(text: string): void;
  setSelection(range: Range): void;
};

export type ViewChange =
  | { type: "patch"; location: number; length: number; text: string }
  | { type: "replace-all"; text: string };

export type TextBufferViewOptions = {
  text?: string;
  incrementalPatch?: boolean;
};

/**
 * Headless {@link ComposerView} over a CodeMirror `EditorState`. Changes go
 * through transactions, so the selection is mapped across every patch.
 */
export class TextBufferView implements ComposerView {
  readonly incrementalPatch: boolean;
  private state: EditorState;
  private readonly changes: ViewChange[] = [];

  constructor(options: TextBufferViewOptions = {}) {
    this.incrementalPatch = options.incrementalPatch ?? true;
    this.state = EditorState.create({ doc: options.text ?? "" });
  }

  get text(): string {
    return this.state.doc.toString();
  }

  get length(): number {
    return this.state.doc.length;
  }

  get selection(): Range {
    const { from, to } = this.state.selection.main;
    return { start: from, end: to };
  }

  /** Every change applied by the controller, oldest first. */
  get appliedChanges(): readonly ViewChange[] {
    return this.changes;
  }

  applyPatch(location: number, length: number, text: string): void {
    this.changes.push({ type: "patch", location, length, text });
    this.state = this.state.update({
      changes: { from: location, to: location + length, insert: text },
      annotations: Transaction.userEvent.of("input.patch"),
    }).state;
  }

  replaceAll(text: string): void {
    this.changes.push({ type: "replace-all", text });
    this.state = this.state.update({
      changes: { from: 0, to: this.state.doc.length, insert: text },
      annotations: Transaction.userEvent.of("input.replace"),
    }).state;
  }

  setSelection(range: Range): void {
    this.state = this.state.update({
      selection: EditorSelection.single(range.start, range.end),
    }).state;
  }

  /**
   * An edit made by the user directly in the buffer, bypassing the engine.
   * The caret ends up after the inserted text.
   */
  applyUserEdit(range: Range, text: string): void {
    this.state = this.state.update({
      changes: { from: range.start, to: range.end, insert: text },
      selection: EditorSelection.cursor(range.start + text.length),
      annotations: Transaction.userEvent.of("input.type"),
    }).state;
  }
}
