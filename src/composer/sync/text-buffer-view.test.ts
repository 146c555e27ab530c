import { describe, expect, it } from "vitest";
import { TextBufferView } from "./text-buffer-view";

describe("TextBufferView", () => {
  it("maps the selection through patches", () => {
    const view = new TextBufferView({ text: "hello" });
    view.setSelection({ start: 3, end: 5 });

    view.applyPatch(0, 1, "J");
    view.applyPatch(0, 0, ">> ");

    expect(view.text).toBe(">> Jello");
    expect(view.selection).toEqual({ start: 6, end: 8 });
    expect(view.appliedChanges).toEqual([
      { type: "patch", location: 0, length: 1, text: "J" },
      { type: "patch", location: 0, length: 0, text: ">> " },
    ]);
  });

  it("puts the caret after a user edit", () => {
    const view = new TextBufferView({ text: "ac" });
    view.applyUserEdit({ start: 1, end: 1 }, "b");

    expect(view.text).toBe("abc");
    expect(view.selection).toEqual({ start: 2, end: 2 });
    expect(view.appliedChanges).toEqual([]);
  });

  it("keeps code line separators as single units", () => {
    const view = new TextBufferView();
    view.replaceAll("a\u2028b");

    expect(view.length).toBe(3);
    expect(view.text).toBe("a\u2028b");
  });
});
