import { describe, expect, it } from "vitest";
import {
  createIndexMapper,
  DecorationRegistryBuilder,
  type DecorationRegistry,
} from "./index-mapper";

function registryWithTwoExtraUnits(): DecorationRegistry {
  const builder = new DecorationRegistryBuilder();
  builder.appendContent("a".repeat(23));
  builder.appendDecoration("x", "before", "mention-overflow");
  builder.appendContent("b".repeat(12));
  builder.appendDecoration("y", "before", "mention-overflow");
  builder.appendContent("c".repeat(10));
  return builder.build().registry;
}

describe("IndexMapper", () => {
  it("is the identity without decorations", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendContent("hello");
    const mapper = createIndexMapper(builder.build().registry);

    expect(mapper.toView({ start: 1, end: 4 })).toEqual({ start: 1, end: 4 });
    expect(mapper.toModel({ start: 0, end: 5 })).toEqual({ start: 0, end: 5 });
  });

  it("shifts model offsets past view-only units", () => {
    const registry = registryWithTwoExtraUnits();
    const mapper = createIndexMapper(registry);

    expect(registry.viewLength).toBe(47);
    expect(registry.modelLength).toBe(45);
    expect(mapper.toView({ start: 23, end: 23 })).toEqual({
      start: 23,
      end: 23,
    });
    expect(mapper.toView({ start: 24, end: 25 })).toEqual({
      start: 25,
      end: 26,
    });
    expect(mapper.toView({ start: 28, end: 40 })).toEqual({
      start: 29,
      end: 42,
    });
  });

  it("maps view offsets back to the model", () => {
    const mapper = createIndexMapper(registryWithTwoExtraUnits());

    expect(mapper.toModel({ start: 23, end: 24 })).toEqual({
      start: 23,
      end: 23,
    });
    expect(mapper.toModel({ start: 29, end: 42 })).toEqual({
      start: 28,
      end: 40,
    });
  });

  it("round trips view ranges clear of decorations", () => {
    const mapper = createIndexMapper(registryWithTwoExtraUnits());
    const model = mapper.toModel({ start: 25, end: 30 });

    expect(model).toEqual({ start: 24, end: 29 });
    expect(model && mapper.toView(model)).toEqual({ start: 25, end: 30 });
  });

  it("moves offsets at an after-anchor past the decoration", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendDecoration("1. ", "after", "list-marker");
    builder.appendContent("abc");
    const mapper = createIndexMapper(builder.build().registry);

    expect(mapper.toView({ start: 0, end: 0 })).toEqual({ start: 3, end: 3 });
    expect(mapper.toView({ start: 0, end: 3 })).toEqual({ start: 3, end: 6 });
    expect(mapper.toModel({ start: 4, end: 6 })).toEqual({ start: 1, end: 3 });
  });

  it("never splits a decoration", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendContent("@");
    builder.appendDecoration("alice", "after", "mention-overflow");
    builder.appendContent(" hi");
    const mapper = createIndexMapper(builder.build().registry);

    expect(mapper.toModel({ start: 2, end: 4 })).toEqual({ start: 1, end: 1 });
    expect(mapper.toView({ start: 0, end: 1 })).toEqual({ start: 0, end: 6 });
  });

  it("round trips every model range", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendDecoration("\u2022 ", "after", "list-marker");
    builder.appendContent("ab");
    builder.appendContent("@");
    builder.appendDecoration("bob", "after", "mention-overflow");
    builder.appendContent("\n");
    builder.appendDecoration("2. ", "after", "list-marker");
    builder.appendContent("cd");
    const mapper = createIndexMapper(builder.build().registry);
    const { modelLength } = mapper.registry;

    for (let start = 0; start <= modelLength; start += 1) {
      for (let end = start; end <= modelLength; end += 1) {
        const view = mapper.toView({ start, end });
        expect(view).not.toBeNull();
        if (view) {
          expect(mapper.toModel(view)).toEqual({ start, end });
        }
      }
    }
  });

  it("rejects invalid ranges", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendContent("abc");
    const mapper = createIndexMapper(builder.build().registry);

    expect(mapper.toView({ start: -1, end: 1 })).toBeNull();
    expect(mapper.toView({ start: 2, end: 1 })).toBeNull();
    expect(mapper.toView({ start: 0, end: 4 })).toBeNull();
    expect(mapper.toModel({ start: 0, end: 4 })).toBeNull();
  });

  it("returns null when the live view has diverged", () => {
    const builder = new DecorationRegistryBuilder();
    builder.appendContent("abc");
    const mapper = createIndexMapper(builder.build().registry);

    expect(mapper.toModel({ start: 0, end: 1 }, 4)).toBeNull();
    expect(mapper.toView({ start: 0, end: 1 }, 2)).toBeNull();
    expect(mapper.toModel({ start: 0, end: 1 }, 3)).toEqual({
      start: 0,
      end: 1,
    });
  });
});

describe("DecorationRegistryBuilder", () => {
  it("offsets appended registries", () => {
    const inner = new DecorationRegistryBuilder();
    inner.appendDecoration("1. ", "after", "list-marker");
    inner.appendContent("x");

    const outer = new DecorationRegistryBuilder();
    outer.appendContent("ab\n");
    outer.appendBuilt(inner.build());
    const { text, registry } = outer.build();

    expect(text).toBe("ab\n1. x");
    expect(registry).toEqual({
      viewLength: 7,
      modelLength: 4,
      spans: [{ viewStart: 3, viewEnd: 6, assoc: "after", kind: "list-marker" }],
    });
  });
});
