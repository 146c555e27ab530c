import type {
  DecorationStrategy,
  DecorationStrategyKind,
} from "../core/mapping/decoration-strategy";
import {
  createIndexMapper,
  EMPTY_REGISTRY,
  type IndexMapper,
} from "../core/mapping/index-mapper";
import { MAX_DIFF_PASSES, reconcileText } from "../core/string-differ";
import {
  COMPOSER_ACTIONS,
  type ActionState,
  type BlockProjection,
  type ComposerAction,
  type MenuAction,
  type MenuStateUpdate,
  type Range,
  type Selection,
  type SuggestionPattern,
} from "../core/types";
import {
  MentionDisplayCache,
  type MentionDisplayHandler,
} from "../mentions/mention-display-cache";
import { ProjectionRenderer } from "../render/projection-renderer";
import type { RenderStyle, StyledDocument } from "../render/styled-text";
import { sanitizeHtml } from "../sanitize/html-sanitizer";
import type { ComposerEngine, ComposerUpdate } from "./engine";
import { EngineFaultError, ReentrantDispatchError } from "./errors";
import { normalizeSelection, type ComposerIntent } from "./intents";
import { mapNativeEdit } from "./native-reconciliation";
import type { ComposerView } from "./text-buffer-view";

export type SyncStatus = "idle" | "dispatching" | "applying" | "faulted";

export type ResyncReason =
  | "requested"
  | "unmappable-edit"
  | "unmappable-selection"
  | "stale-view";

/** One emission of the engine's continuous update channel. */
export type ComposerSnapshot = {
  projections: BlockProjection[];
  selection: Selection;
};

export type ComposerLogger = Pick<Console, "warn" | "error">;

export type ComposerStateChange = {
  actionStates: ReadonlyMap<ComposerAction, ActionState>;
  suggestion: SuggestionPattern | null;
};

export type SyncControllerOptions = {
  engine: ComposerEngine;
  view: ComposerView;
  style?: Partial<RenderStyle>;
  mentionHandler?: MentionDisplayHandler | null;
  decorationStrategy?: DecorationStrategy | DecorationStrategyKind;
  /** Rethrow engine faults instead of logging them. */
  debug?: boolean;
  logger?: ComposerLogger;
  maxDiffPasses?: number;
  onResync?: (reason: ResyncReason) => void;
};

type RenderMode = "patch" | "replace";

type EngineResult = {
  update: ComposerUpdate;
  projections: BlockProjection[] | null;
};

export class SyncController {
  private readonly engine: ComposerEngine;
  private readonly view: ComposerView;
  private readonly renderer: ProjectionRenderer;
  private readonly mentionCache: MentionDisplayCache | null;
  private readonly debug: boolean;
  private readonly logger: ComposerLogger;
  private readonly maxDiffPasses: number;
  private readonly onResync?: (reason: ResyncReason) => void;

  private statusValue: SyncStatus = "idle";
  private readonly actionStatesValue = new Map<ComposerAction, ActionState>();
  private suggestionValue: SuggestionPattern | null = null;
  private documentValue: StyledDocument = {
    text: "",
    fragments: [],
    spans: [],
    listMarkers: [],
    registry: EMPTY_REGISTRY,
  };
  private indexDeltasValue: number[] = [];
  private mapperValue: IndexMapper = createIndexMapper(EMPTY_REGISTRY);
  private committedViewText = "";
  private readonly snapshotQueue: ComposerSnapshot[] = [];
  private subscribers: Array<(change: ComposerStateChange) => void> = [];
  private resyncCountValue = 0;
  private lastFaultValue: EngineFaultError | null = null;
  private destroyed = false;

  constructor(options: SyncControllerOptions) {
    this.engine = options.engine;
    this.view = options.view;
    this.debug =
      options.debug ??
      (typeof process !== "undefined" &&
        process.env.NODE_ENV === "development");
    this.logger = options.logger ?? console;
    this.maxDiffPasses = options.maxDiffPasses ?? MAX_DIFF_PASSES;
    this.onResync = options.onResync;
    this.mentionCache = options.mentionHandler
      ? new MentionDisplayCache(options.mentionHandler)
      : null;
    this.renderer = new ProjectionRenderer({
      style: options.style,
      mentionHandler: this.mentionCache,
      decorationStrategy: options.decorationStrategy,
    });

    this.commitRenderOrClamp(
      this.engine.getBlockProjections(),
      this.engine.getSelection(),
      "replace",
    );
  }

  get status(): SyncStatus {
    return this.statusValue;
  }

  get actionStates(): ReadonlyMap<ComposerAction, ActionState> {
    return this.actionStatesValue;
  }

  get suggestion(): SuggestionPattern | null {
    return this.suggestionValue;
  }

  get document(): StyledDocument {
    return this.documentValue;
  }

  get indexDeltas(): readonly number[] {
    return this.indexDeltasValue;
  }

  get mapper(): IndexMapper {
    return this.mapperValue;
  }

  get resyncCount(): number {
    return this.resyncCountValue;
  }

  get lastFault(): EngineFaultError | null {
    return this.lastFaultValue;
  }

  /**
   * Runs one intent through the engine and applies the result. Returns false
   * when the engine faulted and the fault was logged.
   */
  dispatch(intent: ComposerIntent): boolean {
    this.assertIdle(intent.type);
    this.statusValue = "dispatching";

    let result: EngineResult | null = null;
    try {
      result = this.guard(intent.type, intent, () =>
        this.runEngine(intent),
      );
      if (result) {
        this.statusValue = "applying";
        this.applyUpdate(result.update, result.projections);
      }
    } finally {
      this.settle();
    }

    this.drainSnapshots();
    return result !== null;
  }

  /** Queues a snapshot; snapshots are applied in order, one at a time. */
  receiveSnapshot(snapshot: ComposerSnapshot): void {
    this.assertAlive();
    this.snapshotQueue.push(snapshot);
    if (this.statusValue === "dispatching" || this.statusValue === "applying") {
      return;
    }
    this.drainSnapshots();
  }

  /**
   * The view was edited directly. The difference against the last committed
   * view text is sent to the engine as `replace-range` intents.
   */
  handleNativeEdit(liveViewText: string = this.view.text): boolean {
    this.assertIdle("native edit");

    const mapping = mapNativeEdit(
      this.committedViewText,
      liveViewText,
      this.mapperValue.registry,
      this.maxDiffPasses,
    );
    if (!mapping) {
      this.resync("unmappable-edit");
      return false;
    }
    if (mapping.fallback) {
      this.logger.warn(
        "[composer] Native edit exceeded the diff pass limit; sending the remaining region at once",
      );
    }
    if (mapping.intents.length === 0) {
      this.committedViewText = this.view.text;
      return true;
    }

    for (const intent of mapping.intents) {
      if (!this.dispatch(intent)) {
        this.resync("stale-view");
        return false;
      }
    }
    if (this.committedViewText !== this.view.text) {
      return this.resync("stale-view");
    }
    return true;
  }

  handleViewSelection(viewRange: Range): boolean {
    this.assertIdle("selection change");

    const model = this.mapperValue.toModel(
      normalizeSelection(viewRange.start, viewRange.end),
      this.view.length,
    );
    if (!model) {
      this.resync("unmappable-selection");
      return false;
    }
    return this.dispatch({
      type: "update-selection",
      start: model.start,
      end: model.end,
    });
  }

  /** Re-renders the whole view from the engine's canonical projections. */
  resync(reason: ResyncReason = "requested"): boolean {
    this.assertIdle("resync");
    this.statusValue = "applying";
    let resynced = false;
    try {
      resynced = this.performResync(reason);
    } finally {
      this.settle();
    }

    this.drainSnapshots();
    return resynced;
  }

  /** Starts a new editing session from (untrusted) HTML. */
  loadDocument(html = ""): boolean {
    this.assertIdle("loadDocument");
    this.statusValue = "dispatching";

    let loaded = false;
    try {
      const result = this.guard("loadDocument", null, () => {
        const update = this.engine.setContentFromHtml(sanitizeHtml(html));
        return {
          update,
          projections: this.engine.getBlockProjections(),
          selection: this.engine.getSelection(),
        };
      });
      if (result) {
        this.statusValue = "applying";
        this.actionStatesValue.clear();
        this.suggestionValue = null;
        this.mentionCache?.clear();
        this.commitRenderOrClamp(
          result.projections,
          result.selection,
          "replace",
        );
        this.applyMenuState(result.update.menuState);
        this.applyMenuAction(result.update.menuAction);
        this.notify();
        loaded = true;
      }
    } finally {
      this.settle();
    }

    this.drainSnapshots();
    return loaded;
  }

  subscribe(listener: (change: ComposerStateChange) => void): () => void {
    this.subscribers.push(listener);
    return () => {
      const index = this.subscribers.indexOf(listener);
      if (index !== -1) {
        this.subscribers.splice(index, 1);
      }
    };
  }

  destroy(): void {
    this.destroyed = true;
    this.actionStatesValue.clear();
    this.suggestionValue = null;
    this.mentionCache?.clear();
    this.snapshotQueue.length = 0;
    this.subscribers = [];
  }

  private runEngine(intent: ComposerIntent): EngineResult {
    const update = this.callEngine(intent);
    const projections =
      update.textUpdate.type === "replace-all"
        ? this.engine.getBlockProjections()
        : null;
    return { update, projections };
  }

  private callEngine(intent: ComposerIntent): ComposerUpdate {
    const { engine } = this;
    switch (intent.type) {
      case "replace-text":
        return engine.replaceText(intent.text);
      case "replace-range": {
        const range = normalizeSelection(intent.start, intent.end);
        return engine.replaceTextIn(intent.text, range.start, range.end);
      }
      case "insert-paragraph":
        return engine.enter();
      case "backspace":
        return engine.backspace();
      case "delete-range": {
        const range = normalizeSelection(intent.start, intent.end);
        return engine.deleteIn(range.start, range.end);
      }
      case "toggle-inline-format":
        return engine.toggleInlineFormat(intent.format);
      case "toggle-list":
        return engine.toggleList(intent.ordered);
      case "toggle-code-block":
        return engine.toggleCodeBlock();
      case "toggle-quote":
        return engine.toggleQuote();
      case "undo":
        return engine.undo();
      case "redo":
        return engine.redo();
      case "indent":
        return engine.indent();
      case "unindent":
        return engine.unindent();
      case "set-link":
        return engine.setLink(intent.url);
      case "remove-link":
        return engine.removeLinks();
      case "insert-link":
        return engine.insertLink(intent.url, intent.text);
      case "update-selection": {
        const range = normalizeSelection(intent.start, intent.end);
        return engine.select(range.start, range.end);
      }
      case "insert-mention":
        return engine.insertMention(intent.url, intent.text);
      case "insert-at-room-mention":
        return engine.insertAtRoomMention();
      default:
        return assertNever(intent);
    }
  }

  private applyUpdate(
    update: ComposerUpdate,
    projections: BlockProjection[] | null,
  ): void {
    const { textUpdate } = update;
    switch (textUpdate.type) {
      case "keep":
        break;
      case "replace-all": {
        const selection = { start: textUpdate.start, end: textUpdate.end };
        if (!this.commitRender(projections ?? [], selection, "patch")) {
          this.performResync("unmappable-selection");
        }
        break;
      }
      case "select":
        this.applySelection({ start: textUpdate.start, end: textUpdate.end });
        break;
    }

    const menuChanged = this.applyMenuState(update.menuState);
    const suggestionChanged = this.applyMenuAction(update.menuAction);
    if (menuChanged || suggestionChanged) {
      this.notify();
    }
  }

  private applySelection(selection: Selection): void {
    const viewRange = this.mapperValue.toView(
      normalizeSelection(selection.start, selection.end),
      this.view.length,
    );
    if (!viewRange) {
      this.performResync("unmappable-selection");
      return;
    }
    this.view.setSelection(viewRange);
  }

  /** Returns false when the selection could not be mapped into the view. */
  private commitRender(
    projections: BlockProjection[],
    selection: Selection,
    mode: RenderMode,
  ): boolean {
    const { document, indexDeltas } = this.renderer.render(projections);

    if (mode === "patch" && this.view.incrementalPatch) {
      this.patchView(document.text);
    } else {
      this.view.replaceAll(document.text);
    }

    this.committedViewText = this.view.text;
    this.documentValue = document;
    this.indexDeltasValue = indexDeltas;
    this.mapperValue = createIndexMapper(document.registry);

    const viewRange = this.mapperValue.toView(
      normalizeSelection(selection.start, selection.end),
      this.view.length,
    );
    if (!viewRange) {
      return false;
    }
    this.view.setSelection(viewRange);
    return true;
  }

  private commitRenderOrClamp(
    projections: BlockProjection[],
    selection: Selection,
    mode: RenderMode,
  ): void {
    if (!this.commitRender(projections, selection, mode)) {
      const { start, end } = normalizeSelection(selection.start, selection.end);
      const length = this.view.length;
      this.view.setSelection({
        start: clamp(start, 0, length),
        end: clamp(end, 0, length),
      });
    }
  }

  private patchView(text: string): void {
    const { replacements, fallback } = reconcileText(this.view.text, text, {
      maxPasses: this.maxDiffPasses,
    });
    if (fallback) {
      this.logger.warn(
        "[composer] View patch exceeded the diff pass limit; replaced the remaining region at once",
      );
    }
    for (const change of replacements) {
      this.view.applyPatch(change.location, change.length, change.text);
    }
  }

  private performResync(reason: ResyncReason): boolean {
    const canonical = this.guard("resync", null, () => ({
      projections: this.engine.getBlockProjections(),
      selection: this.engine.getSelection(),
    }));
    if (!canonical) {
      return false;
    }

    this.resyncCountValue += 1;
    this.logger.warn(`[composer] Re-syncing view (${reason})`);
    this.commitRenderOrClamp(
      canonical.projections,
      canonical.selection,
      "replace",
    );
    this.onResync?.(reason);
    return true;
  }

  private drainSnapshots(): void {
    let snapshot = this.snapshotQueue.shift();
    while (snapshot) {
      this.statusValue = "applying";
      try {
        const { projections, selection } = snapshot;
        if (!this.commitRender(projections, selection, "patch")) {
          this.performResync("unmappable-selection");
        }
      } finally {
        this.settle();
      }
      snapshot = this.snapshotQueue.shift();
    }
  }

  private applyMenuState(menuState: MenuStateUpdate): boolean {
    if (menuState.type === "keep") {
      return false;
    }

    let changed = false;
    for (const action of COMPOSER_ACTIONS) {
      const state = menuState.actionStates[action];
      if (state && this.actionStatesValue.get(action) !== state) {
        this.actionStatesValue.set(action, state);
        changed = true;
      }
    }
    return changed;
  }

  private applyMenuAction(menuAction: MenuAction): boolean {
    switch (menuAction.type) {
      case "keep":
        return false;
      case "none": {
        const changed = this.suggestionValue !== null;
        this.suggestionValue = null;
        return changed;
      }
      case "suggestion":
        this.suggestionValue = menuAction.pattern;
        return true;
    }
  }

  private notify(): void {
    const change: ComposerStateChange = {
      actionStates: new Map(this.actionStatesValue),
      suggestion: this.suggestionValue,
    };
    for (const subscriber of this.subscribers.slice()) {
      subscriber(change);
    }
  }

  /**
   * Runs engine calls. A throw leaves the controller untouched: the fault is
   * recorded, then rethrown in debug mode or logged otherwise.
   */
  private guard<T>(
    operation: string,
    intent: ComposerIntent | null,
    run: () => T,
  ): T | null {
    try {
      return run();
    } catch (error) {
      const fault = new EngineFaultError(operation, error, intent);
      this.lastFaultValue = fault;
      this.statusValue = "faulted";
      if (this.debug) {
        throw fault;
      }
      this.logger.error(`[composer] ${fault.message}`, error);
      return null;
    }
  }

  private settle(): void {
    if (this.statusValue !== "faulted") {
      this.statusValue = "idle";
    }
  }

  private assertIdle(operation: string): void {
    this.assertAlive();
    if (this.statusValue === "dispatching" || this.statusValue === "applying") {
      throw new ReentrantDispatchError(operation);
    }
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new Error("SyncController has been destroyed");
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled intent: ${JSON.stringify(value)}`);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
