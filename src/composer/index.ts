export {
  applyReplacement,
  MAX_DIFF_PASSES,
  MAX_LCS_CELLS,
  normalizeWhitespace,
  reconcileText,
  replacement,
  singleRegionReplacement,
} from "./core/string-differ";
export type {
  ReconcileResult,
  StringDifferReplacement,
} from "./core/string-differ";
export {
  createIndexMapper,
  DecorationRegistryBuilder,
  EMPTY_REGISTRY,
} from "./core/mapping/index-mapper";
export type {
  DecorationAssoc,
  DecorationKind,
  DecorationRegistry,
  DecorationSpan,
  IndexMapper,
} from "./core/mapping/index-mapper";
export {
  gutterDecorationStrategy,
  literalDecorationStrategy,
  resolveDecorationStrategy,
} from "./core/mapping/decoration-strategy";
export type {
  DecorationStrategy,
  DecorationStrategyKind,
} from "./core/mapping/decoration-strategy";
export { COMPOSER_ACTIONS, EMPTY_ATTRIBUTES } from "./core/types";
export type {
  ActionState,
  AttributeSet,
  BlockKind,
  BlockProjection,
  ComposerAction,
  InlineFormat,
  InlineRun,
  InlineRunKind,
  ListType,
  MenuAction,
  MenuStateUpdate,
  Range,
  Selection,
  SuggestionKey,
  SuggestionPattern,
  TextUpdate,
} from "./core/types";
export { MentionDisplayCache } from "./mentions/mention-display-cache";
export type {
  MentionDisplayHandler,
  TextDisplay,
} from "./mentions/mention-display-cache";
export {
  AT_ROOM_DISPLAY_TEXT,
  AT_ROOM_URL,
  buildMentionUrl,
  collectMentionsState,
  isAtRoomMention,
  parseMentionUrl,
} from "./mentions/mention-url";
export type {
  MentionSigil,
  MentionsState,
  MentionTarget,
} from "./mentions/mention-url";
export { BULLET_MARKER } from "./render/list-markers";
export type { ListMarkerInfo } from "./render/list-markers";
export {
  BLOCK_SEPARATOR,
  CODE_LINE_SEPARATOR,
  locateViewOffset,
  OBJECT_REPLACEMENT,
  ProjectionRenderer,
} from "./render/projection-renderer";
export type {
  ProjectionRendererOptions,
  RenderResult,
  ViewLocation,
} from "./render/projection-renderer";
export { defaultRenderStyle } from "./render/styled-text";
export type {
  InlineStyle,
  MentionStyle,
  Padding,
  ParagraphStyle,
  RenderStyle,
  StyledDocument,
  StyledFragment,
  StyledSpan,
} from "./render/styled-text";
export { sanitizeHtml } from "./sanitize/html-sanitizer";
export type { ComposerEngine, ComposerUpdate } from "./sync/engine";
export { EngineFaultError, ReentrantDispatchError } from "./sync/errors";
export { intentForAction, normalizeSelection } from "./sync/intents";
export type { ComposerIntent, ComposerIntentType } from "./sync/intents";
export { mapNativeEdit } from "./sync/native-reconciliation";
export type { NativeEditMapping } from "./sync/native-reconciliation";
export { SyncController } from "./sync/sync-controller";
export type {
  ComposerLogger,
  ComposerSnapshot,
  ComposerStateChange,
  ResyncReason,
  SyncControllerOptions,
  SyncStatus,
} from "./sync/sync-controller";
export { TextBufferView } from "./sync/text-buffer-view";
export type {
  ComposerView,
  TextBufferViewOptions,
  ViewChange,
} from "./sync/text-buffer-view";
