export { PlatenEditor } from './core/PlatenEditor';
export type { MoveDirection, CursorPosition, ClipboardContent, PlatenEditorEvents } from './core/PlatenEditor';

export * from './types';
export { EditorConstants } from './constants';

export { EventEmitter } from './events/EventEmitter';
export type { EventMap, EventHandler } from './events/EventEmitter';

// Text module exports
export * from './text';

// Layout exports
export { ReflowEngine } from './layout/ReflowEngine';
export { paginate, pageCapacity, pageForLine, isPageBreakLine, pageBreakLabel } from './layout/Paginator';
export type { Page } from './layout/Paginator';

// Cursor exports
export { CursorModel, mapOffsetThroughEdit } from './cursor/CursorModel';
export type { CursorModelEvents, CursorModelOptions } from './cursor/CursorModel';

// Undo module exports
export * from './undo';

// Search exports
export { search, findAll, foldCase } from './search/SearchEngine';
export type { SearchDirection, SearchResult } from './search/SearchEngine';

// File format exports
export { encodeText, decodeText, encodeDocument, decodeDocument } from './codec/OverstrikeCodec';

// Clipboard interchange exports
export { styledToRtf, rtfToStyled, isRtf, MAX_RTF_SIZE } from './codec/RtfCodec';
export type { RtfReadOptions } from './codec/RtfCodec';

// Print exports
export {
  PageConstants,
  fontConfigFromDimensions,
  availableFonts,
  getFontConfig,
  defaultFontConfig,
  resolveFontConfig
} from './print/FontConfig';
export type { FontConfig, FontDimensions, ResolvedFont } from './print/FontConfig';
export { PrintFormatter, DEFAULT_PRINT_OPTIONS } from './print/PrintFormatter';
export type {
  PageGeometry,
  PrintRun,
  PageNumberLabel,
  PageDescription,
  FormattedDocument
} from './print/types';

// Rendering exports
export { renderTextPages, joinTextPages } from './rendering/TextPageRenderer';
export type { TextPage } from './rendering/TextPageRenderer';
export { PdfRenderer } from './rendering/PdfRenderer';
export type { Fontkit, EmbeddedFontFiles, PdfRendererOptions, PdfRenderResult } from './rendering/PdfRenderer';

// Session exports
export {
  DEFAULT_PREFERENCES,
  DEFAULT_DOCUMENT_KEY,
  validatePreference,
  loadPreferences,
  savePreferences,
  MemoryPreferenceStore
} from './session/Preferences';
export type { EditorPreferences, PreferenceKey, PreferenceStore } from './session/Preferences';
