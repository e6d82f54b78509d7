export { QuoteSource, QUOTE_THEMES, formatSeedTimestamp, saveQuoteFiles, type QuoteSourceOptions } from './quote-source.js';
export { QuoteHistory, normalizeQuote } from './quote-history.js';
export {
  parseQuote,
  stripEnumeration,
  wrapWords,
  layoutFrame,
  MAX_CHARS_PER_LINE,
  LINE_PITCH,
  type FrameLayout,
  type PlacedLine,
} from './text-layout.js';
export { resolveFonts, SYSTEM_FONT_CANDIDATES, type FontCandidate } from './fonts.js';
export { renderTextWithSharp, escapeMarkup, type TextRenderer, type RenderedText } from './text-renderer.js';
export { GRADIENT_PALETTE, pickGradient, gradientRow } from './palette.js';
export { BackgroundRenderer, MIN_IMAGE_BYTES, type BackgroundRendererOptions } from './background.js';
export { FrameComposer, OVERLAY_ALPHA, type FrameComposerOptions } from './frame-composer.js';
