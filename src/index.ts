// Font handle
export { Font } from './font'
export { fontsInCollection } from './sfnt/directory'

// Errors
export {
  FontError,
  FontIndexOutOfBoundsError,
  MalformedFontError,
  MalformedGlyphError,
  OutOfRangeError,
  UnknownAxisError,
} from './shared/errors'

// Types
export type {
  FontOptions,
  LineMetrics,
  Logger,
  OutlineBuilder,
  Rect,
  ScriptMetrics,
  VariationAxis,
  VariationSetting,
} from './types'
export { DEFAULT_FONT_OPTIONS, silentLogger } from './types'
