/**
 * CodeMirror adapter for cubicle-highlight
 */

export {
  CATEGORY_TAG_MAP,
  cubicleHighlighter,
  type CubicleHighlightState,
} from './highlight.js';
export { cubicle, cubicleLanguage } from './language.js';
export { createThemeExtension } from './theme.js';
