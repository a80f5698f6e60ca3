/**
 * Cubicle Language Support
 */

import { LanguageSupport, StreamLanguage } from '@codemirror/language';
import { cubicleHighlighter, type CubicleHighlightState } from './highlight.js';

let language: StreamLanguage<CubicleHighlightState> | undefined;

/** The Cubicle StreamLanguage, defined once per process */
export function cubicleLanguage(): StreamLanguage<CubicleHighlightState> {
  language ??= StreamLanguage.define(cubicleHighlighter);
  return language;
}

/** Language support extension for an editor */
export function cubicle(): LanguageSupport {
  return new LanguageSupport(cubicleLanguage());
}
