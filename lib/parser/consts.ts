/**
 * Parser constants.
 *
 * This module provides centralized constants used throughout the parser and
 * printer, including character constants for syntax tokens and regex
 * patterns.
 *
 * @module
 */

// Character constants
export const LEFT_PAREN = "(";
export const RIGHT_PAREN = ")";
export const BACKSLASH = "\\";
const LAMBDA = "λ";
export const DOT = ".";
export const PLUS = "+";
export const MINUS = "-";
export const STAR = "*";
export const SLASH = "/";

export const ABSTRACTION_MARKERS: readonly string[] = [BACKSLASH, LAMBDA];

// Regex patterns
export const DIGIT_REGEX = /[0-9]/;
export const WHITESPACE_REGEX = /\s/;
export const IDENTIFIER_START_REGEX = /[A-Za-z]/;
export const IDENTIFIER_CHAR_REGEX = /[A-Za-z0-9]/;
