// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * First phrase contained in `lowerText`, or undefined.
 * Plain substring search: "watch" matches "watching".
 */
export function findPhrase(lowerText: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => lowerText.includes(phrase));
}

/** Whitespace-delimited word count. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function lowercaseAll(phrases: readonly string[]): string[] {
  return phrases.map((p) => p.toLowerCase());
}
