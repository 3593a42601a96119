/**
 * Flesch reading ease for English prose.
 *
 *   206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words)
 *
 * Higher is easier; typical prose falls between 0 and 100.
 */

const WORD = /[A-Za-z]+(?:'[A-Za-z]+)?/g;

/**
 * Heuristic syllable count: vowel groups after dropping a silent
 * trailing e and -es/-ed endings
 */
export function countSyllables(word: string): number {
    let lower = word.toLowerCase().replace(/[^a-z]/g, '');
    if (lower.length === 0) return 0;
    if (lower.length <= 3) return 1;

    lower = lower.replace(/(?:[^laeiouy]es|ed|[^laeiouy]e)$/, '').replace(/^y/, '');
    const groups = lower.match(/[aeiouy]{1,2}/g);
    return Math.max(1, groups ? groups.length : 0);
}

export function countSentences(text: string): number {
    const sentences = text
        .split(/[.!?]+(?:\s|$)|\n\s*\n/)
        .filter(sentence => /[A-Za-z]/.test(sentence));
    return Math.max(1, sentences.length);
}

/**
 * Reading ease of `text`, or null when it has no words
 */
export function fleschReadingEase(text: string): number | null {
    const words = text.match(WORD) ?? [];
    if (words.length === 0) return null;

    const sentences = countSentences(text);
    const syllables = words.reduce((total, word) => total + countSyllables(word), 0);

    return 206.835 - 1.015 * (words.length / sentences) - 84.6 * (syllables / words.length);
}

/**
 * Reading ease clamped to [0, 100] and scaled to [0, 1]
 */
export function clarityOf(text: string): number | null {
    const ease = fleschReadingEase(text);
    if (ease === null) return null;
    return Math.min(100, Math.max(0, ease)) / 100;
}
