import { clarityOf, countSentences, countSyllables, fleschReadingEase } from '../readability';

describe('readability', () => {
    describe('countSyllables', () => {
        it.each([
            ['cat', 1],
            ['the', 1],
            ['table', 2],
            ['jumped', 1],
            ['make', 1],
            ['readability', 5],
            ['', 0],
        ])('counts %s', (word, expected) => {
            expect(countSyllables(word)).toBe(expected);
        });
    });

    describe('countSentences', () => {
        it('splits on terminal punctuation', () => {
            expect(countSentences('One. Two! Three?')).toBe(3);
        });

        it('counts text without punctuation as one sentence', () => {
            expect(countSentences('no punctuation here')).toBe(1);
            expect(countSentences('')).toBe(1);
        });

        it('splits on blank lines', () => {
            expect(countSentences('First part\n\nSecond part')).toBe(2);
        });
    });

    describe('fleschReadingEase', () => {
        it('is null without words', () => {
            expect(fleschReadingEase('')).toBeNull();
            expect(fleschReadingEase('123 456')).toBeNull();
        });

        it('computes the formula', () => {
            // 3 words, 1 sentence, 4 syllables
            expect(fleschReadingEase('Add two numbers.')).toBeCloseTo(206.835 - 1.015 * 3 - 84.6 * (4 / 3), 6);
        });
    });

    describe('clarityOf', () => {
        it('scales reading ease to [0, 1]', () => {
            expect(clarityOf('Add two numbers.')).toBeCloseTo(0.9099, 4);
        });

        it('clamps very easy and very hard text', () => {
            expect(clarityOf('Go.')).toBe(1);
            expect(clarityOf('Internationalization.')).toBe(0);
        });

        it('is null without words', () => {
            expect(clarityOf('   ')).toBeNull();
        });
    });
});
