import { JavaAdapter } from '../JavaAdapter';
import { ParseError } from '../../models/errors';

const SOURCE = [
    '/**',
    ' * Utilities.',
    ' */',
    'package com.example;',
    '',
    '/**',
    ' * A calculator.',
    ' */',
    'public class Calc {',
    '    /**',
    '     * Divide numbers.',
    '     * @param a Dividend.',
    '     * @param b Divisor.',
    '     * @return The quotient.',
    '     * @throws ArithmeticException On zero.',
    '     */',
    '    public int divide(int a, int b) throws ArithmeticException {',
    '        if (b == 0) throw new IllegalArgumentException("zero");',
    '        return a / b;',
    '    }',
    '',
    '    private void reset() {}',
    '',
    '    Calc(int start) {}',
    '}',
    '',
].join('\n');

describe('JavaAdapter', () => {
    const adapter = new JavaAdapter();

    it('should handle java files', () => {
        expect(adapter.language).toBe('java');
        expect(adapter.extensions).toEqual(['.java']);
    });

    it('extracts classes, methods and constructors', () => {
        const elements = adapter.extract(SOURCE, 'src/com/example/Calc.java');

        expect(elements.map(element => [element.kind, element.qualifiedName])).toEqual([
            ['module', 'Calc'],
            ['class', 'Calc.Calc'],
            ['method', 'Calc.Calc.divide'],
            ['method', 'Calc.Calc.reset'],
            ['method', 'Calc.Calc.Calc'],
        ]);
    });

    it('reads Javadoc for the package and the class', () => {
        const [module, calc] = adapter.extract(SOURCE, 'Calc.java');

        expect(module.docstring).toBe('Utilities.');
        expect(calc.docstring).toBe('A calculator.');
        expect(calc.visibility).toBe('public');
    });

    it('collects declared and thrown exceptions', () => {
        const divide = adapter.extract(SOURCE, 'Calc.java')[2];

        expect(divide.parameters).toEqual([
            { name: 'a', hasTypeAnnotation: true },
            { name: 'b', hasTypeAnnotation: true },
        ]);
        expect(divide.hasReturnValue).toBe(true);
        expect(divide.raises).toEqual(['ArithmeticException', 'IllegalArgumentException']);
        expect(divide.docstring).toBe(
            'Divide numbers.\n@param a Dividend.\n@param b Divisor.\n@return The quotient.\n@throws ArithmeticException On zero.'
        );
    });

    it('treats void methods and constructors as returning nothing', () => {
        const [, , , reset, constructor] = adapter.extract(SOURCE, 'Calc.java');

        expect(reset.hasReturnValue).toBe(false);
        expect(reset.visibility).toBe('private');
        expect(reset.docstring).toBeUndefined();
        expect(constructor.hasReturnValue).toBe(false);
        expect(constructor.parameters).toEqual([{ name: 'start', hasTypeAnnotation: true }]);
    });

    it('throws ParseError on invalid syntax', () => {
        expect(() => adapter.extract('public class {', 'Bad.java')).toThrow(ParseError);
    });
});
