import { GoAdapter } from '../GoAdapter';
import { ParseError } from '../../models/errors';

const SOURCE = [
    '// Package shapes computes areas.',
    'package shapes',
    '',
    '// Circle is a round shape.',
    'type Circle struct {',
    '\tR float64',
    '}',
    '',
    '// Area returns the area.',
    'func (c *Circle) Area() float64 {',
    '\treturn 3.14 * c.R * c.R',
    '}',
    '',
    'func scale(x, y float64, factors ...int) {}',
    '',
].join('\n');

describe('GoAdapter', () => {
    const adapter = new GoAdapter();

    it('should handle go files', () => {
        expect(adapter.language).toBe('go');
        expect(adapter.extensions).toEqual(['.go']);
    });

    it('qualifies methods by their receiver type', () => {
        const elements = adapter.extract(SOURCE, 'shapes/shapes.go');

        expect(elements.map(element => [element.kind, element.qualifiedName])).toEqual([
            ['module', 'shapes'],
            ['class', 'shapes.Circle'],
            ['method', 'shapes.Circle.Area'],
            ['function', 'shapes.scale'],
        ]);
        expect(elements[2].name).toBe('Area');
    });

    it('reads line comments directly above declarations', () => {
        const [module, circle, area, scale] = adapter.extract(SOURCE, 'shapes.go');

        expect(module.docstring).toBe('Package shapes computes areas.');
        expect(circle.docstring).toBe('Circle is a round shape.');
        expect(circle.location.startLine).toBe(5);
        expect(area.docstring).toBe('Area returns the area.');
        expect(scale.docstring).toBeUndefined();
    });

    it('reads grouped and variadic parameters', () => {
        const scale = adapter.extract(SOURCE, 'shapes.go')[3];

        expect(scale.parameters).toEqual([
            { name: 'x', hasTypeAnnotation: true },
            { name: 'y', hasTypeAnnotation: true },
            { name: 'factors', hasTypeAnnotation: true },
        ]);
        expect(scale.hasReturnValue).toBe(false);
    });

    it('derives visibility from capitalization', () => {
        const [, circle, area, scale] = adapter.extract(SOURCE, 'shapes.go');

        expect(circle.visibility).toBe('public');
        expect(area.visibility).toBe('public');
        expect(area.hasReturnValue).toBe(true);
        expect(scale.visibility).toBe('private');
    });

    it('throws ParseError on invalid syntax', () => {
        expect(() => adapter.extract('package x\n\nfunc (\n', 'bad.go')).toThrow(ParseError);
    });
});
