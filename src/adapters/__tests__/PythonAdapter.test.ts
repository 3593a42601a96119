import { PythonAdapter } from '../PythonAdapter';
import { ParseError } from '../../models/errors';

const SOURCE = [
    '"""Math helpers."""',
    '',
    '',
    'def add(x: int, y=2, *args, **kwargs) -> int:',
    '    """Add numbers.',
    '',
    '    Args:',
    '        x: First.',
    '    """',
    '    return x + y',
    '',
    '',
    'class Calculator:',
    '    """Keeps a running total."""',
    '',
    '    def __init__(self, start=0):',
    '        self.total = start',
    '',
    '    def _reset(self):',
    '        raise ValueError("no")',
    '',
    '    def __private(self):',
    '        pass',
    '',
    '    def gen(self):',
    '        yield 1',
    '',
].join('\n');

describe('PythonAdapter', () => {
    let adapter: PythonAdapter;

    beforeEach(() => {
        adapter = new PythonAdapter();
    });

    describe('fields', () => {
        it('should handle python files', () => {
            expect(adapter.language).toBe('python');
            expect(adapter.extensions).toEqual(['.py', '.pyi']);
        });
    });

    describe('extract', () => {
        it('emits the module first, then definitions in source order', () => {
            const elements = adapter.extract(SOURCE, 'pkg/math_utils.py');

            expect(elements.map(element => [element.kind, element.qualifiedName])).toEqual([
                ['module', 'math_utils'],
                ['function', 'math_utils.add'],
                ['class', 'math_utils.Calculator'],
                ['method', 'math_utils.Calculator.__init__'],
                ['method', 'math_utils.Calculator._reset'],
                ['method', 'math_utils.Calculator.__private'],
                ['method', 'math_utils.Calculator.gen'],
            ]);
        });

        it('reads the module docstring', () => {
            const [module] = adapter.extract(SOURCE, 'pkg/math_utils.py');

            expect(module.docstring).toBe('Math helpers.');
            expect(module.parentQualifiedName).toBeUndefined();
            expect(module.location.startLine).toBe(1);
        });

        it('extracts function signature details', () => {
            const add = adapter.extract(SOURCE, 'pkg/math_utils.py')[1];

            expect(add.location).toEqual({ filePath: 'pkg/math_utils.py', startLine: 4, endLine: 10 });
            expect(add.parameters).toEqual([
                { name: 'x', hasTypeAnnotation: true },
                { name: 'y', hasTypeAnnotation: false },
                { name: 'args', hasTypeAnnotation: false },
                { name: 'kwargs', hasTypeAnnotation: false },
            ]);
            expect(add.hasReturnValue).toBe(true);
            expect(add.docstring).toBe('Add numbers.\n\nArgs:\n    x: First.');
            expect(add.parentQualifiedName).toBe('math_utils');
            expect(add.parentIndex).toBe(0);
            expect(add.language).toBe('python');
        });

        it('links methods to their class and skips self', () => {
            const elements = adapter.extract(SOURCE, 'pkg/math_utils.py');
            const init = elements[3];

            expect(init.parentQualifiedName).toBe('math_utils.Calculator');
            expect(init.parentIndex).toBe(2);
            expect(init.parameters).toEqual([{ name: 'start', hasTypeAnnotation: false }]);
            expect(init.hasReturnValue).toBe(false);
            expect(init.docstring).toBeUndefined();
        });

        it('derives visibility from naming conventions', () => {
            const elements = adapter.extract(SOURCE, 'pkg/math_utils.py');

            expect(elements.map(element => element.visibility)).toEqual([
                'public',
                'public',
                'public',
                'public',
                'protected',
                'private',
                'public',
            ]);
        });

        it('records raised exceptions and generators', () => {
            const elements = adapter.extract(SOURCE, 'pkg/math_utils.py');

            expect(elements[4].raises).toEqual(['ValueError']);
            expect(elements[6].hasReturnValue).toBe(true);
        });

        it('treats None returns as no return value', () => {
            const source = [
                'def a() -> None:',
                '    return 1',
                '',
                'def b():',
                '    return None',
                '',
                'def c():',
                '    return',
                '',
            ].join('\n');

            const elements = adapter.extract(source, 'm.py');

            expect(elements.slice(1).map(element => element.hasReturnValue)).toEqual([false, false, false]);
        });

        it('keeps dotted exception names and ignores re-raised variables', () => {
            const source = [
                'def load(path):',
                '    try:',
                '        return open(path)',
                '    except OSError as err:',
                '        raise err',
                '    raise errors.NotFound(path)',
                '',
            ].join('\n');

            const [, load] = adapter.extract(source, 'm.py');

            expect(load.raises).toEqual(['errors.NotFound']);
        });

        it('does not attribute nested function returns to the outer function', () => {
            const source = [
                'def outer():',
                '    def inner():',
                '        return 1',
                '    inner()',
                '',
            ].join('\n');

            const elements = adapter.extract(source, 'm.py');

            expect(elements.map(element => element.qualifiedName)).toEqual(['m', 'm.outer', 'm.outer.inner']);
            expect(elements[1].hasReturnValue).toBe(false);
            expect(elements[2].kind).toBe('function');
            expect(elements[2].parentIndex).toBe(1);
        });

        it('suffixes duplicate qualified names in source order', () => {
            const source = 'def f():\n    pass\n\n\ndef f():\n    pass\n';

            const names = adapter.extract(source, 'm.py').map(element => element.qualifiedName);

            expect(names).toEqual(['m', 'm.f', 'm.f#2']);
        });

        it('excludes lambdas', () => {
            const elements = adapter.extract('square = lambda x: x * x\n', 'm.py');

            expect(elements).toHaveLength(1);
            expect(elements[0].kind).toBe('module');
        });

        it('yields a single undocumented module for a file without definitions', () => {
            const elements = adapter.extract('x = 1\n', 'm.py');

            expect(elements).toHaveLength(1);
            expect(elements[0].docstring).toBeUndefined();
            expect(elements[0].docstringFingerprint).toBeUndefined();
        });

        it('throws ParseError on invalid syntax', () => {
            expect(() => adapter.extract('def broken(:\n    pass\n', 'bad.py')).toThrow(ParseError);
        });

        it('reports the failing file in ParseError', () => {
            let caught: unknown;
            try {
                adapter.extract('def broken(:\n    pass\n', 'bad.py');
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(ParseError);
            expect(caught instanceof ParseError && caught.filePath).toBe('bad.py');
            expect(caught instanceof ParseError && caught.line).toBe(1);
        });

        it('is deterministic', () => {
            expect(adapter.extract(SOURCE, 'pkg/math_utils.py')).toEqual(adapter.extract(SOURCE, 'pkg/math_utils.py'));
        });
    });

    describe('fingerprints', () => {
        const fn = (doc: string, body: string) => `def f(a):\n    """${doc}"""\n    # note\n    ${body}\n`;

        it('ignore docstring and comment changes', () => {
            const before = adapter.extract(fn('Old text.', 'return a'), 'm.py')[1];
            const after = adapter.extract(fn('New text.', 'return a').replace('# note', '# other'), 'm.py')[1];

            expect(after.contentFingerprint).toBe(before.contentFingerprint);
            expect(after.docstringFingerprint).not.toBe(before.docstringFingerprint);
        });

        it('ignore whitespace-only changes', () => {
            const before = adapter.extract(fn('Doc.', 'return a + 1'), 'm.py')[1];
            const after = adapter.extract(fn('Doc.', 'return a   +   1'), 'm.py')[1];

            expect(after.contentFingerprint).toBe(before.contentFingerprint);
        });

        it('change when the code changes', () => {
            const before = adapter.extract(fn('Doc.', 'return a'), 'm.py')[1];
            const after = adapter.extract(fn('Doc.', 'return a * 2'), 'm.py')[1];

            expect(after.contentFingerprint).not.toBe(before.contentFingerprint);
            expect(after.docstringFingerprint).toBe(before.docstringFingerprint);
        });

        it('of a module and class do not cover nested definitions', () => {
            const source = (body: string) => `class C:\n    def m(self):\n        ${body}\n`;
            const before = adapter.extract(source('return 1'), 'm.py');
            const after = adapter.extract(source('return 2'), 'm.py');

            expect(after[0].contentFingerprint).toBe(before[0].contentFingerprint);
            expect(after[1].contentFingerprint).toBe(before[1].contentFingerprint);
            expect(after[2].contentFingerprint).not.toBe(before[2].contentFingerprint);
        });
    });
});
