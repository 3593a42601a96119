import { DocStyle } from '../config/schema';

/**
 * What a docstring documents, read according to one convention
 */
export interface ParsedDocstring {
    summary: string;
    /** Documented parameter names, without `*` prefixes */
    params: string[];
    hasReturns: boolean;
    raises: string[];
    /** Whether the convention's parameter section or tags are present */
    hasParamSection: boolean;
    /** Headers the convention requires to be formatted differently */
    malformedHeaders: string[];
}

const GOOGLE_HEADER = /^(Args|Arguments|Parameters|Params|Keyword Args|Keyword Arguments|Other Parameters|Returns?|Yields?|Raises|Exceptions?|Throws|Examples?|Notes?|Attributes|See Also|Todo|Warnings?|References)\s*:\s*$/;
const GOOGLE_PARAM_HEADERS = new Set(['Args', 'Arguments', 'Parameters', 'Params', 'Keyword Args', 'Keyword Arguments', 'Other Parameters']);
const GOOGLE_RETURN_HEADERS = new Set(['Returns', 'Return', 'Yields', 'Yield']);
const GOOGLE_RAISE_HEADERS = new Set(['Raises', 'Exceptions', 'Exception', 'Throws']);

const NUMPY_HEADER = /^(Parameters|Other Parameters|Returns|Yields|Receives|Raises|Warns|Warnings|See Also|Notes|References|Examples|Attributes|Methods)\s*$/;
const UNDERLINE = /^-{3,}\s*$/;

const SPHINX_PARAM = /^:(?:param|parameter|arg|argument|key|keyword)\s+(?:[^:]*\s)?\*{0,2}(\w+)\s*:/;
const SPHINX_RETURN = /^:(?:returns?|yields?)\s*:/;
const SPHINX_RAISE = /^:(?:raises?|except|exception)\s+([\w.]+)\s*:/;
const SPHINX_FIELD = /^:\w+/;

const TAG_PARAM = /^[@\\](?:param|arg|argument)(?:\[[\w, ]+\])?\s+(?:\{[^}]*\}\s*)?\[?([\w$.]+)/;
const TAG_RETURN = /^[@\\](?:returns?|retval|result|yields?)\b/;
const TAG_RAISE = /^[@\\](?:throws?|exception|exceptions)\s+(?:\{([^}]*)\}|([\w.:]+))/;
const TAG_BRIEF = /^[@\\]brief\s+/;
const TAG_LINE = /^[@\\]\w+/;

interface Section {
    header: string;
    lines: string[];
}

function indentOf(line: string): number {
    return line.length - line.trimStart().length;
}

function lines(text: string): string[] {
    return text.replace(/\r\n?/g, '\n').split('\n');
}

/**
 * First paragraph line that is not a section header or tag
 */
function firstLine(text: string, isStructure: (line: string) => boolean): string {
    for (const line of lines(text)) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;
        if (isStructure(trimmed)) return '';
        return trimmed;
    }
    return '';
}

/**
 * Entries of a section: its least-indented non-blank lines
 */
function entries(section: Section): string[] {
    const content = section.lines.filter(line => line.trim().length > 0);
    if (content.length === 0) return [];
    const indent = Math.min(...content.map(indentOf));
    return content.filter(line => indentOf(line) === indent).map(line => line.trim());
}

function stripStars(name: string): string {
    return name.replace(/^\*+/, '');
}

function parseGoogle(text: string): ParsedDocstring {
    const sections: Section[] = [];
    let current: Section | null = null;
    let headerIndent = 0;

    for (const line of lines(text)) {
        const trimmed = line.trim();
        const header = GOOGLE_HEADER.exec(trimmed);
        if (header) {
            current = { header: header[1], lines: [] };
            headerIndent = indentOf(line);
            sections.push(current);
        } else if (current) {
            if (trimmed.length > 0 && indentOf(line) <= headerIndent) {
                current = null;
            } else {
                current.lines.push(line);
            }
        }
    }

    const params: string[] = [];
    const raises: string[] = [];
    let hasReturns = false;
    let hasParamSection = false;

    for (const section of sections) {
        if (GOOGLE_PARAM_HEADERS.has(section.header)) {
            hasParamSection = true;
            for (const entry of entries(section)) {
                const match = /^(\*{0,2}\w+)\s*(?:\([^)]*\))?\s*:/.exec(entry);
                if (match) params.push(stripStars(match[1]));
            }
        } else if (GOOGLE_RETURN_HEADERS.has(section.header)) {
            hasReturns = hasReturns || section.lines.some(line => line.trim().length > 0);
        } else if (GOOGLE_RAISE_HEADERS.has(section.header)) {
            for (const entry of entries(section)) {
                const match = /^([\w.]+)\s*:?/.exec(entry);
                if (match) raises.push(match[1]);
            }
        }
    }

    return {
        summary: firstLine(text, line => GOOGLE_HEADER.test(line)),
        params,
        hasReturns,
        raises,
        hasParamSection,
        malformedHeaders: [],
    };
}

function parseNumpy(text: string): ParsedDocstring {
    const all = lines(text);
    const sections: Section[] = [];
    const malformedHeaders: string[] = [];
    let current: Section | null = null;

    for (let i = 0; i < all.length; i++) {
        const trimmed = all[i].trim();
        const header = NUMPY_HEADER.exec(trimmed);
        if (header) {
            const next = all[i + 1];
            if (next !== undefined && UNDERLINE.test(next.trim())) {
                current = { header: header[1], lines: [] };
                sections.push(current);
                i++;
                continue;
            }
            malformedHeaders.push(header[1]);
            current = null;
            continue;
        }
        // Google-style "Parameters:" is a header that lost its underline
        const colonHeader = /^(Parameters|Returns|Yields|Raises)\s*:\s*$/.exec(trimmed);
        if (colonHeader) {
            malformedHeaders.push(colonHeader[1]);
            current = null;
            continue;
        }
        current?.lines.push(all[i]);
    }

    const params: string[] = [];
    const raises: string[] = [];
    let hasReturns = false;
    let hasParamSection = false;

    for (const section of sections) {
        if (section.header === 'Parameters' || section.header === 'Other Parameters') {
            hasParamSection = true;
            for (const entry of entries(section)) {
                const names = entry.split(':')[0];
                for (const name of names.split(',')) {
                    const cleaned = stripStars(name.trim());
                    if (/^\w+$/.test(cleaned)) params.push(cleaned);
                }
            }
        } else if (section.header === 'Returns' || section.header === 'Yields') {
            hasReturns = hasReturns || section.lines.some(line => line.trim().length > 0);
        } else if (section.header === 'Raises') {
            for (const entry of entries(section)) {
                const match = /^([\w.]+)/.exec(entry);
                if (match) raises.push(match[1]);
            }
        }
    }

    return {
        summary: firstLine(text, line => NUMPY_HEADER.test(line) || UNDERLINE.test(line)),
        params,
        hasReturns,
        raises,
        hasParamSection,
        malformedHeaders,
    };
}

function parseSphinx(text: string): ParsedDocstring {
    const params: string[] = [];
    const raises: string[] = [];
    let hasReturns = false;

    for (const line of lines(text)) {
        const trimmed = line.trim();
        const param = SPHINX_PARAM.exec(trimmed);
        if (param) {
            params.push(param[1]);
            continue;
        }
        if (SPHINX_RETURN.test(trimmed)) {
            hasReturns = true;
            continue;
        }
        const raise = SPHINX_RAISE.exec(trimmed);
        if (raise) raises.push(raise[1]);
    }

    return {
        summary: firstLine(text, line => SPHINX_FIELD.test(line)),
        params,
        hasReturns,
        raises,
        hasParamSection: params.length > 0,
        malformedHeaders: [],
    };
}

/**
 * JSDoc, Javadoc and Doxygen share the block-tag layout
 */
function parseTags(text: string): ParsedDocstring {
    const params: string[] = [];
    const raises: string[] = [];
    let hasReturns = false;
    let brief = '';

    for (const line of lines(text)) {
        const trimmed = line.trim();
        if (TAG_BRIEF.test(trimmed) && !brief) {
            brief = trimmed.replace(TAG_BRIEF, '').trim();
            continue;
        }
        const param = TAG_PARAM.exec(trimmed);
        if (param) {
            // `options.name` documents a property of `options`
            params.push(param[1].split('.')[0]);
            continue;
        }
        if (TAG_RETURN.test(trimmed)) {
            hasReturns = true;
            continue;
        }
        const raise = TAG_RAISE.exec(trimmed);
        if (raise) {
            raises.push((raise[1] ?? raise[2]).trim());
        }
    }

    return {
        summary: brief || firstLine(text, line => TAG_LINE.test(line)),
        params,
        hasReturns,
        raises,
        hasParamSection: params.length > 0,
        malformedHeaders: [],
    };
}

/**
 * Go documents in prose: a parameter is documented when its name is
 * mentioned, a result when the text talks about what is returned
 */
function parseGodoc(text: string): ParsedDocstring {
    const words = new Set(text.match(/[A-Za-z_]\w*/g) ?? []);
    return {
        summary: firstLine(text, () => false),
        params: Array.from(words),
        hasReturns: /\breturn(s|ed|ing)?\b/i.test(text),
        raises: [],
        hasParamSection: true,
        malformedHeaders: [],
    };
}

/**
 * Read a cleaned docstring according to a documentation convention
 */
export function parseDocstring(text: string, style: DocStyle): ParsedDocstring {
    switch (style) {
        case 'google':
            return parseGoogle(text);
        case 'numpy':
            return parseNumpy(text);
        case 'sphinx':
            return parseSphinx(text);
        case 'jsdoc':
        case 'javadoc':
        case 'doxygen':
            return parseTags(text);
        case 'godoc':
            return parseGodoc(text);
    }
}

const CANONICAL_SPELLINGS: Partial<Record<DocStyle, ReadonlySet<string>>> = {
    google: new Set(['Args', 'Returns', 'Raises', 'Yields', 'Attributes', 'Example', 'Examples', 'Note', 'Notes']),
    sphinx: new Set(['param', 'type', 'returns', 'rtype', 'raises']),
    jsdoc: new Set(['param', 'returns', 'throws']),
    javadoc: new Set(['param', 'return', 'throws']),
};

/**
 * Convention a docstring is written in, independent of any configured
 * style. Plain prose has no convention.
 */
export function detectStyle(text: string): DocStyle | null {
    const all = lines(text).map(line => line.trim());

    if (all.some((line, i) => NUMPY_HEADER.test(line) && UNDERLINE.test(all[i + 1] ?? ''))) return 'numpy';
    if (all.some(line => GOOGLE_HEADER.test(line))) return 'google';
    if (all.some(line => /^:(param|parameter|arg|returns?|raises?|type|rtype)\b/.test(line))) return 'sphinx';
    if (all.some(line => /^\\\w+/.test(line) || /^@brief\b/.test(line) || /^@param\[/.test(line))) return 'doxygen';
    if (all.some(line => /^@(param|returns?|throws|typedef|type)\s+\{/.test(line))) return 'jsdoc';
    if (all.some(line => /^@(param|return|returns|throws|exception)\b/.test(line))) return 'javadoc';
    return null;
}

/**
 * Convention signature used for consistency scoring: the detected style,
 * followed by any non-standard header spellings in brackets, e.g.
 * `google` or `google[Arguments]`. Null for plain prose.
 */
export function conventionSignature(text: string): string | null {
    const style = detectStyle(text);
    if (!style) return null;

    const spellings = new Set<string>();
    for (const raw of lines(text)) {
        const line = raw.trim();
        let spelling: string | undefined;
        if (style === 'google') {
            spelling = GOOGLE_HEADER.exec(line)?.[1];
        } else if (style === 'sphinx') {
            spelling = /^:(\w+)/.exec(line)?.[1];
        } else if (style === 'jsdoc' || style === 'javadoc') {
            spelling = /^@(param|arg|argument|returns?|throws|exception)\b/.exec(line)?.[1];
        }
        const canonical = CANONICAL_SPELLINGS[style];
        if (spelling && canonical && !canonical.has(spelling)) {
            spellings.add(spelling);
        }
    }

    return spellings.size > 0 ? `${style}[${Array.from(spellings).sort().join(',')}]` : style;
}

/**
 * Natural-language part of a docstring: section headers, underlines,
 * tags and entry names removed
 */
export function proseOf(text: string): string {
    const kept: string[] = [];
    for (const raw of lines(text)) {
        let line = raw.trim();
        if (line.length === 0) {
            kept.push('');
            continue;
        }
        if (GOOGLE_HEADER.test(line) || NUMPY_HEADER.test(line) || UNDERLINE.test(line)) continue;

        line = line
            .replace(/^[@\\]\w+(?:\[[\w, ]+\])?\s*(?:\{[^}]*\}\s*)?/, '')
            .replace(/^:[^:]*:\s*/, '')
            .replace(/^\*{0,2}\w+\s*(?:\([^)]*\))?\s*:\s+/, '');
        if (line.length > 0) kept.push(line);
    }
    return kept.join('\n').trim();
}
