import type { Tree } from '../sorting/natural-sort.js';

const DEFAULT_INDENT = 4;

/**
 * JSON Generator
 *
 * Renders a tree as indented JSON. Map entries are written in iteration
 * order, which `JSON.stringify` cannot guarantee for integer-like keys.
 * Trailing whitespace is stripped from every line and no final newline is
 * added.
 */
export function formatJson(tree: Tree, indent: number = DEFAULT_INDENT): string {
    const text = render(tree, indent, 0);
    return text
        .split('\n')
        .map((line) => line.trimEnd())
        .join('\n');
}

function render(node: Tree, indent: number, depth: number): string {
    if (node instanceof Map) {
        return renderEntries([...node.entries()], indent, depth);
    }

    if (Array.isArray(node)) {
        if (node.length === 0) return '[]';
        const inner = ' '.repeat(indent * (depth + 1));
        const items = node.map((item) => inner + render(item, indent, depth + 1));
        return `[\n${items.join(',\n')}\n${' '.repeat(indent * depth)}]`;
    }

    if (typeof node === 'object' && node !== null) {
        return renderEntries(Object.entries(node), indent, depth);
    }

    return JSON.stringify(node);
}

function renderEntries(entries: Array<[string, Tree]>, indent: number, depth: number): string {
    if (entries.length === 0) return '{}';

    const inner = ' '.repeat(indent * (depth + 1));
    const lines = entries.map(
        ([key, value]) => `${inner}${JSON.stringify(key)}: ${render(value, indent, depth + 1)}`
    );
    return `{\n${lines.join(',\n')}\n${' '.repeat(indent * depth)}}`;
}
