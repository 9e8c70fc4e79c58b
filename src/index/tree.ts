import type { HeaderFormatter, ProjectNode } from '../types.js';

export const formatTreeHeader: HeaderFormatter = (_relativePath, part) => {
    const suffix = part ? ` (part ${part.index}/${part.total})` : '';
    return `# here is the project tree (excluded items omitted)${suffix}\n`;
};

/**
 * Builds a directory hierarchy from `/`-separated relative file paths.
 * Children keep the order in which the paths are given.
 */
export function buildTree(relativePaths: string[], rootName: string): ProjectNode {
    const root: ProjectNode = {
        name: rootName,
        type: 'directory',
        children: [],
    };

    relativePaths.forEach(relativePath => {
        const parts = relativePath.split('/');
        let current = root;

        parts.forEach((part, index) => {
            const isFile = index === parts.length - 1;
            const children = current.children ?? [];
            let child = children.find(c => c.name === part && (c.type === 'file') === isFile);
            if (!child) {
                child = {
                    name: part,
                    type: isFile ? 'file' : 'directory',
                    children: isFile ? undefined : [],
                };
                children.push(child);
                current.children = children;
            }
            current = child;
        });
    });

    return root;
}

function renderChildren(node: ProjectNode, prefix: string, lines: string[]) {
    const children = node.children ?? [];
    children.forEach((child, i) => {
        const isLast = i === children.length - 1;
        lines.push(`${prefix}${isLast ? '└── ' : '├── '}${child.name}`);
        renderChildren(child, prefix + (isLast ? '    ' : '│   '), lines);
    });
}

/**
 * Renders the hierarchy the way the `tree` command does, without a trailing newline.
 */
export function renderTree(root: ProjectNode): string {
    const lines = [root.name];
    renderChildren(root, '', lines);
    return lines.join('\n');
}
