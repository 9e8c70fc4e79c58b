export interface SourceFile {
    readonly relativePath: string;
    readonly content: string;
}

export interface SkippedFile {
    relativePath: string;
    kind: 'file' | 'directory';
    reason: string;
}

export interface PartInfo {
    /** 1-based */
    index: number;
    total: number;
}

export interface Block {
    /** Header line including its trailing newline */
    readonly header: string;
    readonly body: string;
}

export interface Segment {
    readonly blocks: readonly Block[];
    readonly size: number;
}

export type HeaderFormatter = (relativePath: string, part?: PartInfo) => string;

export interface ProjectNode {
    name: string;
    type: 'file' | 'directory';
    children?: ProjectNode[];
}
