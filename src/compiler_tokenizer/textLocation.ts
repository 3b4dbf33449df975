import * as lsp from 'vscode-languageserver';

export class TextPosition implements lsp.Position {
    constructor(
        public readonly line: number,
        public readonly character: number
    ) {
    }

    public equals(other: lsp.Position): boolean {
        return this.line === other.line && this.character === other.character;
    }

    public simpleFormat(): string {
        return `${this.line}:${this.character}`;
    }
}

export class TextRange implements lsp.Range {
    constructor(
        public readonly start: TextPosition,
        public readonly end: TextPosition
    ) {
    }
}

/**
 * Represents a location in a source file.
 * The parser attaches it to nodes so that diagnostics can point at the offending code.
 */
export class TextLocation extends TextRange {
    constructor(
        public readonly path: string,
        start: TextPosition,
        end: TextPosition
    ) {
        super(start, end);
    }

    public static createEmpty(): TextLocation {
        return new TextLocation('', new TextPosition(0, 0), new TextPosition(0, 0));
    }

    /**
     * Creates a location on a single line, e.g., an identifier token.
     */
    public static createInLine(path: string, line: number, character: number, length: number): TextLocation {
        return new TextLocation(path, new TextPosition(line, character), new TextPosition(line, character + length));
    }

    public clone(): TextLocation {
        return new TextLocation(this.path, this.start, this.end);
    }

    public equals(other: TextLocation): boolean {
        return this.path === other.path && this.start.equals(other.start) && this.end.equals(other.end);
    }

    public simpleFormat(): string {
        const filename = this.path.match(/[^\\/]+$/)?.[0] ?? this.path;
        return `${filename}:${this.start.simpleFormat()}-${this.end.simpleFormat()}`;
    }
}
