export interface LinePosition {
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
}

export class LineCounter {
    private readonly lineStarts: number[];

    constructor(private readonly content: string) {
        this.lineStarts = [0];
        for (let i = 0; i < content.length; i++) {
            if (content[i] === '\n') {
                this.lineStarts.push(i + 1);
            }
        }
    }

    /**
     * 1-based line for a 0-based character offset (binary search).
     */
    public getLineNumber(position: number): number {
        if (position < 0) return 1;

        let low = 0;
        let high = this.lineStarts.length - 1;

        while (low <= high) {
            const mid = Math.floor((low + high) / 2);
            const start = this.lineStarts[mid];

            if (start === position) return mid + 1;

            if (start < position) {
                low = mid + 1;
            } else {
                high = mid - 1;
            }
        }
        return high + 1;
    }

    public getPosition(offset: number): LinePosition {
        const line = this.getLineNumber(offset);
        return { line, column: Math.max(0, offset - this.getCharIndexForLine(line)) + 1 };
    }

    public getCharIndexForLine(lineNumber: number): number {
        if (lineNumber <= 1) return 0;
        if (lineNumber > this.lineStarts.length) {
            return this.lineStarts[this.lineStarts.length - 1] ?? 0;
        }
        return this.lineStarts[lineNumber - 1];
    }

    /** Text of a line without its terminator. */
    public getLineText(lineNumber: number): string {
        if (lineNumber < 1 || lineNumber > this.lineStarts.length) return "";
        const start = this.lineStarts[lineNumber - 1];
        const next = lineNumber < this.lineStarts.length ? this.lineStarts[lineNumber] - 1 : this.content.length;
        return this.content.slice(start, next).replace(/\r$/, "");
    }

    public get lineCount(): number {
        return this.lineStarts.length;
    }
}
