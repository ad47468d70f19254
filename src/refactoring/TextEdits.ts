import { AnalysisError } from "../errors/AnalysisError.js";

export interface TextEdit {
    /** 0-based offset, inclusive */
    start: number;
    /** 0-based offset, exclusive; equal to `start` for an insertion */
    end: number;
    newText: string;
}

/**
 * Applies offset-based edits computed against the same original text.
 * Insertions at one offset keep their input order; overlapping ranges are
 * a programming error.
 */
export function applyTextEdits(content: string, edits: readonly TextEdit[]): string {
    const planned = edits
        .map((edit, order) => ({ ...edit, order }))
        .sort((a, b) => a.start - b.start || a.end - b.end || a.order - b.order);

    for (const edit of planned) {
        if (edit.start < 0 || edit.end < edit.start || edit.end > content.length) {
            throw new AnalysisError(
                "InternalError",
                `Edit range [${edit.start}, ${edit.end}) is out of bounds for text of length ${content.length}`
            );
        }
    }
    for (let i = 0; i < planned.length - 1; i++) {
        if (planned[i].end > planned[i + 1].start) {
            throw new AnalysisError(
                "InternalError",
                `Conflicting edits: [${planned[i].start}, ${planned[i].end}) overlaps [${planned[i + 1].start}, ${planned[i + 1].end})`
            );
        }
    }

    let result = "";
    let cursor = 0;
    for (const edit of planned) {
        result += content.slice(cursor, edit.start) + edit.newText;
        cursor = edit.end;
    }
    return result + content.slice(cursor);
}
