import { AnalysisError } from "../errors/AnalysisError.js";
import { DeltaContext, RefactoringDelta, SizeReductionEstimate, TextChange } from "../types.js";

type EditType = 'equal' | 'insert' | 'delete';

interface Edit {
    type: EditType;
    /** index into the original lines (delete/equal) */
    aIndex: number;
    /** index into the modified lines (insert/equal) */
    bIndex: number;
}

const CHARS_PER_TOKEN = 4;

export function splitLines(text: string): string[] {
    return text.split('\n');
}

/**
 * Line-level deltas between two versions of a file. Lines are split on "\n"
 * only, so "\r" and a missing trailing newline survive a replay unchanged.
 */
export class DeltaGenerator {
    public static diff(original: string, modified: string, context: DeltaContext): RefactoringDelta {
        const a = splitLines(original);
        const b = splitLines(modified);
        const changes = original === modified ? [] : this.toChanges(this.computeEdits(a, b), a, b);
        return {
            filePath: context.filePath,
            changes,
            ...(context.methodSignature ? { methodSignature: context.methodSignature } : {}),
            affectedIdentifiers: [...(context.affectedIdentifiers ?? [])]
        };
    }

    /**
     * Replays `delta` against `original`, top to bottom. Each change's
     * originalText must match the lines it covers.
     */
    public static apply(original: string, delta: RefactoringDelta): string {
        const source = splitLines(original);
        const output: string[] = [];
        let cursor = 1;

        for (const change of delta.changes) {
            if (change.startLine < cursor) {
                throw AnalysisError.configuration(`Delta changes overlap or are out of order at line ${change.startLine}`, {
                    filePath: delta.filePath
                });
            }
            output.push(...source.slice(cursor - 1, change.startLine - 1));

            const covered = change.kind === 'Insert' ? [] : source.slice(change.startLine - 1, change.endLine);
            const expectedCount = change.kind === 'Insert' ? 0 : change.endLine - change.startLine + 1;
            if (covered.length !== expectedCount || covered.join('\n') !== change.originalText) {
                throw AnalysisError.configuration(`Delta does not match the original text at line ${change.startLine}`, {
                    filePath: delta.filePath,
                    startLine: change.startLine
                });
            }
            if (change.kind !== 'Delete') {
                output.push(...splitLines(change.newText));
            }
            cursor = change.endLine + 1;
        }
        output.push(...source.slice(cursor - 1));
        return output.join('\n');
    }

    public static estimateSizeReduction(delta: RefactoringDelta, original: string): SizeReductionEstimate {
        const originalTokens = Math.ceil(original.length / CHARS_PER_TOKEN);
        const deltaTokens = Math.ceil(JSON.stringify(delta.changes).length / CHARS_PER_TOKEN);
        const tokensSaved = Math.max(0, originalTokens - deltaTokens);
        const reductionRatio = originalTokens === 0 ? 0 : Math.round((tokensSaved / originalTokens) * 1000) / 1000;
        return { originalTokens, deltaTokens, tokensSaved, reductionRatio };
    }

    private static computeEdits(a: string[], b: string[]): Edit[] {
        const edits: Edit[] = [];
        this.diffRange(a, 0, a.length, b, 0, b.length, edits);
        return edits;
    }

    /**
     * Diffs a[aLo, aHi) against b[bLo, bHi), appending edits in order. Common
     * head and tail lines are stripped before bisecting what remains.
     */
    private static diffRange(a: string[], aLo: number, aHi: number, b: string[], bLo: number, bHi: number, edits: Edit[]): void {
        while (aLo < aHi && bLo < bHi && a[aLo] === b[bLo]) {
            edits.push({ type: 'equal', aIndex: aLo++, bIndex: bLo++ });
        }
        let tail = 0;
        while (aHi - tail > aLo && bHi - tail > bLo && a[aHi - tail - 1] === b[bHi - tail - 1]) {
            tail++;
        }
        aHi -= tail;
        bHi -= tail;

        if (aLo === aHi) {
            for (let j = bLo; j < bHi; j++) edits.push({ type: 'insert', aIndex: aLo, bIndex: j });
        } else if (bLo === bHi) {
            for (let i = aLo; i < aHi; i++) edits.push({ type: 'delete', aIndex: i, bIndex: bLo });
        } else {
            this.bisect(a, aLo, aHi, b, bLo, bHi, edits);
        }

        for (let i = 0; i < tail; i++) {
            edits.push({ type: 'equal', aIndex: aHi + i, bIndex: bHi + i });
        }
    }

    /**
     * Myers' linear-space refinement: finds the middle snake of a shortest
     * edit script with two O(N + M) frontiers, then recurses on either side.
     */
    private static bisect(a: string[], aLo: number, aHi: number, b: string[], bLo: number, bHi: number, edits: Edit[]): void {
        const n = aHi - aLo;
        const m = bHi - bLo;
        const maxD = Math.ceil((n + m) / 2);
        const vOffset = maxD;
        const vLength = 2 * maxD + 2;
        const forward = new Array<number>(vLength).fill(-1);
        const backward = new Array<number>(vLength).fill(-1);
        forward[vOffset + 1] = 0;
        backward[vOffset + 1] = 0;
        const delta = n - m;
        const checkOnForward = delta % 2 !== 0;
        let k1start = 0;
        let k1end = 0;
        let k2start = 0;
        let k2end = 0;

        for (let d = 0; d < maxD; d++) {
            for (let k1 = -d + k1start; k1 <= d - k1end; k1 += 2) {
                const k1Offset = vOffset + k1;
                let x1 = (k1 === -d || (k1 !== d && forward[k1Offset - 1] < forward[k1Offset + 1]))
                    ? forward[k1Offset + 1]
                    : forward[k1Offset - 1] + 1;
                let y1 = x1 - k1;
                while (x1 < n && y1 < m && a[aLo + x1] === b[bLo + y1]) {
                    x1++;
                    y1++;
                }
                forward[k1Offset] = x1;
                if (x1 > n) {
                    k1end += 2;
                } else if (y1 > m) {
                    k1start += 2;
                } else if (checkOnForward) {
                    const k2Offset = vOffset + delta - k1;
                    if (k2Offset >= 0 && k2Offset < vLength && backward[k2Offset] !== -1 && x1 >= n - backward[k2Offset]) {
                        this.diffRange(a, aLo, aLo + x1, b, bLo, bLo + y1, edits);
                        this.diffRange(a, aLo + x1, aHi, b, bLo + y1, bHi, edits);
                        return;
                    }
                }
            }

            for (let k2 = -d + k2start; k2 <= d - k2end; k2 += 2) {
                const k2Offset = vOffset + k2;
                let x2 = (k2 === -d || (k2 !== d && backward[k2Offset - 1] < backward[k2Offset + 1]))
                    ? backward[k2Offset + 1]
                    : backward[k2Offset - 1] + 1;
                let y2 = x2 - k2;
                while (x2 < n && y2 < m && a[aHi - x2 - 1] === b[bHi - y2 - 1]) {
                    x2++;
                    y2++;
                }
                backward[k2Offset] = x2;
                if (x2 > n) {
                    k2end += 2;
                } else if (y2 > m) {
                    k2start += 2;
                } else if (!checkOnForward) {
                    const k1Offset = vOffset + delta - k2;
                    if (k1Offset >= 0 && k1Offset < vLength && forward[k1Offset] !== -1) {
                        const x1 = forward[k1Offset];
                        const y1 = vOffset + x1 - k1Offset;
                        if (x1 >= n - x2) {
                            this.diffRange(a, aLo, aLo + x1, b, bLo, bLo + y1, edits);
                            this.diffRange(a, aLo + x1, aHi, b, bLo + y1, bHi, edits);
                            return;
                        }
                    }
                }
            }
        }

        // no common line at all
        for (let i = aLo; i < aHi; i++) edits.push({ type: 'delete', aIndex: i, bIndex: bLo });
        for (let j = bLo; j < bHi; j++) edits.push({ type: 'insert', aIndex: aHi, bIndex: j });
    }

    /**
     * Folds each maximal run of inserts/deletes into one TextChange.
     */
    private static toChanges(edits: Edit[], a: string[], b: string[]): TextChange[] {
        const changes: TextChange[] = [];
        let index = 0;
        while (index < edits.length) {
            if (edits[index].type === 'equal') {
                index++;
                continue;
            }
            const deleted: number[] = [];
            const inserted: number[] = [];
            // original line the run starts at (0-based)
            const anchor = edits[index].aIndex;
            while (index < edits.length && edits[index].type !== 'equal') {
                const edit = edits[index];
                if (edit.type === 'delete') {
                    deleted.push(edit.aIndex);
                } else {
                    inserted.push(edit.bIndex);
                }
                index++;
            }

            const newText = inserted.map(i => b[i]).join('\n');
            if (deleted.length === 0) {
                changes.push({ startLine: anchor + 1, endLine: anchor, originalText: '', newText, kind: 'Insert' });
                continue;
            }
            const startLine = deleted[0] + 1;
            const endLine = deleted[deleted.length - 1] + 1;
            const originalText = deleted.map(i => a[i]).join('\n');
            changes.push(inserted.length === 0
                ? { startLine, endLine, originalText, newText: '', kind: 'Delete' }
                : { startLine, endLine, originalText, newText, kind: 'Replace' });
        }
        return changes;
    }
}
