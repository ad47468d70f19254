import * as path from "path";

export const GRAPH_ROOT = "/__graph__";

const DECLARATION_EXT = /\.d\.[mc]?ts$/i;

export function splitExtension(fileName: string): { stem: string; ext: string } {
    const declaration = DECLARATION_EXT.exec(fileName);
    const ext = declaration ? declaration[0] : path.extname(fileName);
    return { stem: fileName.slice(0, fileName.length - ext.length), ext };
}

function directoryTag(originalPath: string): string {
    const dir = path.basename(path.dirname(originalPath));
    const tag = dir.replace(/[^A-Za-z0-9_-]/g, "_");
    return tag.length > 0 ? tag : "root";
}

/**
 * Gives every original path a flat, unique id under GRAPH_ROOT.
 *
 * A file name that occurs once keeps its name. Colliding names get their
 * parent directory folded in (`index.core.ts`); when that is still taken an
 * ordinal follows (`index.core_2.ts`, `index.core_3.ts`, ...). Assignment
 * depends only on input order.
 */
export function assignSyntheticIds(originalPaths: readonly string[]): Map<string, string> {
    const groups = new Map<string, string[]>();
    for (const originalPath of originalPaths) {
        const name = path.basename(originalPath);
        const members = groups.get(name);
        if (members) {
            members.push(originalPath);
        } else {
            groups.set(name, [originalPath]);
        }
    }

    const taken = new Set<string>();
    const assigned = new Map<string, string>();

    for (const [name, members] of groups) {
        if (members.length === 1) {
            const id = `${GRAPH_ROOT}/${name}`;
            taken.add(id);
            assigned.set(members[0], id);
        }
    }

    for (const [name, members] of groups) {
        if (members.length === 1) continue;
        const { stem, ext } = splitExtension(name);
        for (const member of members) {
            const tag = directoryTag(member);
            let candidate = `${GRAPH_ROOT}/${stem}.${tag}${ext}`;
            let ordinal = 2;
            while (taken.has(candidate)) {
                candidate = `${GRAPH_ROOT}/${stem}.${tag}_${ordinal}${ext}`;
                ordinal++;
            }
            taken.add(candidate);
            assigned.set(member, candidate);
        }
    }

    // callers iterate in input order
    return new Map(originalPaths.map(originalPath => [originalPath, assigned.get(originalPath) ?? ""]));
}
