import { AutoFixType, BuildError } from "../types.js";

type FixCategory = Exclude<AutoFixType, "all">;

interface PatternFix {
    id: string;
    category: FixCategory;
    description: string;
    pattern: RegExp;
    replacement: string;
}

export interface AppliedFix {
    id: string;
    description: string;
    occurrences: number;
}

export interface AutoFixResult {
    code: string;
    applied: AppliedFix[];
    changeCount: number;
}

// Text-level rewrites; they do not look inside the syntax tree.
const PATTERN_FIXES: PatternFix[] = [
    {
        id: "var-to-let",
        category: "style",
        description: "Replace `var` declarations with `let`",
        pattern: /\bvar(\s+)(?=[A-Za-z_$[{])/g,
        replacement: "let$1"
    },
    {
        id: "strict-equality",
        category: "style",
        description: "Use `===` instead of `==` (comparisons with null are kept)",
        pattern: /([^=!<>])==(?!=)(?!\s*(?:null|undefined)\b)/g,
        replacement: "$1==="
    },
    {
        id: "strict-inequality",
        category: "style",
        description: "Use `!==` instead of `!=` (comparisons with null are kept)",
        pattern: /!=(?!=)(?!\s*(?:null|undefined)\b)/g,
        replacement: "!=="
    },
    {
        id: "trailing-whitespace",
        category: "style",
        description: "Remove trailing whitespace",
        pattern: /[ \t]+$/gm,
        replacement: ""
    },
    {
        id: "array-literal",
        category: "modernize",
        description: "Replace `new Array()` with `[]`",
        pattern: /\bnew Array\(\s*\)/g,
        replacement: "[]"
    },
    {
        id: "object-literal",
        category: "modernize",
        description: "Replace `new Object()` with `{}`",
        pattern: /\bnew Object\(\s*\)/g,
        replacement: "{}"
    },
    {
        id: "index-of-to-includes",
        category: "modernize",
        description: "Replace `.indexOf(x) !== -1` checks with `.includes(x)`",
        pattern: /\.indexOf\(([^()]*)\)\s*(?:!==?\s*-1|>\s*-1|>=\s*0)/g,
        replacement: ".includes($1)"
    }
];

const BUILD_ERROR_HINTS: Record<string, string> = {
    TS2304: "Cannot find name: import the symbol or declare it before use.",
    TS2307: "Cannot find module: check the import path or install the package and its types.",
    TS2322: "Type mismatch: adjust the assigned value or widen the declared type.",
    TS2339: "Property does not exist: check the spelling or add it to the type declaration.",
    TS2345: "Argument type mismatch: convert the argument or change the parameter type.",
    TS7006: "Implicit any: add a type annotation to the parameter.",
    TS1308: "`await` outside an async function: mark the enclosing function `async`.",
    TS18048: "Possibly undefined: narrow the value with a check before using it."
};

function selectFixes(fixTypes: readonly AutoFixType[]): PatternFix[] {
    if (fixTypes.length === 0 || fixTypes.includes("all")) {
        return PATTERN_FIXES;
    }
    return PATTERN_FIXES.filter(fix => fixTypes.some(type => type === fix.category));
}

function countMatches(code: string, pattern: RegExp): number {
    return Array.from(code.matchAll(pattern)).length;
}

export function applyPatternFixes(code: string, fixTypes: readonly AutoFixType[] = ["all"]): AutoFixResult {
    let current = code;
    const applied: AppliedFix[] = [];
    for (const fix of selectFixes(fixTypes)) {
        const occurrences = countMatches(current, fix.pattern);
        if (occurrences === 0) continue;
        current = current.replace(fix.pattern, fix.replacement);
        applied.push({ id: fix.id, description: fix.description, occurrences });
    }
    return {
        code: current,
        applied,
        changeCount: applied.reduce((sum, fix) => sum + fix.occurrences, 0)
    };
}

/**
 * One hint per recognised diagnostic code, most frequent code first.
 */
export function suggestFixesForBuildErrors(errors: readonly BuildError[]): string[] {
    const counts = new Map<string, number>();
    for (const error of errors) {
        if (BUILD_ERROR_HINTS[error.code]) {
            counts.set(error.code, (counts.get(error.code) ?? 0) + 1);
        }
    }
    return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .map(([code]) => `${code}: ${BUILD_ERROR_HINTS[code]}`);
}
