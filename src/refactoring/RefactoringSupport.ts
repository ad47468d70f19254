import * as ts from "typescript";
import { AnalysisError } from "../errors/AnalysisError.js";
import { MemoryFileSystem } from "../platform/FileSystem.js";
import { CompilationGraph } from "../compilation/CompilationGraph.js";
import { CompilationGraphBuilder } from "../compilation/CompilationGraphBuilder.js";

export const INLINE_SOURCE_PATH = "/__inline__/source.ts";

const DEFAULT_INDENT_UNIT = "    ";

// single-file refactorings never touch the disk
const inlineBuilder = new CompilationGraphBuilder(new MemoryFileSystem("/"), { maxFiles: 1 });

export interface CompiledSource {
    graph: CompilationGraph;
    sourceFile: ts.SourceFile;
    checker: ts.TypeChecker;
}

/**
 * Compiles one piece of code on its own so refactorings can ask the checker
 * about it. Imports it makes to other files stay unresolved.
 */
export function compileSingle(code: string, filePath: string = INLINE_SOURCE_PATH): CompiledSource {
    const graph = inlineBuilder.buildFromSources([{ originalPath: filePath, content: code }]);
    const sourceFile = graph.getSourceFile(filePath);
    if (!sourceFile) {
        throw new AnalysisError("InternalError", `Could not compile ${filePath}`);
    }
    return { graph, sourceFile, checker: graph.checker };
}

export function lineStartOf(text: string, position: number): number {
    return text.lastIndexOf("\n", Math.max(0, position - 1)) + 1;
}

export function indentationAt(text: string, position: number): string {
    const start = lineStartOf(text, position);
    return /^[ \t]*/.exec(text.slice(start))?.[0] ?? "";
}

/**
 * Indentation step used by the file: a tab, or the smallest run of leading
 * spaces found on any line.
 */
export function detectIndentUnit(text: string): string {
    let smallest = Number.POSITIVE_INFINITY;
    for (const line of text.split("\n")) {
        if (line.trim().length === 0) continue;
        if (line.startsWith("\t")) return "\t";
        const spaces = /^ */.exec(line)?.[0].length ?? 0;
        if (spaces > 0 && spaces < smallest) smallest = spaces;
    }
    return Number.isFinite(smallest) ? " ".repeat(smallest) : DEFAULT_INDENT_UNIT;
}

/**
 * Re-indents a block whose first line was cut at its first character and
 * whose other lines still carry `originalIndent`.
 */
export function reindent(block: string, originalIndent: string, targetIndent: string): string {
    return block
        .split("\n")
        .map((line, index) => {
            if (line.trim().length === 0) return "";
            const stripped = index > 0 && line.startsWith(originalIndent) ? line.slice(originalIndent.length) : line;
            return targetIndent + (index === 0 ? stripped.trimStart() : stripped);
        })
        .join("\n");
}

function widenedParts(checker: ts.TypeChecker, type: ts.Type, enclosing?: ts.Node): string[] {
    // enum members keep their enum's name
    if ((type.flags & ts.TypeFlags.EnumLiteral) !== 0) {
        return [checker.typeToString(type, enclosing, ts.TypeFormatFlags.NoTruncation)];
    }
    if (type.isStringLiteral() || (type.flags & ts.TypeFlags.TemplateLiteral) !== 0) return ["string"];
    if (type.isNumberLiteral()) return ["number"];
    if ((type.flags & ts.TypeFlags.BigIntLiteral) !== 0) return ["bigint"];
    if ((type.flags & ts.TypeFlags.BooleanLiteral) !== 0) return ["boolean"];
    if (type.isUnion()) {
        return type.types.flatMap(member => widenedParts(checker, member, enclosing));
    }
    return [checker.typeToString(type, enclosing, ts.TypeFormatFlags.NoTruncation)];
}

/**
 * Type text for a new declaration: literal types are widened (`"a"` to
 * `string`, `1 | 2` to `number`) the way a `let` would see them.
 */
export function widenedTypeText(checker: ts.TypeChecker, type: ts.Type, enclosing?: ts.Node): string {
    return Array.from(new Set(widenedParts(checker, type, enclosing))).join(" | ");
}

/** Any and error types say nothing useful; callers leave those to inference. */
export function isUninformativeType(type: ts.Type): boolean {
    return (type.flags & (ts.TypeFlags.Any | ts.TypeFlags.Unknown)) !== 0;
}

export function isFunctionWithBody(node: ts.Node): node is ts.FunctionLikeDeclaration & { body: ts.Node } {
    return (ts.isFunctionDeclaration(node)
        || ts.isMethodDeclaration(node)
        || ts.isFunctionExpression(node)
        || ts.isArrowFunction(node)
        || ts.isConstructorDeclaration(node)
        || ts.isGetAccessorDeclaration(node)
        || ts.isSetAccessorDeclaration(node)) && node.body !== undefined;
}

/** Statement list of a node that holds one, else undefined. */
export function statementsOf(node: ts.Node): ts.NodeArray<ts.Statement> | undefined {
    if (ts.isBlock(node) || ts.isSourceFile(node) || ts.isModuleBlock(node) || ts.isCaseClause(node) || ts.isDefaultClause(node)) {
        return node.statements;
    }
    return undefined;
}

export function findAncestor<T extends ts.Node>(node: ts.Node | undefined, test: (candidate: ts.Node) => candidate is T): T | undefined {
    let current = node;
    while (current) {
        if (test(current)) return current;
        current = current.parent;
    }
    return undefined;
}

/**
 * Finds a class, top level or inside namespaces, by name.
 */
export function findClass(sourceFile: ts.SourceFile, className: string): ts.ClassDeclaration | undefined {
    let found: ts.ClassDeclaration | undefined;
    const visit = (node: ts.Node): void => {
        if (found) return;
        if (ts.isClassDeclaration(node) && node.name?.text === className) {
            found = node;
            return;
        }
        ts.forEachChild(node, visit);
    };
    visit(sourceFile);
    return found;
}

export function memberName(member: ts.ClassElement): string | undefined {
    const name = member.name;
    if (!name) return undefined;
    if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
        return name.text;
    }
    return undefined;
}

/**
 * Token texts of a code fragment, trivia dropped. Two fragments that differ
 * only in whitespace or comments produce the same list.
 */
export function tokenize(text: string): string[] {
    const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, text);
    const tokens: string[] = [];
    for (let token = scanner.scan(); token !== ts.SyntaxKind.EndOfFileToken; token = scanner.scan()) {
        tokens.push(scanner.getTokenText());
    }
    return tokens;
}
