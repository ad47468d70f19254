import * as path from 'path';
import * as ts from 'typescript';

const EXT_TO_SCRIPT_KIND: Record<string, ts.ScriptKind> = {
    '.ts': ts.ScriptKind.TS,
    '.mts': ts.ScriptKind.TS,
    '.cts': ts.ScriptKind.TS,
    '.tsx': ts.ScriptKind.TSX,
    '.js': ts.ScriptKind.JS,
    '.jsx': ts.ScriptKind.JSX,
    '.mjs': ts.ScriptKind.JS,
    '.cjs': ts.ScriptKind.JS
};

export function scriptKindFor(filePath: string): ts.ScriptKind {
    return EXT_TO_SCRIPT_KIND[path.extname(filePath).toLowerCase()] ?? ts.ScriptKind.TS;
}

/**
 * Syntax tree only, no binding or type information.
 */
export function parseSource(filePath: string, content: string): ts.SourceFile {
    return ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, scriptKindFor(filePath));
}

const DECLARATION_PARENTS = new Set<ts.SyntaxKind>([
    ts.SyntaxKind.ClassDeclaration,
    ts.SyntaxKind.ClassExpression,
    ts.SyntaxKind.InterfaceDeclaration,
    ts.SyntaxKind.TypeAliasDeclaration,
    ts.SyntaxKind.EnumDeclaration,
    ts.SyntaxKind.EnumMember,
    ts.SyntaxKind.FunctionDeclaration,
    ts.SyntaxKind.FunctionExpression,
    ts.SyntaxKind.MethodDeclaration,
    ts.SyntaxKind.MethodSignature,
    ts.SyntaxKind.PropertyDeclaration,
    ts.SyntaxKind.PropertySignature,
    ts.SyntaxKind.GetAccessor,
    ts.SyntaxKind.SetAccessor,
    ts.SyntaxKind.VariableDeclaration,
    ts.SyntaxKind.Parameter,
    ts.SyntaxKind.TypeParameter,
    ts.SyntaxKind.ModuleDeclaration,
    ts.SyntaxKind.BindingElement
]);

/**
 * True when `node` is the name a declaration introduces, as opposed to a
 * reference to it.
 */
export function isDeclarationName(node: ts.Node): boolean {
    const parent = node.parent;
    if (!parent || !DECLARATION_PARENTS.has(parent.kind)) return false;
    return "name" in parent && parent.name === node;
}

export function forEachIdentifier(root: ts.Node, visit: (identifier: ts.Identifier | ts.PrivateIdentifier) => void): void {
    const walk = (node: ts.Node): void => {
        if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) {
            visit(node);
            return;
        }
        ts.forEachChild(node, walk);
    };
    walk(root);
}
