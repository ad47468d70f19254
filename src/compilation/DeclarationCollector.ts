import * as ts from "typescript";
import { SymbolKind } from "../types.js";

export interface DeclarationInfo {
    name: string;
    kind: SymbolKind;
    container?: string;
    /** the declaration node itself */
    node: ts.Node;
    /** the identifier naming it; refactorings anchor on this */
    nameNode: ts.Node;
    exported: boolean;
    signature: string;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
}

const MAX_SIGNATURE_LENGTH = 200;

export function declarationName(name: ts.Node | undefined): string | undefined {
    if (!name) return undefined;
    if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
        return name.text;
    }
    return undefined;
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
    if (!ts.canHaveModifiers(node)) return false;
    return (ts.getModifiers(node) ?? []).some(modifier => modifier.kind === kind);
}

function isExported(node: ts.Node): boolean {
    return hasModifier(node, ts.SyntaxKind.ExportKeyword);
}

function collapse(text: string): string {
    const flat = text.replace(/\s+/g, " ").trim();
    return flat.length > MAX_SIGNATURE_LENGTH ? flat.slice(0, MAX_SIGNATURE_LENGTH - 3) + "..." : flat;
}

/**
 * Header text of a declaration: everything before its body or initializer.
 */
export function signatureOf(node: ts.Node, sourceFile: ts.SourceFile): string {
    const start = node.getStart(sourceFile);
    let end = node.getEnd();
    if (ts.isFunctionLike(node) && "body" in node && node.body !== undefined) {
        end = node.body.getStart(sourceFile);
    } else if (ts.isClassLike(node) || ts.isInterfaceDeclaration(node) || ts.isEnumDeclaration(node)) {
        end = node.members.pos - 1;
    } else if ((ts.isPropertyDeclaration(node) || ts.isVariableDeclaration(node)) && node.initializer) {
        end = node.initializer.getStart(sourceFile);
        return collapse(sourceFile.text.slice(start, end).replace(/=\s*$/, ""));
    }
    return collapse(sourceFile.text.slice(start, Math.max(start, end)).replace(/[{;]\s*$/, ""));
}

/**
 * Walks the top level of a source file (descending into namespaces) and
 * reports named declarations plus the members of classes and interfaces.
 * Purely syntactic: works on any parsed tree, with or without a program.
 */
export function collectDeclarations(sourceFile: ts.SourceFile): DeclarationInfo[] {
    const results: DeclarationInfo[] = [];

    const push = (node: ts.Node, nameNode: ts.Node | undefined, kind: SymbolKind, exported: boolean, container?: string, signatureNode: ts.Node = node) => {
        const name = declarationName(nameNode);
        if (!name || !nameNode) return;
        const { line, character } = sourceFile.getLineAndCharacterOfPosition(nameNode.getStart(sourceFile));
        results.push({
            name,
            kind,
            container,
            node,
            nameNode,
            exported,
            signature: signatureOf(signatureNode, sourceFile),
            line: line + 1,
            column: character + 1
        });
    };

    const visitMembers = (members: ts.NodeArray<ts.ClassElement | ts.TypeElement>, container: string, containerExported: boolean) => {
        for (const member of members) {
            const hidden = hasModifier(member, ts.SyntaxKind.PrivateKeyword) || hasModifier(member, ts.SyntaxKind.ProtectedKeyword);
            const exported = containerExported && !hidden;
            if (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) {
                push(member, member.name, "method", exported, container);
            } else if (ts.isPropertyDeclaration(member) || ts.isPropertySignature(member)) {
                push(member, member.name, "property", exported, container);
            } else if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
                const duplicate = results.some(entry => entry.kind === "accessor" && entry.container === container && entry.name === declarationName(member.name));
                if (!duplicate) {
                    push(member, member.name, "accessor", exported, container);
                }
            } else if (ts.isConstructorDeclaration(member)) {
                const anchor = member.getChildren(sourceFile).find(child => child.kind === ts.SyntaxKind.ConstructorKeyword)
                    ?? member.getFirstToken(sourceFile);
                if (anchor) {
                    const { line, character } = sourceFile.getLineAndCharacterOfPosition(anchor.getStart(sourceFile));
                    results.push({
                        name: "constructor",
                        kind: "constructor",
                        container,
                        node: member,
                        nameNode: anchor,
                        exported,
                        signature: signatureOf(member, sourceFile),
                        line: line + 1,
                        column: character + 1
                    });
                }
            }
        }
    };

    const visitStatements = (statements: ts.NodeArray<ts.Statement>, namespace?: string) => {
        for (const statement of statements) {
            if (ts.isClassDeclaration(statement)) {
                const exported = isExported(statement);
                push(statement, statement.name, "class", exported, namespace);
                const className = declarationName(statement.name);
                if (className) visitMembers(statement.members, className, exported);
            } else if (ts.isInterfaceDeclaration(statement)) {
                const exported = isExported(statement);
                push(statement, statement.name, "interface", exported, namespace);
                visitMembers(statement.members, statement.name.text, exported);
            } else if (ts.isEnumDeclaration(statement)) {
                push(statement, statement.name, "enum", isExported(statement), namespace);
            } else if (ts.isTypeAliasDeclaration(statement)) {
                push(statement, statement.name, "type", isExported(statement), namespace);
            } else if (ts.isFunctionDeclaration(statement)) {
                push(statement, statement.name, "function", isExported(statement), namespace);
            } else if (ts.isVariableStatement(statement)) {
                const exported = isExported(statement);
                for (const declaration of statement.declarationList.declarations) {
                    if (!ts.isIdentifier(declaration.name)) continue;
                    const initializer = declaration.initializer;
                    const isFunction = !!initializer && (ts.isArrowFunction(initializer) || ts.isFunctionExpression(initializer));
                    push(declaration, declaration.name, isFunction ? "function" : "variable", exported, namespace);
                }
            } else if (ts.isModuleDeclaration(statement) && statement.body && ts.isModuleBlock(statement.body)) {
                const name = declarationName(statement.name);
                visitStatements(statement.body.statements, namespace && name ? `${namespace}.${name}` : name);
            }
        }
    };

    visitStatements(sourceFile.statements);
    return results;
}
