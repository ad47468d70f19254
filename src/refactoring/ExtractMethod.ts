import * as ts from "typescript";
import { RefactoringOutcome } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { hasModifier } from "../compilation/DeclarationCollector.js";
import { forEachIdentifier, isDeclarationName } from "../compilation/SourceParser.js";
import { assertValidIdentifier } from "./Identifiers.js";
import { applyTextEdits } from "./TextEdits.js";
import {
    compileSingle,
    detectIndentUnit,
    findAncestor,
    indentationAt,
    isFunctionWithBody,
    isUninformativeType,
    memberName,
    reindent,
    statementsOf,
    widenedTypeText
} from "./RefactoringSupport.js";

export interface ExtractMethodRequest {
    code: string;
    selectedText: string;
    methodName: string;
    filePath?: string;
}

type Selection =
    | { kind: "statements"; nodes: ts.Statement[] }
    | { kind: "expression"; node: ts.Expression };

interface Parameter {
    name: string;
    type: string;
}

const EXPRESSION_KINDS = new Set<ts.SyntaxKind>([
    ts.SyntaxKind.BinaryExpression,
    ts.SyntaxKind.CallExpression,
    ts.SyntaxKind.NewExpression,
    ts.SyntaxKind.ConditionalExpression,
    ts.SyntaxKind.PropertyAccessExpression,
    ts.SyntaxKind.ElementAccessExpression,
    ts.SyntaxKind.ParenthesizedExpression,
    ts.SyntaxKind.PrefixUnaryExpression,
    ts.SyntaxKind.AwaitExpression,
    ts.SyntaxKind.TemplateExpression,
    ts.SyntaxKind.ArrayLiteralExpression,
    ts.SyntaxKind.ObjectLiteralExpression,
    ts.SyntaxKind.AsExpression,
    ts.SyntaxKind.TypeOfExpression
]);

function isSelectableExpression(node: ts.Node): node is ts.Expression {
    return EXPRESSION_KINDS.has(node.kind);
}

function findSelection(sourceFile: ts.SourceFile, start: number, end: number): Selection | undefined {
    let statements: ts.Statement[] | undefined;
    let expression: ts.Expression | undefined;

    const visit = (node: ts.Node): void => {
        if (statements || node.getEnd() < start || node.getStart(sourceFile) > end) return;
        const list = statementsOf(node);
        if (list) {
            const first = list.findIndex(statement => statement.getStart(sourceFile) === start);
            const last = list.findIndex(statement => statement.getEnd() === end);
            if (first >= 0 && last >= first) {
                statements = list.slice(first, last + 1);
                return;
            }
        }
        if (!expression && isSelectableExpression(node)
            && node.getStart(sourceFile) === start && node.getEnd() === end) {
            expression = node;
        }
        ts.forEachChild(node, visit);
    };
    visit(sourceFile);

    if (statements) return { kind: "statements", nodes: statements };
    if (expression) return { kind: "expression", node: expression };
    return undefined;
}

/**
 * First occurrence of `selected` that lines up with syntax nodes. Copies in
 * comments or string literals never do, so they are passed over.
 */
function locateSelection(sourceFile: ts.SourceFile, code: string, selected: string): { selection: Selection; start: number } | undefined {
    for (let start = code.indexOf(selected); start >= 0; start = code.indexOf(selected, start + 1)) {
        const selection = findSelection(sourceFile, start, start + selected.length);
        if (selection) return { selection, start };
    }
    return undefined;
}

function forEachInSelection(nodes: readonly ts.Node[], visit: (node: ts.Node) => void): void {
    const walk = (node: ts.Node): void => {
        visit(node);
        ts.forEachChild(node, walk);
    };
    nodes.forEach(walk);
}

/** `await` that belongs to the selection itself, not to a nested function. */
function containsOwnAwait(nodes: readonly ts.Node[]): boolean {
    let found = false;
    const walk = (node: ts.Node): void => {
        if (found) return;
        if (ts.isAwaitExpression(node) || (ts.isForOfStatement(node) && node.awaitModifier)) {
            found = true;
            return;
        }
        if (ts.isFunctionLike(node)) return;
        ts.forEachChild(node, walk);
    };
    nodes.forEach(walk);
    return found;
}

function symbolOf(checker: ts.TypeChecker, identifier: ts.Identifier): ts.Symbol | undefined {
    if (ts.isShorthandPropertyAssignment(identifier.parent) && identifier.parent.name === identifier) {
        return checker.getShorthandAssignmentValueSymbol(identifier.parent);
    }
    if (ts.isPropertyAccessExpression(identifier.parent) && identifier.parent.name === identifier) {
        return undefined;
    }
    return checker.getSymbolAtLocation(identifier);
}

/**
 * Moves whole statements (or one whole expression) out of a function body
 * into a new private method, or a new function when there is no class.
 */
export function extractMethod(request: ExtractMethodRequest): RefactoringOutcome {
    assertValidIdentifier(request.methodName, "methodName");
    const selected = request.selectedText.trim();
    if (selected.length === 0) {
        throw AnalysisError.configuration("selectedText must not be empty", { parameter: "selectedText" });
    }
    const code = request.code;
    if (!code.includes(selected)) {
        throw AnalysisError.notFound("The selected text does not occur in the code", { selectedText: selected });
    }

    const { sourceFile, checker } = compileSingle(code, request.filePath);
    const located = locateSelection(sourceFile, code, selected);
    if (!located) {
        throw AnalysisError.configuration(
            "The selection must cover whole statements or one whole expression",
            { selectedText: selected }
        );
    }
    const { selection, start: selStart } = located;
    const selEnd = selStart + selected.length;
    const selectedNodes: ts.Node[] = selection.kind === "statements" ? selection.nodes : [selection.node];
    const enclosingFunction = findAncestor(selectedNodes[0].parent, isFunctionWithBody);
    if (!enclosingFunction) {
        throw AnalysisError.configuration("The selection must be inside a function body", { selectedText: selected });
    }

    // placement
    const classMember = findAncestor(enclosingFunction, (node): node is ts.ClassElement =>
        ts.isClassElement(node) && (ts.isClassDeclaration(node.parent) || ts.isClassExpression(node.parent)));
    const topStatement = findAncestor(enclosingFunction, (node): node is ts.Node =>
        node.parent !== undefined && ts.isSourceFile(node.parent));
    const anchor: ts.Node | undefined = classMember ?? topStatement;
    if (!anchor) {
        throw AnalysisError.configuration("Could not find where to place the extracted code", { selectedText: selected });
    }

    const anchorStart = anchor.getStart(sourceFile);
    const anchorEnd = anchor.getEnd();
    const insideSelection = (position: number) => position >= selStart && position < selEnd;
    // locals and parameters of any function within the anchor are out of scope where the new code goes
    const isCaptured = (declaration: ts.Declaration) => {
        const scope = findAncestor(declaration.parent, ts.isFunctionLike);
        return scope !== undefined && scope.getStart(sourceFile) >= anchorStart && scope.getEnd() <= anchorEnd;
    };

    // parameters: captured locals read by the selection
    const parameters: Parameter[] = [];
    const seen = new Set<ts.Symbol>();
    forEachInSelection(selectedNodes, node => {
        if (!ts.isIdentifier(node) || isDeclarationName(node)) return;
        const symbol = symbolOf(checker, node);
        const declaration = symbol?.valueDeclaration ?? symbol?.declarations?.[0];
        if (!symbol || !declaration || seen.has(symbol) || (symbol.flags & ts.SymbolFlags.Value) === 0) return;
        if (declaration.getSourceFile() !== sourceFile || declaration === enclosingFunction) return;
        if (!isCaptured(declaration) || insideSelection(declaration.getStart(sourceFile))) return;
        seen.add(symbol);
        parameters.push({ name: symbol.getName(), type: widenedTypeText(checker, checker.getTypeOfSymbolAtLocation(symbol, declaration), enclosingFunction) });
    });

    const conflicts: string[] = [];

    // locals declared in the selection must not be needed afterwards
    const declaredInside = new Map<ts.Symbol, string>();
    forEachInSelection(selectedNodes, node => {
        if (!ts.isIdentifier(node) || !isDeclarationName(node)) return;
        if (!ts.isVariableDeclaration(node.parent) && !ts.isBindingElement(node.parent) && !ts.isFunctionDeclaration(node.parent)) return;
        if (findAncestor(node.parent.parent, isFunctionWithBody) !== enclosingFunction) return;
        const symbol = checker.getSymbolAtLocation(node);
        if (symbol) declaredInside.set(symbol, node.text);
    });
    if (declaredInside.size > 0) {
        const usedAfter = new Set<string>();
        forEachIdentifier(enclosingFunction, identifier => {
            if (identifier.getStart(sourceFile) < selEnd || !ts.isIdentifier(identifier)) return;
            const symbol = checker.getSymbolAtLocation(identifier);
            const name = symbol ? declaredInside.get(symbol) : undefined;
            if (name) usedAfter.add(name);
        });
        for (const name of usedAfter) {
            conflicts.push(`'${name}' is declared in the selection and used after it`);
        }
    }

    // return value
    const lastStatement = selection.kind === "statements" ? selection.nodes[selection.nodes.length - 1] : undefined;
    const returned = selection.kind === "expression"
        ? selection.node
        : lastStatement && ts.isReturnStatement(lastStatement) ? lastStatement.expression : undefined;
    const endsWithReturn = lastStatement !== undefined && ts.isReturnStatement(lastStatement);
    if (selection.kind === "statements") {
        let earlyReturn = false;
        forEachInSelection(selection.nodes, node => {
            if (ts.isReturnStatement(node) && node !== lastStatement && findAncestor(node, isFunctionWithBody) === enclosingFunction) {
                earlyReturn = true;
            }
        });
        if (earlyReturn) conflicts.push("The selection returns before its last statement; callers will not see that return");
    }

    let valueType = "void";
    if (returned) {
        const type = checker.getTypeAtLocation(returned);
        valueType = isUninformativeType(type) ? "any" : widenedTypeText(checker, type, enclosingFunction);
    }
    const isAsync = containsOwnAwait(selectedNodes);
    const returnType = isAsync ? `Promise<${valueType}>` : valueType;

    if (classMember && (ts.isClassDeclaration(classMember.parent) || ts.isClassExpression(classMember.parent))) {
        if (classMember.parent.members.some(member => memberName(member) === request.methodName)) {
            conflicts.push(`'${request.methodName}' already exists in class ${classMember.parent.name?.text ?? "(anonymous)"}`);
        }
    } else if (checker.getSymbolsInScope(enclosingFunction, ts.SymbolFlags.Value).some(symbol => symbol.getName() === request.methodName)) {
        conflicts.push(`'${request.methodName}' is already declared in this scope`);
    }

    const unit = detectIndentUnit(code);
    const anchorIndent = indentationAt(code, anchorStart);
    const bodyIndent = anchorIndent + unit;
    const selectionIndent = indentationAt(code, selStart);
    const parameterList = parameters.map(parameter => `${parameter.name}: ${parameter.type}`).join(", ");
    const argumentList = parameters.map(parameter => parameter.name).join(", ");

    const body = selection.kind === "expression"
        ? `${bodyIndent}${valueType === "void" ? "" : "return "}${selected};`
        : reindent(selected, selectionIndent, bodyIndent);

    const isStatic = classMember !== undefined && hasModifier(classMember, ts.SyntaxKind.StaticKeyword);
    const header = classMember
        ? `private ${isStatic ? "static " : ""}${isAsync ? "async " : ""}${request.methodName}(${parameterList}): ${returnType}`
        : `${isAsync ? "async " : ""}function ${request.methodName}(${parameterList}): ${returnType}`;
    const artifact = `${anchorIndent}${header} {\n${body}\n${anchorIndent}}`;

    const call = `${isAsync ? "await " : ""}${classMember ? "this." : ""}${request.methodName}(${argumentList})`;
    const replacement = selection.kind === "expression"
        ? call
        : endsWithReturn && returned ? `return ${call};` : `${call};`;

    const modifiedCode = applyTextEdits(code, [
        { start: selStart, end: selEnd, newText: replacement },
        { start: anchor.getEnd(), end: anchor.getEnd(), newText: `\n\n${artifact}` }
    ]);

    return {
        modifiedCode,
        extractedArtifact: artifact.trim(),
        usedIdentifiers: parameters.map(parameter => parameter.name),
        changeCount: 2,
        conflicts,
        details: {
            returnType,
            isAsync,
            parameters,
            placement: classMember ? "method" : "function",
            signature: header
        }
    };
}
