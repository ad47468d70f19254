import * as ts from "typescript";
import { RefactoringOutcome, VariableScope } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { hasModifier } from "../compilation/DeclarationCollector.js";
import { isDeclarationName } from "../compilation/SourceParser.js";
import { assertValidIdentifier } from "./Identifiers.js";
import { TextEdit, applyTextEdits } from "./TextEdits.js";
import {
    compileSingle,
    detectIndentUnit,
    findAncestor,
    indentationAt,
    isFunctionWithBody,
    isUninformativeType,
    lineStartOf,
    memberName,
    statementsOf,
    tokenize,
    widenedTypeText
} from "./RefactoringSupport.js";

export interface IntroduceVariableRequest {
    code: string;
    expression: string;
    variableName: string;
    scope?: VariableScope;
    replaceAll?: boolean;
    filePath?: string;
}

const MATCHABLE_KINDS = new Set<ts.SyntaxKind>([
    ts.SyntaxKind.Identifier,
    ts.SyntaxKind.StringLiteral,
    ts.SyntaxKind.NumericLiteral,
    ts.SyntaxKind.NoSubstitutionTemplateLiteral,
    ts.SyntaxKind.TemplateExpression,
    ts.SyntaxKind.BinaryExpression,
    ts.SyntaxKind.CallExpression,
    ts.SyntaxKind.NewExpression,
    ts.SyntaxKind.ConditionalExpression,
    ts.SyntaxKind.PropertyAccessExpression,
    ts.SyntaxKind.ElementAccessExpression,
    ts.SyntaxKind.ParenthesizedExpression,
    ts.SyntaxKind.PrefixUnaryExpression,
    ts.SyntaxKind.AwaitExpression,
    ts.SyntaxKind.ArrayLiteralExpression,
    ts.SyntaxKind.ObjectLiteralExpression,
    ts.SyntaxKind.AsExpression,
    ts.SyntaxKind.TypeOfExpression
]);

// results of these are left to inference
const INFERRED_KINDS = new Set<ts.SyntaxKind>([
    ts.SyntaxKind.CallExpression,
    ts.SyntaxKind.NewExpression,
    ts.SyntaxKind.AwaitExpression
]);

function isMatchable(node: ts.Node): node is ts.Expression {
    return MATCHABLE_KINDS.has(node.kind);
}

function isAssignmentOperator(kind: ts.SyntaxKind): boolean {
    return kind >= ts.SyntaxKind.FirstAssignment && kind <= ts.SyntaxKind.LastAssignment;
}

/** Positions an expression cannot be lifted out of. */
function isExcludedPosition(node: ts.Node): boolean {
    const parent = node.parent;
    if (ts.isIdentifier(node) && isDeclarationName(node)) return true;
    if ((ts.isPropertyAccessExpression(parent) || ts.isPropertyAssignment(parent)) && parent.name === node) return true;
    if (ts.isShorthandPropertyAssignment(parent)) return true;
    if (ts.isBinaryExpression(parent) && parent.left === node && isAssignmentOperator(parent.operatorToken.kind)) return true;
    if ((ts.isPrefixUnaryExpression(parent) || ts.isPostfixUnaryExpression(parent))
        && (parent.operator === ts.SyntaxKind.PlusPlusToken || parent.operator === ts.SyntaxKind.MinusMinusToken)) {
        return true;
    }
    return findAncestor(parent, (candidate): candidate is ts.Node =>
        ts.isTypeNode(candidate) || ts.isImportDeclaration(candidate) || ts.isExportDeclaration(candidate)) !== undefined;
}

function findOccurrences(sourceFile: ts.SourceFile, expression: string): ts.Expression[] {
    const target = tokenize(expression).join(" ");
    const matches: ts.Expression[] = [];
    const visit = (node: ts.Node): void => {
        if (isMatchable(node) && !isExcludedPosition(node) && tokenize(node.getText(sourceFile)).join(" ") === target) {
            matches.push(node);
            return;
        }
        ts.forEachChild(node, visit);
    };
    visit(sourceFile);
    return matches;
}

function isInList(node: ts.Node): node is ts.Statement {
    return node.parent !== undefined && statementsOf(node.parent) !== undefined;
}

interface ReferencedLocal {
    name: string;
    position: number;
    declaration: ts.Declaration;
}

/** Value symbols the expression reads, with where each is declared in this file. */
function referencedLocals(checker: ts.TypeChecker, sourceFile: ts.SourceFile, expression: ts.Expression): ReferencedLocal[] {
    const locals: ReferencedLocal[] = [];
    const walk = (node: ts.Node): void => {
        if (ts.isIdentifier(node) && !(ts.isPropertyAccessExpression(node.parent) && node.parent.name === node)) {
            const symbol = checker.getSymbolAtLocation(node);
            const declaration = symbol?.valueDeclaration ?? symbol?.declarations?.[0];
            if (symbol && declaration && declaration.getSourceFile() === sourceFile) {
                locals.push({ name: symbol.getName(), position: declaration.getStart(sourceFile), declaration });
            }
        }
        ts.forEachChild(node, walk);
    };
    walk(expression);
    return locals;
}

function typeAnnotation(checker: ts.TypeChecker, expression: ts.Expression): string {
    if (INFERRED_KINDS.has(expression.kind)) return "";
    const type = checker.getTypeAtLocation(expression);
    return isUninformativeType(type) ? "" : `: ${widenedTypeText(checker, type, expression)}`;
}

/**
 * Lifts an expression into a named local, a class field or a getter and
 * replaces its occurrences with that name.
 */
export function introduceVariable(request: IntroduceVariableRequest): RefactoringOutcome {
    assertValidIdentifier(request.variableName, "variableName");
    const expressionText = request.expression.trim();
    if (expressionText.length === 0) {
        throw AnalysisError.configuration("expression must not be empty", { parameter: "expression" });
    }
    const scope = request.scope ?? "local";
    const code = request.code;
    const { sourceFile, checker } = compileSingle(code, request.filePath);

    const found = findOccurrences(sourceFile, expressionText);
    if (found.length === 0) {
        throw AnalysisError.notFound("The expression does not occur in the code", { expression: expressionText });
    }
    const first = found[0];
    const candidates = request.replaceAll === false ? [first] : found;
    const unit = detectIndentUnit(code);
    const initializer = first.getText(sourceFile);
    const annotation = typeAnnotation(checker, first);
    const conflicts: string[] = [];
    const edits: TextEdit[] = [];
    let replaced: ts.Expression[];
    let artifact: string;

    if (scope === "local") {
        const anchor = findAncestor(first, isInList);
        if (!anchor) {
            throw AnalysisError.configuration("The expression is not inside a statement", { expression: expressionText });
        }
        const block = anchor.parent;
        const anchorStart = anchor.getStart(sourceFile);
        replaced = candidates.filter(node => node.getStart(sourceFile) >= anchorStart && node.getEnd() <= block.getEnd());

        for (const occurrence of replaced) {
            const start = occurrence.getStart(sourceFile);
            const late = referencedLocals(checker, sourceFile, occurrence)
                .find(local => local.position >= anchorStart && (local.position < start || local.position >= occurrence.getEnd()));
            if (late) {
                throw AnalysisError.configuration(
                    `'${late.name}' is declared after the point where '${request.variableName}' would be declared`,
                    { expression: expressionText, identifier: late.name }
                );
            }
        }
        if (checker.getSymbolsInScope(first, ts.SymbolFlags.Value).some(symbol => symbol.getName() === request.variableName)) {
            conflicts.push(`'${request.variableName}' is already declared in this scope`);
        }

        const indent = indentationAt(code, anchorStart);
        artifact = `${indent}const ${request.variableName}${annotation} = ${initializer};`;
        const position = lineStartOf(code, anchorStart);
        edits.push({ start: position, end: position, newText: `${artifact}\n` });
        for (const occurrence of replaced) {
            edits.push({ start: occurrence.getStart(sourceFile), end: occurrence.getEnd(), newText: request.variableName });
        }
    } else {
        const owner = findAncestor(first, (node): node is ts.ClassLikeDeclaration => ts.isClassDeclaration(node) || ts.isClassExpression(node));
        if (!owner) {
            throw AnalysisError.configuration(`Scope '${scope}' needs the expression to be inside a class`, { expression: expressionText, scope });
        }
        const classStart = owner.getStart(sourceFile);
        replaced = candidates.filter(node => node.getStart(sourceFile) >= classStart && node.getEnd() <= owner.getEnd());

        for (const occurrence of replaced) {
            const local = referencedLocals(checker, sourceFile, occurrence).find(reference => {
                if (reference.position < classStart || reference.position >= owner.getEnd()) return false;
                const enclosing = findAncestor(reference.declaration.parent, isFunctionWithBody);
                return enclosing !== undefined && enclosing.getStart(sourceFile) >= classStart;
            });
            if (local) {
                throw AnalysisError.configuration(
                    `'${local.name}' is local to a member and cannot be used in a class-level ${scope}`,
                    { expression: expressionText, identifier: local.name }
                );
            }
            const member = findAncestor(occurrence, (node): node is ts.ClassElement => ts.isClassElement(node) && node.parent === owner);
            if (member && hasModifier(member, ts.SyntaxKind.StaticKeyword)) {
                conflicts.push(`An occurrence inside static member '${memberName(member) ?? "(anonymous)"}' cannot see an instance ${scope}`);
            }
        }
        if (owner.members.some(member => memberName(member) === request.variableName)) {
            conflicts.push(`'${request.variableName}' already exists in class ${owner.name?.text ?? "(anonymous)"}`);
        }

        if (owner.members.length === 0) {
            throw AnalysisError.configuration(`Scope '${scope}' needs the expression to be inside a class member`, { expression: expressionText, scope });
        }
        const firstMember = owner.members[0];
        const memberStart = firstMember.getStart(sourceFile);
        const indent = indentationAt(code, memberStart);
        artifact = scope === "field"
            ? `${indent}private readonly ${request.variableName}${annotation} = ${initializer};`
            : `${indent}private get ${request.variableName}()${annotation} {\n${indent}${unit}return ${initializer};\n${indent}}`;
        const position = lineStartOf(code, memberStart);
        edits.push({ start: position, end: position, newText: `${artifact}\n\n` });
        for (const occurrence of replaced) {
            edits.push({ start: occurrence.getStart(sourceFile), end: occurrence.getEnd(), newText: `this.${request.variableName}` });
        }
    }

    const referenced = Array.from(new Set(referencedLocals(checker, sourceFile, first).map(local => local.name)));
    return {
        modifiedCode: applyTextEdits(code, edits),
        extractedArtifact: artifact.trim(),
        usedIdentifiers: referenced,
        changeCount: replaced.length + 1,
        conflicts,
        details: {
            scope,
            occurrences: replaced.length,
            skippedOccurrences: candidates.length - replaced.length,
            type: annotation.length > 0 ? annotation.slice(2) : null
        }
    };
}
