import * as ts from "typescript";
import { RefactoringOutcome } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { hasModifier } from "../compilation/DeclarationCollector.js";
import { assertValidIdentifier } from "./Identifiers.js";
import { TextEdit, applyTextEdits } from "./TextEdits.js";
import {
    compileSingle,
    detectIndentUnit,
    findClass,
    indentationAt,
    isUninformativeType,
    lineStartOf,
    memberName,
    widenedTypeText
} from "./RefactoringSupport.js";

export interface ExtractInterfaceRequest {
    code: string;
    className: string;
    interfaceName: string;
    memberNames?: string[];
    filePath?: string;
}

interface InterfaceMember {
    name: string;
    lines: string[];
}

function isPublicInstanceMember(member: ts.ClassElement): boolean {
    if (member.name && ts.isPrivateIdentifier(member.name)) return false;
    return !hasModifier(member, ts.SyntaxKind.StaticKeyword)
        && !hasModifier(member, ts.SyntaxKind.PrivateKeyword)
        && !hasModifier(member, ts.SyntaxKind.ProtectedKeyword);
}

/**
 * Builds interface member lines from the public instance surface of a
 * class. Overload signatures are kept and their implementation dropped;
 * a getter without a setter becomes `readonly`.
 */
class MemberCollector {
    private readonly members = new Map<string, InterfaceMember>();

    constructor(
        private readonly checker: ts.TypeChecker,
        private readonly sourceFile: ts.SourceFile
    ) {}

    collect(node: ts.ClassDeclaration): InterfaceMember[] {
        const overloaded = new Set<string>();
        for (const member of node.members) {
            const name = memberName(member);
            if (name && ts.isMethodDeclaration(member) && !member.body) overloaded.add(name);
        }

        for (const member of node.members) {
            const name = memberName(member);
            if (!name || !isPublicInstanceMember(member)) continue;
            if (ts.isMethodDeclaration(member)) {
                if (member.body && overloaded.has(name)) continue;
                this.add(name, this.methodLine(member));
            } else if (ts.isPropertyDeclaration(member)) {
                this.add(name, this.propertyLine(member));
            } else if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
                this.members.set(name, { name, lines: [this.accessorLine(node, name)] });
            }
        }
        return Array.from(this.members.values());
    }

    private add(name: string, line: string): void {
        const existing = this.members.get(name);
        if (existing) {
            existing.lines.push(line);
        } else {
            this.members.set(name, { name, lines: [line] });
        }
    }

    private nameText(member: ts.ClassElement): string {
        return member.name ? member.name.getText(this.sourceFile) : "";
    }

    private typeText(typeNode: ts.TypeNode | undefined, node: ts.Node): string {
        if (typeNode) return typeNode.getText(this.sourceFile);
        const type = this.checker.getTypeAtLocation(node);
        return isUninformativeType(type) ? "any" : widenedTypeText(this.checker, type, node);
    }

    private parameterText(parameter: ts.ParameterDeclaration): string {
        const rest = parameter.dotDotDotToken ? "..." : "";
        const optional = parameter.questionToken || parameter.initializer ? "?" : "";
        return `${rest}${parameter.name.getText(this.sourceFile)}${optional}: ${this.typeText(parameter.type, parameter)}`;
    }

    private methodLine(member: ts.MethodDeclaration): string {
        const typeParameters = member.typeParameters
            ? `<${member.typeParameters.map(parameter => parameter.getText(this.sourceFile)).join(", ")}>`
            : "";
        const parameters = member.parameters.map(parameter => this.parameterText(parameter)).join(", ");
        let returnType = member.type?.getText(this.sourceFile);
        if (!returnType) {
            const signature = this.checker.getSignatureFromDeclaration(member);
            returnType = signature ? this.checker.typeToString(this.checker.getReturnTypeOfSignature(signature), member, ts.TypeFormatFlags.NoTruncation) : "void";
        }
        const optional = member.questionToken ? "?" : "";
        return `${this.nameText(member)}${optional}${typeParameters}(${parameters}): ${returnType};`;
    }

    private propertyLine(member: ts.PropertyDeclaration): string {
        const readonly = hasModifier(member, ts.SyntaxKind.ReadonlyKeyword) ? "readonly " : "";
        const optional = member.questionToken ? "?" : "";
        return `${readonly}${this.nameText(member)}${optional}: ${this.typeText(member.type, member)};`;
    }

    private accessorLine(node: ts.ClassDeclaration, name: string): string {
        const accessors = node.members.filter(member =>
            (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) && memberName(member) === name);
        const getter = accessors.find(ts.isGetAccessorDeclaration);
        const setter = accessors.find(ts.isSetAccessorDeclaration);
        const readonly = getter && !setter ? "readonly " : "";
        let type: string;
        if (getter) {
            type = this.typeText(getter.type, getter.name);
        } else {
            const parameter = setter?.parameters[0];
            type = parameter ? this.typeText(parameter.type, parameter) : "any";
        }
        const first = getter ?? setter;
        return `${readonly}${first ? this.nameText(first) : name}: ${type};`;
    }
}

/**
 * Where the interface goes: the start of the line the class (or the
 * comment documenting it) begins on.
 */
function insertionPoint(code: string, node: ts.ClassDeclaration, sourceFile: ts.SourceFile): number {
    const comments = ts.getLeadingCommentRanges(code, node.getFullStart()) ?? [];
    const start = comments.length > 0 ? comments[0].pos : node.getStart(sourceFile);
    return lineStartOf(code, start);
}

function implementsEdit(code: string, node: ts.ClassDeclaration, interfaceName: string): TextEdit | undefined {
    const clauses = node.heritageClauses ?? [];
    const implementsClause = clauses.find(clause => clause.token === ts.SyntaxKind.ImplementsKeyword);
    if (implementsClause) {
        if (implementsClause.types.some(type => type.getText(node.getSourceFile()) === interfaceName)) return undefined;
        const end = implementsClause.types.end;
        return { start: end, end, newText: `, ${interfaceName}` };
    }
    const extendsClause = clauses.find(clause => clause.token === ts.SyntaxKind.ExtendsKeyword);
    let position: number;
    if (extendsClause) {
        position = extendsClause.getEnd();
    } else if (node.typeParameters) {
        position = code.indexOf(">", node.typeParameters.end) + 1;
    } else if (node.name) {
        position = node.name.getEnd();
    } else {
        return undefined;
    }
    return { start: position, end: position, newText: ` implements ${interfaceName}` };
}

export function extractInterface(request: ExtractInterfaceRequest): RefactoringOutcome {
    assertValidIdentifier(request.interfaceName, "interfaceName");
    const { sourceFile, checker } = compileSingle(request.code, request.filePath);
    const code = request.code;
    const node = findClass(sourceFile, request.className);
    if (!node) {
        throw AnalysisError.notFound(`Class '${request.className}' was not found`, { className: request.className });
    }

    const available = new MemberCollector(checker, sourceFile).collect(node);
    const conflicts: string[] = [];
    let selected = available;
    if (request.memberNames && request.memberNames.length > 0) {
        const requested = new Set(request.memberNames);
        selected = available.filter(member => requested.has(member.name));
        for (const name of request.memberNames) {
            if (!available.some(member => member.name === name)) {
                conflicts.push(`'${name}' is not a public instance member of ${request.className}`);
            }
        }
    }
    if (selected.length === 0) {
        throw AnalysisError.notFound(
            `Class '${request.className}' has no public instance members to extract`,
            { className: request.className, requested: request.memberNames ?? [] }
        );
    }

    const alreadyDeclared = sourceFile.statements.some(statement =>
        (ts.isInterfaceDeclaration(statement) || ts.isTypeAliasDeclaration(statement) || ts.isClassDeclaration(statement))
        && statement.name?.text === request.interfaceName);
    if (alreadyDeclared) {
        conflicts.push(`'${request.interfaceName}' is already declared in this file`);
    }

    const indent = indentationAt(code, node.getStart(sourceFile));
    const unit = detectIndentUnit(code);
    const exported = hasModifier(node, ts.SyntaxKind.ExportKeyword) ? "export " : "";
    const typeParameters = node.typeParameters
        ? `<${node.typeParameters.map(parameter => parameter.getText(sourceFile)).join(", ")}>`
        : "";
    const body = selected.flatMap(member => member.lines).map(line => `${indent}${unit}${line}`).join("\n");
    const artifact = `${indent}${exported}interface ${request.interfaceName}${typeParameters} {\n${body}\n${indent}}`;

    const insertAt = insertionPoint(code, node, sourceFile);
    const edits: TextEdit[] = [{ start: insertAt, end: insertAt, newText: `${artifact}\n\n` }];
    const typeArguments = node.typeParameters ? `<${node.typeParameters.map(parameter => parameter.name.text).join(", ")}>` : "";
    const heritage = implementsEdit(code, node, `${request.interfaceName}${typeArguments}`);
    if (heritage) edits.push(heritage);

    return {
        modifiedCode: applyTextEdits(code, edits),
        extractedArtifact: artifact.trim(),
        usedIdentifiers: selected.map(member => member.name),
        changeCount: edits.length,
        conflicts,
        details: {
            interfaceName: request.interfaceName,
            members: selected.map(member => member.name),
            exported: exported.length > 0
        }
    };
}
