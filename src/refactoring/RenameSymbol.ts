import * as ts from "typescript";
import { FileRenameResult, RefactoringOutcome, RenameKind, SymbolKind, WorkspaceRenameOutcome } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { CompilationGraph } from "../compilation/CompilationGraph.js";
import { DeclarationInfo, collectDeclarations } from "../compilation/DeclarationCollector.js";
import { forEachIdentifier, isDeclarationName, parseSource } from "../compilation/SourceParser.js";
import { DeltaGenerator } from "../engine/DeltaGenerator.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { assertValidIdentifier } from "./Identifiers.js";
import { INLINE_SOURCE_PATH } from "./RefactoringSupport.js";
import { TextEdit, applyTextEdits } from "./TextEdits.js";

const log = createLogger("RenameSymbol");

export interface RenameRequest {
    oldName: string;
    newName: string;
    symbolKind?: RenameKind;
    mustExist?: boolean;
    /** the file the rename starts from; picks the declaration in a workspace rename */
    filePath?: string;
}

type RenameMode = "member" | "binding" | "all";

const MEMBER_KINDS = new Set<RenameKind>(["method", "property", "field"]);

/** What a declaration of each parent kind counts as for the kind guard. */
const DECLARATION_KIND: Partial<Record<ts.SyntaxKind, RenameKind>> = {
    [ts.SyntaxKind.ClassDeclaration]: "class",
    [ts.SyntaxKind.ClassExpression]: "class",
    [ts.SyntaxKind.InterfaceDeclaration]: "interface",
    [ts.SyntaxKind.TypeAliasDeclaration]: "type",
    [ts.SyntaxKind.EnumDeclaration]: "enum",
    [ts.SyntaxKind.FunctionDeclaration]: "function",
    [ts.SyntaxKind.FunctionExpression]: "function",
    [ts.SyntaxKind.VariableDeclaration]: "variable",
    [ts.SyntaxKind.BindingElement]: "variable",
    [ts.SyntaxKind.Parameter]: "parameter",
    [ts.SyntaxKind.MethodDeclaration]: "method",
    [ts.SyntaxKind.MethodSignature]: "method",
    [ts.SyntaxKind.PropertyDeclaration]: "property",
    [ts.SyntaxKind.PropertySignature]: "property",
    [ts.SyntaxKind.GetAccessor]: "property",
    [ts.SyntaxKind.SetAccessor]: "property",
    [ts.SyntaxKind.EnumMember]: "property"
};

/** Kinds of the symbol table a workspace rename may pick for a requested kind. */
const WORKSPACE_KINDS: Record<Exclude<RenameKind, "auto" | "parameter">, SymbolKind[]> = {
    class: ["class"],
    interface: ["interface"],
    method: ["method"],
    function: ["function"],
    property: ["property", "accessor"],
    field: ["property", "accessor"],
    variable: ["variable"],
    type: ["type"],
    enum: ["enum"]
};

function isMemberPosition(identifier: ts.Identifier): boolean {
    const parent = identifier.parent;
    if ((ts.isPropertyAccessExpression(parent) || ts.isPropertyAssignment(parent)) && parent.name === identifier) {
        return true;
    }
    if (ts.isQualifiedName(parent) && parent.right === identifier) return true;
    if (ts.isBindingElement(parent) && parent.propertyName === identifier) return true;
    if (!isDeclarationName(identifier)) return false;
    const kind = DECLARATION_KIND[parent.kind];
    return kind !== undefined && MEMBER_KINDS.has(kind);
}

/** `{ count }` in an object literal or a destructuring pattern names a property and a binding at once. */
function isShorthand(identifier: ts.Identifier): boolean {
    const parent = identifier.parent;
    return ts.isShorthandPropertyAssignment(parent)
        || (ts.isBindingElement(parent) && parent.propertyName === undefined && parent.name === identifier);
}

/**
 * Range of `key: value` when renaming one side makes it read the same as the
 * other, so it can go back to `{ key }`.
 */
function collapsibleRange(identifier: ts.Identifier, newName: string, sourceFile: ts.SourceFile): { start: number; end: number } | undefined {
    const parent = identifier.parent;
    let key: ts.Node | undefined;
    let value: ts.Node | undefined;
    if (ts.isPropertyAssignment(parent)) {
        key = parent.name;
        value = parent.initializer;
    } else if (ts.isBindingElement(parent)) {
        key = parent.propertyName;
        value = parent.name;
    }
    if (!key || !value || !ts.isIdentifier(key) || !ts.isIdentifier(value)) return undefined;
    const other = key === identifier ? value : value === identifier ? key : undefined;
    if (!other || other.text !== newName) return undefined;
    return { start: key.getStart(sourceFile), end: value.getEnd() };
}

function identifierAt(sourceFile: ts.SourceFile, position: number): ts.Identifier | undefined {
    let found: ts.Identifier | undefined;
    const visit = (node: ts.Node): void => {
        if (found || position < node.getStart(sourceFile) || position >= node.getEnd()) return;
        if (ts.isIdentifier(node)) {
            found = node;
            return;
        }
        ts.forEachChild(node, visit);
    };
    visit(sourceFile);
    return found;
}

function modeFor(kind: RenameKind, declaredKinds: Set<RenameKind>): RenameMode {
    if (kind !== "auto") return MEMBER_KINDS.has(kind) ? "member" : "binding";
    const kinds = Array.from(declaredKinds);
    if (kinds.length > 0 && kinds.every(declared => MEMBER_KINDS.has(declared))) return "member";
    if (kinds.length > 0 && kinds.every(declared => !MEMBER_KINDS.has(declared))) return "binding";
    return "all";
}

function validateNames(request: RenameRequest): void {
    if (request.oldName.trim().length === 0) {
        throw AnalysisError.configuration("oldName must not be empty", { parameter: "oldName" });
    }
    assertValidIdentifier(request.newName, "newName");
}

/**
 * Renames identifiers of one file. Only syntax nodes are touched, never
 * strings or comments; property positions are renamed only when the symbol
 * is a member.
 */
export function renameInFile(code: string, request: RenameRequest): RefactoringOutcome {
    validateNames(request);
    const kind = request.symbolKind ?? "auto";
    const sourceFile = parseSource(request.filePath ?? INLINE_SOURCE_PATH, code);

    const identifiers: ts.Identifier[] = [];
    forEachIdentifier(sourceFile, identifier => {
        if (ts.isIdentifier(identifier)) identifiers.push(identifier);
    });
    const occurrences = identifiers.filter(identifier => identifier.text === request.oldName);
    const newNameDeclared = identifiers.some(identifier => identifier.text === request.newName && isDeclarationName(identifier));
    const declaredKinds = new Set<RenameKind>();
    for (const identifier of occurrences) {
        const declared = isDeclarationName(identifier) ? DECLARATION_KIND[identifier.parent.kind] : undefined;
        if (declared) declaredKinds.add(declared);
    }

    const mode = modeFor(kind, declaredKinds);
    const edits: TextEdit[] = [];
    const lines = new Set<number>();
    for (const identifier of occurrences) {
        const member = isMemberPosition(identifier);
        const shorthand = isShorthand(identifier);
        if (!shorthand && ((mode === "member" && !member) || (mode === "binding" && member))) continue;

        const start = identifier.getStart(sourceFile);
        const collapsed = shorthand ? undefined : collapsibleRange(identifier, request.newName, sourceFile);
        let newText = request.newName;
        if (shorthand && mode === "member") newText = `${request.newName}: ${request.oldName}`;
        if (shorthand && mode === "binding") newText = `${request.oldName}: ${request.newName}`;
        edits.push(collapsed ? { ...collapsed, newText } : { start, end: identifier.getEnd(), newText });
        lines.add(sourceFile.getLineAndCharacterOfPosition(start).line + 1);
    }

    if (edits.length === 0 && request.mustExist) {
        throw AnalysisError.notFound(`Symbol '${request.oldName}' was not found`, { symbolName: request.oldName, symbolKind: kind });
    }

    const conflicts = newNameDeclared && edits.length > 0 ? [`'${request.newName}' is already declared in this file`] : [];
    return {
        modifiedCode: edits.length > 0 ? applyTextEdits(code, edits) : code,
        extractedArtifact: "",
        usedIdentifiers: edits.length > 0 ? [request.oldName, request.newName] : [],
        changeCount: edits.length,
        conflicts,
        details: {
            mode,
            symbolKind: kind,
            declaredAs: Array.from(declaredKinds).sort(),
            lines: Array.from(lines).sort((a, b) => a - b)
        }
    };
}

interface WorkspaceDeclaration extends DeclarationInfo {
    originalPath: string;
    syntheticId: string;
}

/**
 * Renames one declaration and every reference the language service
 * confirms for it, across all units of the graph. Returns new file
 * contents; the graph itself is never modified.
 */
export function renameInWorkspace(graph: CompilationGraph, request: RenameRequest): WorkspaceRenameOutcome {
    validateNames(request);
    const kind = request.symbolKind ?? "auto";
    if (kind === "parameter") {
        throw AnalysisError.configuration("Parameters are local to one file; rename them with scope 'single-file'", { symbolKind: kind });
    }
    const allowed = kind === "auto" ? undefined : WORKSPACE_KINDS[kind];

    const candidates: WorkspaceDeclaration[] = graph.units.flatMap(unit =>
        collectDeclarations(graph.sourceFileOf(unit))
            .filter(declaration => declaration.name === request.oldName && (!allowed || allowed.includes(declaration.kind)))
            .map(declaration => ({ ...declaration, originalPath: unit.originalPath, syntheticId: unit.syntheticId })));

    if (candidates.length === 0) {
        if (request.mustExist) {
            throw AnalysisError.notFound(`Symbol '${request.oldName}' is not declared in the workspace`, { symbolName: request.oldName, symbolKind: kind });
        }
        return { changeCount: 0, conflicts: [], symbolKind: null, declaration: null, files: [] };
    }

    const preferredId = request.filePath ? graph.resolve(request.filePath) : undefined;
    const chosen = candidates.find(candidate => candidate.syntheticId === preferredId) ?? candidates[0];
    const conflicts: string[] = [];

    const checker = graph.checker;
    const symbols = new Set<ts.Symbol>();
    for (const candidate of candidates) {
        const symbol = checker.getSymbolAtLocation(candidate.nameNode);
        if (symbol) symbols.add(symbol);
    }
    if (symbols.size > 1) {
        conflicts.push(
            `${symbols.size} unrelated declarations are named '${request.oldName}'; renamed the one at ${chosen.originalPath}:${chosen.line}`
        );
    }
    if (graph.symbols.some(entry => entry.name === request.newName)) {
        conflicts.push(`'${request.newName}' is already declared in the workspace`);
    }

    const service = graph.languageService;
    const position = chosen.nameNode.getStart();
    const info = service.getRenameInfo(chosen.syntheticId, position, {});
    if (!info.canRename) {
        throw AnalysisError.configuration(`Cannot rename '${request.oldName}': ${info.localizedErrorMessage}`, { symbolName: request.oldName });
    }
    const locations = service.findRenameLocations(chosen.syntheticId, position, false, false, { providePrefixAndSuffixTextForRename: true }) ?? [];

    const editsByFile = new Map<string, TextEdit[]>();
    for (const location of locations) {
        const unit = graph.unitById(location.fileName);
        if (!unit) {
            log.debug("Ignoring rename location outside the graph", { fileName: location.fileName });
            continue;
        }
        const sourceFile = graph.sourceFileOf(unit);
        const identifier = location.prefixText || location.suffixText ? undefined : identifierAt(sourceFile, location.textSpan.start);
        const collapsed = identifier ? collapsibleRange(identifier, request.newName, sourceFile) : undefined;
        const edits = editsByFile.get(location.fileName) ?? [];
        edits.push(collapsed ? { ...collapsed, newText: request.newName } : {
            start: location.textSpan.start,
            end: location.textSpan.start + location.textSpan.length,
            newText: `${location.prefixText ?? ""}${request.newName}${location.suffixText ?? ""}`
        });
        editsByFile.set(location.fileName, edits);
    }

    const files: FileRenameResult[] = [];
    for (const unit of graph.units) {
        const edits = editsByFile.get(unit.syntheticId);
        if (!edits || edits.length === 0) continue;
        const modifiedCode = applyTextEdits(unit.content, edits);
        files.push({
            originalPath: unit.originalPath,
            modifiedCode,
            changeCount: edits.length,
            delta: DeltaGenerator.diff(unit.content, modifiedCode, {
                filePath: unit.originalPath,
                affectedIdentifiers: [request.oldName, request.newName]
            })
        });
    }

    log.info("Workspace rename planned", { oldName: request.oldName, newName: request.newName, files: files.length, locations: locations.length });
    return {
        changeCount: files.reduce((sum, file) => sum + file.changeCount, 0),
        conflicts,
        symbolKind: chosen.kind,
        declaration: { originalPath: chosen.originalPath, line: chosen.line },
        files
    };
}
