import * as ts from "typescript";
import { CompilationGraph } from "../../compilation/CompilationGraph.js";
import { DeclarationInfo, collectDeclarations, hasModifier, signatureOf } from "../../compilation/DeclarationCollector.js";
import {
    AnalysisContext,
    AnalysisStrategy,
    ClassContextPayload,
    ClassContextRequest,
    ClassMemberInfo,
    FindSymbolPayload,
    FindSymbolRequest,
    FindUsagesPayload,
    FindUsagesRequest,
    ProjectStructurePayload,
    ProjectStructureRequest,
    StrategyHandlers,
    TIER_CONFIDENCE,
    TierOutcome,
    UsageLocation,
    complete,
    insufficient,
    partial
} from "../AnalysisTypes.js";
import { FileCounts, buildStructure, capList, countKind, createNameMatcher, emptyCounts, matchesKind, sortUsages, visibilityOf } from "./StrategySupport.js";

const CONFIDENCE = TIER_CONFIDENCE.Semantic;

interface LocatedDeclaration extends DeclarationInfo {
    originalPath: string;
    syntheticId: string;
}

function resolveAlias(checker: ts.TypeChecker, symbol: ts.Symbol | undefined): ts.Symbol | undefined {
    if (symbol && (symbol.flags & ts.SymbolFlags.Alias) !== 0) {
        return checker.getAliasedSymbol(symbol);
    }
    return symbol;
}

/**
 * Answers from the type checker and language service of the compiled graph.
 */
export class SemanticStrategy implements AnalysisStrategy {
    readonly tier = "Semantic" as const;

    readonly handlers: StrategyHandlers = {
        find_symbol: (request, context) => this.findSymbol(request, context),
        find_symbol_usages: (request, context) => this.findUsages(request, context),
        get_class_context: (request, context) => this.getClassContext(request, context),
        analyze_project_structure: (request, context) => this.analyzeStructure(request, context)
    };

    private async loadGraph(context: AnalysisContext): Promise<CompilationGraph | undefined> {
        const graph = await context.graph();
        return graph.size > 0 ? graph : undefined;
    }

    private declarations(graph: CompilationGraph): LocatedDeclaration[] {
        return graph.units.flatMap(unit =>
            collectDeclarations(graph.sourceFileOf(unit)).map(declaration => ({
                ...declaration,
                originalPath: unit.originalPath,
                syntheticId: unit.syntheticId
            })));
    }

    private describeType(checker: ts.TypeChecker, declaration: DeclarationInfo): string | undefined {
        const node = declaration.node;
        if (ts.isClassLike(node) || ts.isInterfaceDeclaration(node) || ts.isEnumDeclaration(node) || ts.isTypeAliasDeclaration(node)) {
            return undefined;
        }
        if (ts.isFunctionLike(node)) {
            const signature = checker.getSignatureFromDeclaration(node);
            return signature ? checker.signatureToString(signature) : undefined;
        }
        return checker.typeToString(checker.getTypeAtLocation(declaration.nameNode));
    }

    private async findSymbol(request: FindSymbolRequest, context: AnalysisContext): Promise<TierOutcome<FindSymbolPayload>> {
        const graph = await this.loadGraph(context);
        if (!graph) return insufficient("no compilable source files");
        const checker = graph.checker;
        const matches = createNameMatcher(request.symbolName);

        const found = this.declarations(graph)
            .filter(declaration => matches(declaration.name) && matchesKind(request.symbolType, declaration.kind))
            .map(declaration => ({
                name: declaration.name,
                kind: declaration.kind,
                filePath: declaration.originalPath,
                line: declaration.line,
                column: declaration.column,
                ...(declaration.container ? { container: declaration.container } : {}),
                exported: declaration.exported,
                ...(request.optimizeForTokens ? {} : {
                    signature: declaration.signature,
                    type: this.describeType(checker, declaration)
                })
            }));
        const { items, truncated } = capList(found, request.maxResults);
        const payload: FindSymbolPayload = { symbolName: request.symbolName, matches: items, totalMatches: found.length, truncated };
        // nothing declared under that name here; a lower tier may still find a mention
        if (found.length === 0) return partial(payload, CONFIDENCE, `no declaration matches '${request.symbolName}'`);
        return complete(payload, CONFIDENCE);
    }

    private referencesOf(graph: CompilationGraph, declaration: LocatedDeclaration): UsageLocation[] {
        const referenced = graph.languageService.findReferences(declaration.syntheticId, declaration.nameNode.getStart()) ?? [];
        const usages: UsageLocation[] = [];
        for (const symbol of referenced) {
            for (const reference of symbol.references) {
                const location = graph.toOriginalLocation(reference.fileName, reference.textSpan.start);
                if (!location) continue;
                usages.push({
                    filePath: location.originalPath,
                    line: location.line,
                    column: location.column,
                    lineText: location.lineText,
                    isDefinition: reference.isDefinition === true
                });
            }
        }
        return usages;
    }

    private async findUsages(request: FindUsagesRequest, context: AnalysisContext): Promise<TierOutcome<FindUsagesPayload>> {
        if (request.symbolName.includes("*")) {
            return insufficient("reference search needs an exact symbol name");
        }
        const graph = await this.loadGraph(context);
        if (!graph) return insufficient("no compilable source files");
        const checker = graph.checker;

        const seenSymbols = new Set<ts.Symbol>();
        const seenLocations = new Set<string>();
        const usages: UsageLocation[] = [];
        const declarations = this.declarations(graph).filter(declaration => declaration.name === request.symbolName);
        if (declarations.length === 0) {
            return insufficient(`'${request.symbolName}' is not declared in the compiled sources`);
        }

        for (const declaration of declarations) {
            const symbol = resolveAlias(checker, checker.getSymbolAtLocation(declaration.nameNode));
            if (symbol) {
                if (seenSymbols.has(symbol)) continue;
                seenSymbols.add(symbol);
            }
            for (const usage of this.referencesOf(graph, declaration)) {
                const key = `${usage.filePath}:${usage.line}:${usage.column}`;
                if (seenLocations.has(key)) continue;
                seenLocations.add(key);
                usages.push(usage);
            }
        }

        const sorted = sortUsages(usages);
        const { items, truncated } = capList(sorted, request.maxResults);
        return complete({
            symbolName: request.symbolName,
            usages: items,
            totalUsages: sorted.length,
            truncated,
            definitionCount: sorted.filter(usage => usage.isDefinition).length
        }, CONFIDENCE);
    }

    private describeMember(checker: ts.TypeChecker, member: ts.ClassElement, sourceFile: ts.SourceFile): ClassMemberInfo | undefined {
        const base = {
            visibility: visibilityOf(member),
            isStatic: hasModifier(member, ts.SyntaxKind.StaticKeyword),
            signature: signatureOf(member, sourceFile)
        };
        if (ts.isConstructorDeclaration(member)) {
            return { name: "constructor", kind: "constructor", ...base };
        }
        const name = member.name && (ts.isIdentifier(member.name) || ts.isPrivateIdentifier(member.name) || ts.isStringLiteral(member.name))
            ? member.name.text
            : undefined;
        if (!name) return undefined;
        if (ts.isMethodDeclaration(member)) {
            const signature = checker.getSignatureFromDeclaration(member);
            return { name, kind: "method", ...base, ...(signature ? { type: checker.signatureToString(signature) } : {}) };
        }
        if (ts.isPropertyDeclaration(member) || ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
            return {
                name,
                kind: ts.isPropertyDeclaration(member) ? "property" : "accessor",
                ...base,
                type: checker.typeToString(checker.getTypeAtLocation(member))
            };
        }
        return undefined;
    }

    private async getClassContext(request: ClassContextRequest, context: AnalysisContext): Promise<TierOutcome<ClassContextPayload>> {
        const graph = await this.loadGraph(context);
        if (!graph) return insufficient("no compilable source files");
        const checker = graph.checker;
        const classes = this.declarations(graph).filter(declaration => declaration.kind === "class");
        const target = classes.find(declaration => declaration.name === request.className);
        if (!target || !ts.isClassDeclaration(target.node)) {
            return insufficient(`class '${request.className}' not found in the compiled sources`);
        }
        const node = target.node;
        const sourceFile = node.getSourceFile();
        const payload: ClassContextPayload = {
            className: request.className,
            found: true,
            filePath: target.originalPath,
            line: target.line,
            isAbstract: hasModifier(node, ts.SyntaxKind.AbstractKeyword),
            exported: target.exported,
            members: node.members.flatMap(member => this.describeMember(checker, member, sourceFile) ?? [])
        };

        let unresolvedBase: string | undefined;
        for (const clause of node.heritageClauses ?? []) {
            if (clause.token === ts.SyntaxKind.ExtendsKeyword) {
                const expression = clause.types[0]?.expression;
                if (expression) {
                    if (resolveAlias(checker, checker.getSymbolAtLocation(expression))) {
                        payload.baseClass = expression.getText(sourceFile);
                    } else {
                        unresolvedBase = expression.getText(sourceFile);
                    }
                }
            } else {
                payload.interfaces = clause.types.map(type => type.getText(sourceFile));
            }
        }

        if (request.includeDependencies) {
            const constructor = node.members.find(ts.isConstructorDeclaration);
            payload.dependencies = constructor
                ? constructor.parameters.map(parameter => parameter.type
                    ? parameter.type.getText(sourceFile)
                    : checker.typeToString(checker.getTypeAtLocation(parameter)))
                : [];
        }

        if (request.includeUsages) {
            const usages = sortUsages(this.referencesOf(graph, target).filter(usage => !usage.isDefinition));
            payload.usages = capList(usages, request.maxResults).items;
        }

        if (request.includeInheritance) {
            const targetSymbol = resolveAlias(checker, checker.getSymbolAtLocation(target.nameNode));
            payload.derivedClasses = classes
                .filter(candidate => candidate !== target && ts.isClassDeclaration(candidate.node))
                .filter(candidate => {
                    const heritage = ts.isClassDeclaration(candidate.node) ? candidate.node.heritageClauses ?? [] : [];
                    return heritage.some(clause => clause.token === ts.SyntaxKind.ExtendsKeyword
                        && clause.types.some(type => resolveAlias(checker, checker.getSymbolAtLocation(type.expression)) === targetSymbol));
                })
                .map(candidate => candidate.name);
        }

        if (unresolvedBase) {
            return partial(payload, CONFIDENCE, `base class '${unresolvedBase}' could not be resolved`);
        }
        return complete(payload, CONFIDENCE);
    }

    private async analyzeStructure(request: ProjectStructureRequest, context: AnalysisContext): Promise<TierOutcome<ProjectStructurePayload>> {
        const graph = await this.loadGraph(context);
        if (!graph) return insufficient("no compilable source files");
        let exportedSymbols = 0;
        const files: FileCounts[] = graph.units.map(unit => {
            const counts = emptyCounts();
            for (const declaration of collectDeclarations(graph.sourceFileOf(unit))) {
                countKind(counts, declaration.kind);
                if (declaration.exported && !declaration.container) exportedSymbols++;
            }
            return { filePath: unit.originalPath, counts };
        });
        return complete({ ...buildStructure(context.projectPath, files, request), exportedSymbols }, CONFIDENCE);
    }
}
