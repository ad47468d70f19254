import * as ts from "typescript";
import { collectDeclarations, hasModifier, signatureOf } from "../../compilation/DeclarationCollector.js";
import { forEachIdentifier, isDeclarationName, parseSource } from "../../compilation/SourceParser.js";
import { LineCounter } from "../../engine/LineCounter.js";
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
import { buildStructure, capList, countKind, createNameMatcher, emptyCounts, matchesKind, readSources, sortUsages, visibilityOf } from "./StrategySupport.js";

const CONFIDENCE = TIER_CONFIDENCE.Syntax;

interface ParsedSource {
    filePath: string;
    sourceFile: ts.SourceFile;
    lines: LineCounter;
}

/**
 * Parses each file on its own. Names are matched by spelling; nothing is
 * bound, so same-named symbols in different scopes are not told apart.
 */
export class SyntaxStrategy implements AnalysisStrategy {
    readonly tier = "Syntax" as const;

    readonly handlers: StrategyHandlers = {
        find_symbol: (request, context) => this.findSymbol(request, context),
        find_symbol_usages: (request, context) => this.findUsages(request, context),
        get_class_context: (request, context) => this.getClassContext(request, context),
        analyze_project_structure: (request, context) => this.analyzeStructure(request, context)
    };

    private async parseAll(context: AnalysisContext): Promise<ParsedSource[]> {
        const sources = await readSources(context);
        return sources.map(source => ({
            filePath: source.filePath,
            sourceFile: parseSource(source.filePath, source.content),
            lines: new LineCounter(source.content)
        }));
    }

    private async findSymbol(request: FindSymbolRequest, context: AnalysisContext): Promise<TierOutcome<FindSymbolPayload>> {
        const parsed = await this.parseAll(context);
        if (parsed.length === 0) return insufficient("no readable source files");
        const matches = createNameMatcher(request.symbolName);
        const found = parsed.flatMap(({ filePath, sourceFile }) =>
            collectDeclarations(sourceFile)
                .filter(declaration => matches(declaration.name) && matchesKind(request.symbolType, declaration.kind))
                .map(declaration => ({
                    name: declaration.name,
                    kind: declaration.kind,
                    filePath,
                    line: declaration.line,
                    column: declaration.column,
                    ...(declaration.container ? { container: declaration.container } : {}),
                    exported: declaration.exported,
                    ...(request.optimizeForTokens ? {} : { signature: declaration.signature })
                })));
        const { items, truncated } = capList(found, request.maxResults);
        const payload: FindSymbolPayload = { symbolName: request.symbolName, matches: items, totalMatches: found.length, truncated };
        // nothing declared under that name here; a lower tier may still find a mention
        if (found.length === 0) return partial(payload, CONFIDENCE, `no declaration matches '${request.symbolName}'`);
        return complete(payload, CONFIDENCE);
    }

    private identifierUsages(parsed: ParsedSource[], name: string, skip?: (node: ts.Node) => boolean): UsageLocation[] {
        const usages: UsageLocation[] = [];
        for (const { filePath, sourceFile, lines } of parsed) {
            forEachIdentifier(sourceFile, identifier => {
                if (identifier.text !== name || skip?.(identifier)) return;
                const { line, column } = lines.getPosition(identifier.getStart(sourceFile));
                usages.push({
                    filePath,
                    line,
                    column,
                    lineText: lines.getLineText(line).trim(),
                    isDefinition: isDeclarationName(identifier)
                });
            });
        }
        return sortUsages(usages);
    }

    private async findUsages(request: FindUsagesRequest, context: AnalysisContext): Promise<TierOutcome<FindUsagesPayload>> {
        if (request.symbolName.includes("*")) {
            return insufficient("reference search needs an exact symbol name");
        }
        const parsed = await this.parseAll(context);
        if (parsed.length === 0) return insufficient("no readable source files");
        const usages = this.identifierUsages(parsed, request.symbolName);
        const { items, truncated } = capList(usages, request.maxResults);
        return complete({
            symbolName: request.symbolName,
            usages: items,
            totalUsages: usages.length,
            truncated,
            definitionCount: usages.filter(usage => usage.isDefinition).length
        }, CONFIDENCE);
    }

    private describeMember(member: ts.ClassElement, sourceFile: ts.SourceFile): ClassMemberInfo | undefined {
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
            return { name, kind: "method", ...base, ...(member.type ? { type: member.type.getText(sourceFile) } : {}) };
        }
        if (ts.isPropertyDeclaration(member)) {
            return { name, kind: "property", ...base, ...(member.type ? { type: member.type.getText(sourceFile) } : {}) };
        }
        if (ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
            const typeNode = ts.isGetAccessorDeclaration(member) ? member.type : member.parameters[0]?.type;
            return { name, kind: "accessor", ...base, ...(typeNode ? { type: typeNode.getText(sourceFile) } : {}) };
        }
        return undefined;
    }

    private async getClassContext(request: ClassContextRequest, context: AnalysisContext): Promise<TierOutcome<ClassContextPayload>> {
        const parsed = await this.parseAll(context);
        let located: { source: ParsedSource; node: ts.ClassDeclaration; line: number; exported: boolean } | undefined;
        const derived: string[] = [];

        for (const source of parsed) {
            for (const declaration of collectDeclarations(source.sourceFile)) {
                if (declaration.kind !== "class" || !ts.isClassDeclaration(declaration.node)) continue;
                if (!located && declaration.name === request.className) {
                    located = { source, node: declaration.node, line: declaration.line, exported: declaration.exported };
                }
                const extendsTarget = (declaration.node.heritageClauses ?? []).some(clause =>
                    clause.token === ts.SyntaxKind.ExtendsKeyword
                    && clause.types.some(type => type.expression.getText(source.sourceFile) === request.className));
                if (extendsTarget) derived.push(declaration.name);
            }
        }
        if (!located) {
            return insufficient(`class '${request.className}' not found`);
        }

        const { source, node } = located;
        const sourceFile = source.sourceFile;
        const payload: ClassContextPayload = {
            className: request.className,
            found: true,
            filePath: source.filePath,
            line: located.line,
            isAbstract: hasModifier(node, ts.SyntaxKind.AbstractKeyword),
            exported: located.exported,
            members: node.members.flatMap(member => this.describeMember(member, sourceFile) ?? [])
        };
        for (const clause of node.heritageClauses ?? []) {
            const names = clause.types.map(type => type.getText(sourceFile));
            if (clause.token === ts.SyntaxKind.ExtendsKeyword) {
                payload.baseClass = names[0];
            } else {
                payload.interfaces = names;
            }
        }
        if (request.includeDependencies) {
            const constructor = node.members.find(ts.isConstructorDeclaration);
            payload.dependencies = constructor
                ? constructor.parameters.flatMap(parameter => parameter.type ? [parameter.type.getText(sourceFile)] : [])
                : [];
        }
        if (request.includeUsages) {
            const usages = this.identifierUsages(parsed, request.className, isDeclarationName);
            payload.usages = capList(usages, request.maxResults).items;
        }
        if (request.includeInheritance) {
            payload.derivedClasses = derived;
        }
        return complete(payload, CONFIDENCE);
    }

    private async analyzeStructure(request: ProjectStructureRequest, context: AnalysisContext): Promise<TierOutcome<ProjectStructurePayload>> {
        const parsed = await this.parseAll(context);
        const files = parsed.map(({ filePath, sourceFile }) => {
            const counts = emptyCounts();
            for (const declaration of collectDeclarations(sourceFile)) {
                countKind(counts, declaration.kind);
            }
            return { filePath, counts };
        });
        return complete(buildStructure(context.projectPath, files, request), CONFIDENCE);
    }
}
