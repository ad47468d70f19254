import { SymbolKind } from "../../types.js";
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
    insufficient
} from "../AnalysisTypes.js";
import { LoadedSource, buildStructure, capList, countKind, createNameMatcher, emptyCounts, matchesKind, readSources, sortUsages } from "./StrategySupport.js";

const CONFIDENCE = TIER_CONFIDENCE.Text;

const IDENT = "[A-Za-z_$][\\w$]*";

const TOP_LEVEL_PATTERNS: Array<{ kind: SymbolKind; regex: RegExp }> = [
    { kind: "class", regex: new RegExp(`^\\s*(?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?(?:abstract\\s+)?class\\s+(${IDENT})`) },
    { kind: "interface", regex: new RegExp(`^\\s*(?:export\\s+)?(?:declare\\s+)?interface\\s+(${IDENT})`) },
    { kind: "enum", regex: new RegExp(`^\\s*(?:export\\s+)?(?:declare\\s+)?(?:const\\s+)?enum\\s+(${IDENT})`) },
    { kind: "type", regex: new RegExp(`^\\s*(?:export\\s+)?(?:declare\\s+)?type\\s+(${IDENT})\\s*[=<]`) },
    { kind: "function", regex: new RegExp(`^\\s*(?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?(?:async\\s+)?function\\s*\\*?\\s*(${IDENT})`) },
    { kind: "function", regex: new RegExp(`^\\s*(?:export\\s+)?(?:const|let|var)\\s+(${IDENT})\\s*(?::[^=]+)?=\\s*(?:async\\s+)?(?:function\\b|\\([^)]*\\)\\s*(?::[^=]+)?=>|${IDENT}\\s*=>)`) },
    { kind: "variable", regex: new RegExp(`^\\s*(?:export\\s+)?(?:declare\\s+)?(?:const|let|var)\\s+(${IDENT})`) }
];

const MEMBER_MODIFIERS = "(?:(?:public|private|protected|static|readonly|abstract|override|declare|async)\\s+)*";

const MEMBER_PATTERNS: Array<{ kind: SymbolKind; regex: RegExp }> = [
    { kind: "constructor", regex: new RegExp(`^\\s*${MEMBER_MODIFIERS}(constructor)\\s*\\(`) },
    { kind: "accessor", regex: new RegExp(`^\\s*${MEMBER_MODIFIERS}(?:get|set)\\s+(#?${IDENT})\\s*\\(`) },
    { kind: "method", regex: new RegExp(`^\\s*${MEMBER_MODIFIERS}\\*?(#?${IDENT})\\??\\s*(?:<[^>]*>)?\\s*\\(`) },
    { kind: "property", regex: new RegExp(`^\\s*${MEMBER_MODIFIERS}(#?${IDENT})[?!]?\\s*[:=;]`) }
];

const STATEMENT_KEYWORDS = new Set(["if", "for", "while", "switch", "catch", "return", "function", "do", "else", "try", "with", "await", "yield", "new", "typeof", "delete", "throw"]);

interface TextDeclaration {
    name: string;
    kind: SymbolKind;
    container?: string;
    exported: boolean;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
    signature: string;
    lineText: string;
}

interface OpenContainer {
    name: string;
    bodyDepth: number;
    exported: boolean;
    opened: boolean;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function signatureOfLine(line: string): string {
    return line.trim().replace(/\s*\{\s*$/, "").replace(/\s+/g, " ");
}

/**
 * Blanks out comments and string contents so braces inside them do not
 * disturb nesting. Returns the cleaned line and whether a block comment is
 * still open at its end.
 */
function stripNoise(line: string, inBlockComment: boolean): { code: string; inBlockComment: boolean } {
    let code = "";
    let inComment = inBlockComment;
    let quote: string | undefined;
    for (let i = 0; i < line.length; i++) {
        const char = line[i];
        const next = line[i + 1];
        if (inComment) {
            if (char === "*" && next === "/") {
                inComment = false;
                i++;
            }
            continue;
        }
        if (quote) {
            if (char === "\\") {
                i++;
            } else if (char === quote) {
                quote = undefined;
                code += char;
            }
            continue;
        }
        if (char === "/" && next === "/") break;
        if (char === "/" && next === "*") {
            inComment = true;
            i++;
            continue;
        }
        if (char === "\"" || char === "'" || char === "`") {
            quote = char;
        }
        code += char;
    }
    return { code, inBlockComment: inComment };
}

function countBraces(code: string): number {
    let delta = 0;
    for (const char of code) {
        if (char === "{") delta++;
        else if (char === "}") delta--;
    }
    return delta;
}

/**
 * Line scanner for declarations. Top-level forms are recognised at brace
 * depth zero; members only directly inside a class or interface body.
 */
function scanDeclarations(content: string): TextDeclaration[] {
    const results: TextDeclaration[] = [];
    const containers: OpenContainer[] = [];
    let depth = 0;
    let inBlockComment = false;

    content.split("\n").forEach((rawLine, index) => {
        const lineText = rawLine.replace(/\r$/, "");
        const cleaned = stripNoise(lineText, inBlockComment);
        inBlockComment = cleaned.inBlockComment;
        const code = cleaned.code;
        const current = containers[containers.length - 1];

        const record = (name: string, kind: SymbolKind, exported: boolean, container?: string) => {
            results.push({
                name,
                kind,
                container,
                exported,
                line: index + 1,
                column: lineText.indexOf(name) + 1,
                signature: signatureOfLine(lineText),
                lineText: lineText.trim()
            });
        };

        if (current && current.opened && depth === current.bodyDepth) {
            for (const { kind, regex } of MEMBER_PATTERNS) {
                const match = regex.exec(code);
                const name = match?.[1];
                if (!name || STATEMENT_KEYWORDS.has(name)) continue;
                const hidden = name.startsWith("#") || /\b(?:private|protected)\s/.test(code);
                const duplicateAccessor = kind === "accessor"
                    && results.some(entry => entry.kind === "accessor" && entry.container === current.name && entry.name === name);
                if (!duplicateAccessor) {
                    record(name, kind, current.exported && !hidden, current.name);
                }
                break;
            }
        } else if (depth === 0) {
            for (const { kind, regex } of TOP_LEVEL_PATTERNS) {
                const name = regex.exec(code)?.[1];
                if (!name) continue;
                const exported = /^\s*export\b/.test(code);
                record(name, kind, exported);
                if (kind === "class" || kind === "interface") {
                    containers.length = 0;
                    containers.push({ name, bodyDepth: depth + 1, exported, opened: false });
                }
                break;
            }
        }

        depth = Math.max(0, depth + countBraces(code));
        for (const container of containers) {
            if (depth >= container.bodyDepth) container.opened = true;
        }
        while (containers.length > 0) {
            const top = containers[containers.length - 1];
            if (!top.opened || depth >= top.bodyDepth) break;
            containers.pop();
        }
    });

    return results;
}

interface ScannedSource extends LoadedSource {
    lines: string[];
    declarations: TextDeclaration[];
}

/**
 * Regular-expression fallback. Works on any text, including files that do
 * not parse; results carry the lowest confidence.
 */
export class TextStrategy implements AnalysisStrategy {
    readonly tier = "Text" as const;

    readonly handlers: StrategyHandlers = {
        find_symbol: (request, context) => this.findSymbol(request, context),
        find_symbol_usages: (request, context) => this.findUsages(request, context),
        get_class_context: (request, context) => this.getClassContext(request, context),
        analyze_project_structure: (request, context) => this.analyzeStructure(request, context)
    };

    private async scanAll(context: AnalysisContext): Promise<ScannedSource[]> {
        const sources = await readSources(context);
        return sources.map(source => ({
            ...source,
            lines: source.content.split("\n").map(line => line.replace(/\r$/, "")),
            declarations: scanDeclarations(source.content)
        }));
    }

    private async findSymbol(request: FindSymbolRequest, context: AnalysisContext): Promise<TierOutcome<FindSymbolPayload>> {
        const sources = await this.scanAll(context);
        const matches = createNameMatcher(request.symbolName);
        const found = sources.flatMap(({ filePath, declarations }) =>
            declarations
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
        return complete({ symbolName: request.symbolName, matches: items, totalMatches: found.length, truncated }, CONFIDENCE);
    }

    private wordUsages(sources: ScannedSource[], name: string): UsageLocation[] {
        const word = new RegExp(`(?<![\\w$#])${escapeRegExp(name)}(?![\\w$])`, "g");
        const usages: UsageLocation[] = [];
        for (const { filePath, lines, declarations } of sources) {
            lines.forEach((lineText, index) => {
                const line = index + 1;
                for (const match of lineText.matchAll(word)) {
                    const column = (match.index ?? 0) + 1;
                    usages.push({
                        filePath,
                        line,
                        column,
                        lineText: lineText.trim(),
                        isDefinition: declarations.some(declaration => declaration.name === name && declaration.line === line && declaration.column === column)
                    });
                }
            });
        }
        return sortUsages(usages);
    }

    private async findUsages(request: FindUsagesRequest, context: AnalysisContext): Promise<TierOutcome<FindUsagesPayload>> {
        if (request.symbolName.includes("*")) {
            return insufficient("reference search needs an exact symbol name");
        }
        const sources = await this.scanAll(context);
        const usages = this.wordUsages(sources, request.symbolName);
        const { items, truncated } = capList(usages, request.maxResults);
        return complete({
            symbolName: request.symbolName,
            usages: items,
            totalUsages: usages.length,
            truncated,
            definitionCount: usages.filter(usage => usage.isDefinition).length
        }, CONFIDENCE);
    }

    private async getClassContext(request: ClassContextRequest, context: AnalysisContext): Promise<TierOutcome<ClassContextPayload>> {
        const sources = await this.scanAll(context);
        const extendsTarget = new RegExp(`\\bextends\\s+${escapeRegExp(request.className)}(?![\\w$])`);
        let located: { source: ScannedSource; declaration: TextDeclaration } | undefined;
        const derived: string[] = [];

        for (const source of sources) {
            for (const declaration of source.declarations) {
                if (declaration.kind !== "class") continue;
                if (!located && declaration.name === request.className) {
                    located = { source, declaration };
                }
                if (extendsTarget.test(declaration.lineText)) {
                    derived.push(declaration.name);
                }
            }
        }
        if (!located) {
            return insufficient(`no class declaration named '${request.className}'`);
        }

        const { source, declaration } = located;
        const header = declaration.lineText;
        const members: ClassMemberInfo[] = source.declarations
            .filter(entry => entry.container === request.className && entry.kind !== "class")
            .flatMap((entry): ClassMemberInfo[] => {
                if (entry.kind !== "method" && entry.kind !== "property" && entry.kind !== "accessor" && entry.kind !== "constructor") {
                    return [];
                }
                return [{
                    name: entry.name,
                    kind: entry.kind,
                    visibility: entry.name.startsWith("#") || /\bprivate\s/.test(entry.lineText)
                        ? "private"
                        : /\bprotected\s/.test(entry.lineText) ? "protected" : "public",
                    isStatic: /\bstatic\s/.test(entry.lineText),
                    signature: entry.signature
                }];
            });

        const payload: ClassContextPayload = {
            className: request.className,
            found: true,
            filePath: source.filePath,
            line: declaration.line,
            isAbstract: /\babstract\s+class\b/.test(header),
            exported: declaration.exported,
            members
        };
        const baseClass = new RegExp(`\\bextends\\s+(${IDENT}(?:\\.${IDENT})*(?:<[^>{]*>)?)`).exec(header)?.[1];
        if (baseClass) payload.baseClass = baseClass;
        const implemented = /\bimplements\s+([^{]+)/.exec(header)?.[1];
        if (implemented) {
            payload.interfaces = implemented.split(",").map(name => name.trim()).filter(name => name.length > 0);
        }

        if (request.includeDependencies) {
            const constructorLine = source.declarations.find(entry => entry.container === request.className && entry.kind === "constructor");
            const parameters = constructorLine ? /\(([^)]*)\)?/.exec(constructorLine.lineText)?.[1] ?? "" : "";
            payload.dependencies = parameters
                .split(",")
                .flatMap(parameter => {
                    const type = /:\s*([^=]+)/.exec(parameter)?.[1]?.trim();
                    return type ? [type] : [];
                });
        }
        if (request.includeUsages) {
            const usages = this.wordUsages(sources, request.className).filter(usage => !usage.isDefinition);
            payload.usages = capList(usages, request.maxResults).items;
        }
        if (request.includeInheritance) {
            payload.derivedClasses = derived;
        }
        return complete(payload, CONFIDENCE);
    }

    private async analyzeStructure(request: ProjectStructureRequest, context: AnalysisContext): Promise<TierOutcome<ProjectStructurePayload>> {
        const sources = await this.scanAll(context);
        const files = sources.map(({ filePath, declarations }) => {
            const counts = emptyCounts();
            for (const declaration of declarations) {
                if (!declaration.container) countKind(counts, declaration.kind);
            }
            return { filePath, counts };
        });
        return complete(buildStructure(context.projectPath, files, request), CONFIDENCE);
    }
}
