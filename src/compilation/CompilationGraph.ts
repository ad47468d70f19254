import * as path from "path";
import * as ts from "typescript";
import { GraphDiagnostic, SkippedPath, SourceUnit, SymbolEntry } from "../types.js";
import { AnalysisError } from "../errors/AnalysisError.js";
import { LineCounter } from "../engine/LineCounter.js";
import { SOURCE_EXTENSIONS } from "../workspace/SourceScanner.js";
import { collectDeclarations } from "./DeclarationCollector.js";
import { GRAPH_ROOT } from "./SyntheticIds.js";

export const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
    moduleResolution: ts.ModuleResolutionKind.Node10,
    lib: ["lib.es2022.d.ts"],
    types: [],
    allowJs: true,
    checkJs: false,
    jsx: ts.JsxEmit.Preserve,
    strict: true,
    noEmit: true,
    skipLibCheck: true,
    esModuleInterop: true,
    experimentalDecorators: true
};

const EXTENSION_KIND: Record<string, ts.Extension> = {
    ".ts": ts.Extension.Ts,
    ".tsx": ts.Extension.Tsx,
    ".mts": ts.Extension.Mts,
    ".cts": ts.Extension.Cts,
    ".js": ts.Extension.Js,
    ".jsx": ts.Extension.Jsx,
    ".mjs": ts.Extension.Mjs,
    ".cjs": ts.Extension.Cjs,
    ".d.ts": ts.Extension.Dts
};

// lib.*.d.ts never change while the process runs
const libSnapshots = new Map<string, ts.IScriptSnapshot>();

function readLibSnapshot(fileName: string): ts.IScriptSnapshot | undefined {
    const cached = libSnapshots.get(fileName);
    if (cached) return cached;
    const text = ts.sys.readFile(fileName);
    if (text === undefined) return undefined;
    const snapshot = ts.ScriptSnapshot.fromString(text);
    libSnapshots.set(fileName, snapshot);
    return snapshot;
}

export interface OriginalLocation {
    originalPath: string;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
    lineText: string;
}

export interface CompilationGraphInit {
    units: SourceUnit[];
    skipped?: SkippedPath[];
    diagnostics?: GraphDiagnostic[];
    compilerOptions?: ts.CompilerOptions;
}

/**
 * A set of source units compiled as one program. Units live under flat
 * synthetic ids so same-named files can coexist; every lookup by original
 * path goes through `resolve` first. Relative imports are resolved against
 * the importing file's original location.
 */
export class CompilationGraph {
    private readonly unitList: readonly SourceUnit[];
    private readonly byOriginal = new Map<string, SourceUnit>();
    private readonly bySynthetic = new Map<string, SourceUnit>();
    private readonly lineCounters = new Map<string, LineCounter>();
    private readonly options: ts.CompilerOptions;
    private service?: ts.LanguageService;
    private cachedProgram?: ts.Program;
    private symbolTable?: SymbolEntry[];

    readonly skipped: readonly SkippedPath[];
    readonly diagnostics: readonly GraphDiagnostic[];

    constructor(init: CompilationGraphInit) {
        for (const unit of init.units) {
            if (this.bySynthetic.has(unit.syntheticId)) {
                throw new AnalysisError("InternalError", `Synthetic id assigned twice: ${unit.syntheticId}`);
            }
            this.byOriginal.set(path.resolve(unit.originalPath), unit);
            this.bySynthetic.set(unit.syntheticId, unit);
        }
        this.unitList = Object.freeze([...init.units]);
        this.skipped = Object.freeze([...(init.skipped ?? [])]);
        this.diagnostics = Object.freeze([...(init.diagnostics ?? [])]);
        this.options = { ...DEFAULT_COMPILER_OPTIONS, ...(init.compilerOptions ?? {}) };
    }

    get units(): readonly SourceUnit[] {
        return this.unitList;
    }

    get size(): number {
        return this.unitList.length;
    }

    resolve(originalPath: string): string | undefined {
        return this.byOriginal.get(path.resolve(originalPath))?.syntheticId;
    }

    originalPathOf(syntheticId: string): string | undefined {
        return this.bySynthetic.get(syntheticId)?.originalPath;
    }

    unitFor(originalPath: string): SourceUnit | undefined {
        return this.byOriginal.get(path.resolve(originalPath));
    }

    unitById(syntheticId: string): SourceUnit | undefined {
        return this.bySynthetic.get(syntheticId);
    }

    get languageService(): ts.LanguageService {
        if (!this.service) {
            this.service = ts.createLanguageService(this.createHost(), ts.createDocumentRegistry(true, GRAPH_ROOT));
        }
        return this.service;
    }

    get program(): ts.Program {
        if (!this.cachedProgram) {
            const program = this.languageService.getProgram();
            if (!program) {
                throw new AnalysisError("InternalError", "Language service did not produce a program");
            }
            this.cachedProgram = program;
        }
        return this.cachedProgram;
    }

    get checker(): ts.TypeChecker {
        return this.program.getTypeChecker();
    }

    getSourceFile(originalPath: string): ts.SourceFile | undefined {
        const syntheticId = this.resolve(originalPath);
        return syntheticId ? this.program.getSourceFile(syntheticId) : undefined;
    }

    sourceFileOf(unit: SourceUnit): ts.SourceFile {
        const sourceFile = this.program.getSourceFile(unit.syntheticId);
        if (!sourceFile) {
            throw new AnalysisError("InternalError", `No source file for ${unit.originalPath}`);
        }
        return sourceFile;
    }

    /**
     * Top-level declarations and class/interface members of every unit.
     */
    get symbols(): readonly SymbolEntry[] {
        if (!this.symbolTable) {
            const table: SymbolEntry[] = [];
            for (const unit of this.unitList) {
                for (const declaration of collectDeclarations(this.sourceFileOf(unit))) {
                    table.push({
                        name: declaration.name,
                        kind: declaration.kind,
                        container: declaration.container,
                        originalPath: unit.originalPath,
                        syntheticId: unit.syntheticId,
                        line: declaration.line,
                        column: declaration.column,
                        exported: declaration.exported,
                        signature: declaration.signature
                    });
                }
            }
            this.symbolTable = table;
        }
        return this.symbolTable;
    }

    /**
     * Maps a position in a synthetic file back to the caller-visible file.
     */
    toOriginalLocation(syntheticId: string, position: number): OriginalLocation | undefined {
        const unit = this.bySynthetic.get(syntheticId);
        if (!unit) return undefined;
        let counter = this.lineCounters.get(syntheticId);
        if (!counter) {
            counter = new LineCounter(unit.content);
            this.lineCounters.set(syntheticId, counter);
        }
        const { line, column } = counter.getPosition(position);
        return { originalPath: unit.originalPath, line, column, lineText: counter.getLineText(line).trim() };
    }

    /**
     * Resolves a relative specifier the way a bundler would, then returns the
     * synthetic id of the unit it lands on.
     */
    resolveModule(specifier: string, containingSyntheticId: string): ts.ResolvedModuleFull | undefined {
        if (!specifier.startsWith(".")) return undefined;
        const containing = this.bySynthetic.get(containingSyntheticId);
        if (!containing) return undefined;

        const base = path.resolve(path.dirname(path.resolve(containing.originalPath)), specifier);
        const stripped = base.replace(/\.[mc]?jsx?$/, "");
        const candidates = [
            base,
            ...SOURCE_EXTENSIONS.map(ext => stripped + ext),
            ...SOURCE_EXTENSIONS.map(ext => path.join(base, "index" + ext))
        ];
        for (const candidate of candidates) {
            const unit = this.byOriginal.get(candidate);
            if (unit) {
                const ext = /\.d\.ts$/.test(unit.syntheticId) ? ".d.ts" : path.extname(unit.syntheticId);
                return {
                    resolvedFileName: unit.syntheticId,
                    extension: EXTENSION_KIND[ext] ?? ts.Extension.Ts,
                    isExternalLibraryImport: false
                };
            }
        }
        return undefined;
    }

    private createHost(): ts.LanguageServiceHost {
        const options = this.options;
        const libLocation = path.dirname(ts.getDefaultLibFilePath(options));
        return {
            getCompilationSettings: () => options,
            getScriptFileNames: () => this.unitList.map(unit => unit.syntheticId),
            getScriptVersion: () => "1",
            getScriptSnapshot: fileName => {
                const unit = this.bySynthetic.get(fileName);
                if (unit) return ts.ScriptSnapshot.fromString(unit.content);
                return fileName.startsWith(libLocation) ? readLibSnapshot(fileName) : undefined;
            },
            getCurrentDirectory: () => GRAPH_ROOT,
            getDefaultLibFileName: opts => ts.getDefaultLibFilePath(opts),
            fileExists: fileName => this.bySynthetic.has(fileName) || (fileName.startsWith(libLocation) && ts.sys.fileExists(fileName)),
            readFile: fileName => this.bySynthetic.get(fileName)?.content
                ?? (fileName.startsWith(libLocation) ? ts.sys.readFile(fileName) : undefined),
            directoryExists: dir => dir === GRAPH_ROOT || dir.startsWith(libLocation),
            getDirectories: () => [],
            useCaseSensitiveFileNames: () => true,
            resolveModuleNames: (moduleNames, containingFile) =>
                moduleNames.map(name => this.resolveModule(name, containingFile))
        };
    }
}
