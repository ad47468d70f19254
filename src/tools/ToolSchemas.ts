import { z } from "zod";
import { AnalysisError } from "../errors/AnalysisError.js";
import { MAX_RESULTS_LIMIT } from "../config/ServerConfig.js";

const nonEmpty = z.string().trim().min(1, "must not be empty");
const maxResults = z.number().int().min(1).max(MAX_RESULTS_LIMIT).optional();

const SYMBOL_TYPES = ["any", "class", "interface", "enum", "type", "function", "variable", "method", "property", "accessor", "constructor"] as const;
const RENAME_KINDS = ["auto", "class", "interface", "method", "function", "property", "field", "variable", "parameter", "type", "enum"] as const;
const FIX_TYPES = ["style", "modernize", "all"] as const;
const VARIABLE_SCOPES = ["local", "field", "property"] as const;

export const ValidateBuildArgs = z.object({
    projectPath: nonEmpty
});

export const FindSymbolArgs = z.object({
    projectPath: nonEmpty,
    symbolName: nonEmpty,
    symbolType: z.enum(SYMBOL_TYPES).default("any"),
    maxResults,
    optimizeForTokens: z.boolean().default(false)
});

export const FindUsagesArgs = z.object({
    projectPath: nonEmpty,
    symbolName: nonEmpty,
    maxResults
});

export const ClassContextArgs = z.object({
    projectPath: nonEmpty,
    className: nonEmpty,
    includeDependencies: z.boolean().default(true),
    includeUsages: z.boolean().default(false),
    includeInheritance: z.boolean().default(true),
    maxResults
});

export const ProjectStructureArgs = z.object({
    projectPath: nonEmpty,
    includeArchitecture: z.boolean().default(true),
    maxDepth: z.number().int().min(0).max(20).default(3)
});

export const AnalyzeSolutionArgs = z.object({
    solutionPath: nonEmpty,
    includeDependencyGraph: z.boolean().default(true),
    detectIssues: z.boolean().default(true)
});

// mutation tools read inline code or a file
const source = {
    code: z.string().optional(),
    filePath: z.string().trim().min(1).optional(),
    dryRun: z.boolean().default(false)
};

const hasSource = (args: { code?: string; filePath?: string }) => args.code !== undefined || args.filePath !== undefined;
const SOURCE_REQUIRED = { message: "either code or filePath is required", path: ["code"] };

export const ExtractMethodArgs = z.object({
    ...source,
    selectedText: nonEmpty,
    methodName: nonEmpty
}).refine(hasSource, SOURCE_REQUIRED);

export const RenameSymbolArgs = z.object({
    ...source,
    oldName: nonEmpty,
    newName: nonEmpty,
    symbolKind: z.enum(RENAME_KINDS).default("auto"),
    scope: z.enum(["single-file", "workspace"]).default("single-file"),
    projectPath: z.string().trim().min(1).optional(),
    mustExist: z.boolean().default(false)
}).refine(args => args.scope === "workspace" ? args.projectPath !== undefined : hasSource(args), {
    message: "single-file renames need code or filePath; workspace renames need projectPath",
    path: ["scope"]
});

export const ExtractInterfaceArgs = z.object({
    ...source,
    className: nonEmpty,
    interfaceName: nonEmpty,
    memberNames: z.array(nonEmpty).optional()
}).refine(hasSource, SOURCE_REQUIRED);

export const IntroduceVariableArgs = z.object({
    ...source,
    expression: nonEmpty,
    variableName: nonEmpty,
    scope: z.enum(VARIABLE_SCOPES).default("local"),
    replaceAll: z.boolean().default(true)
}).refine(hasSource, SOURCE_REQUIRED);

export const AutoFixArgs = z.object({
    ...source,
    fixTypes: z.array(z.enum(FIX_TYPES)).default(["all"])
}).refine(hasSource, SOURCE_REQUIRED);

const BatchOperationArgs = z.discriminatedUnion("operation", [
    z.object({ operation: z.literal("auto_fix"), fixTypes: z.array(z.enum(FIX_TYPES)).optional() }),
    z.object({
        operation: z.literal("rename_symbol"),
        oldName: nonEmpty,
        newName: nonEmpty,
        symbolKind: z.enum(RENAME_KINDS).optional(),
        mustExist: z.boolean().optional()
    }),
    z.object({ operation: z.literal("extract_method"), selectedText: nonEmpty, methodName: nonEmpty }),
    z.object({
        operation: z.literal("extract_interface"),
        className: nonEmpty,
        interfaceName: nonEmpty,
        memberNames: z.array(nonEmpty).optional()
    }),
    z.object({
        operation: z.literal("introduce_variable"),
        expression: nonEmpty,
        variableName: nonEmpty,
        scope: z.enum(VARIABLE_SCOPES).optional(),
        replaceAll: z.boolean().optional()
    })
]);

export const BatchRefactorArgs = z.object({
    ...source,
    operations: z.array(BatchOperationArgs)
}).refine(hasSource, SOURCE_REQUIRED);

/**
 * Validates raw tool arguments. Schema violations become ConfigurationError
 * naming every offending parameter.
 */
export function parseToolArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
    const parsed = schema.safeParse(args ?? {});
    if (parsed.success) {
        return parsed.data;
    }
    const issues = parsed.error.issues.map(issue => ({
        parameter: issue.path.join(".") || "(arguments)",
        message: issue.message
    }));
    throw AnalysisError.configuration(
        `Invalid arguments for ${tool}: ${issues.map(issue => `${issue.parameter} ${issue.message}`).join("; ")}`,
        { tool, issues }
    );
}
