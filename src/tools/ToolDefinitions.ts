import { Tool } from "@modelcontextprotocol/sdk/types.js";
import { MAX_RESULTS_LIMIT } from "../config/ServerConfig.js";

const projectPath = { type: "string", description: "Project directory, descriptor file or source file; relative paths resolve against the server root" };
const maxResults = { type: "integer", minimum: 1, maximum: MAX_RESULTS_LIMIT, description: "Result cap (server default applies when omitted)" };

const sourceProperties = {
    code: { type: "string", description: "Source text to refactor. Either code or filePath is required." },
    filePath: { type: "string", description: "File to read and, unless dryRun is set, write back" },
    dryRun: { type: "boolean", default: false, description: "Return the result without writing filePath" }
};

const RENAME_KINDS = ["auto", "class", "interface", "method", "function", "property", "field", "variable", "parameter", "type", "enum"];

export const TOOLS: Tool[] = [
    {
        name: "validate_build",
        description: "Locates the build target under a path and type-checks it. Reports Success, Warning (no target or checker unavailable) or Failure with summarized errors.",
        inputSchema: {
            type: "object",
            properties: { projectPath },
            required: ["projectPath"]
        }
    },
    {
        name: "find_symbol",
        description: "Finds declarations by name (exact, or with * wildcards) across a project.",
        inputSchema: {
            type: "object",
            properties: {
                projectPath,
                symbolName: { type: "string" },
                symbolType: {
                    type: "string",
                    enum: ["any", "class", "interface", "enum", "type", "function", "variable", "method", "property", "accessor", "constructor"],
                    default: "any"
                },
                maxResults,
                optimizeForTokens: { type: "boolean", default: false, description: "Drop signatures to keep the response small" }
            },
            required: ["projectPath", "symbolName"]
        }
    },
    {
        name: "find_symbol_usages",
        description: "Lists every reference to a symbol with file, line and line text.",
        inputSchema: {
            type: "object",
            properties: { projectPath, symbolName: { type: "string" }, maxResults },
            required: ["projectPath", "symbolName"]
        }
    },
    {
        name: "get_class_context",
        description: "Members, base class, implemented interfaces, constructor dependencies and usages of one class.",
        inputSchema: {
            type: "object",
            properties: {
                projectPath,
                className: { type: "string" },
                includeDependencies: { type: "boolean", default: true },
                includeUsages: { type: "boolean", default: false },
                includeInheritance: { type: "boolean", default: true },
                maxResults
            },
            required: ["projectPath", "className"]
        }
    },
    {
        name: "analyze_project_structure",
        description: "Declaration counts per directory, the directory tree and detected architectural layers.",
        inputSchema: {
            type: "object",
            properties: {
                projectPath,
                includeArchitecture: { type: "boolean", default: true },
                maxDepth: { type: "integer", minimum: 0, maximum: 20, default: 3 }
            },
            required: ["projectPath"]
        }
    },
    {
        name: "analyze_solution",
        description: "Discovers the projects of a workspace, their sibling dependencies and structural issues.",
        inputSchema: {
            type: "object",
            properties: {
                solutionPath: projectPath,
                includeDependencyGraph: { type: "boolean", default: true },
                detectIssues: { type: "boolean", default: true }
            },
            required: ["solutionPath"]
        }
    },
    {
        name: "extract_method",
        description: "Moves whole statements or one expression into a new private method (or function) and calls it in their place.",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                selectedText: { type: "string", description: "Exact text to extract; surrounding whitespace is ignored" },
                methodName: { type: "string" }
            },
            required: ["selectedText", "methodName"]
        }
    },
    {
        name: "rename_symbol",
        description: "Renames a symbol in one file (syntax-based) or across a workspace (checker-confirmed references).",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                oldName: { type: "string" },
                newName: { type: "string" },
                symbolKind: { type: "string", enum: RENAME_KINDS, default: "auto" },
                scope: { type: "string", enum: ["single-file", "workspace"], default: "single-file" },
                projectPath: { ...projectPath, description: "Workspace root for scope 'workspace'" },
                mustExist: { type: "boolean", default: false, description: "Fail with NotFound when nothing is renamed" }
            },
            required: ["oldName", "newName"]
        }
    },
    {
        name: "extract_interface",
        description: "Creates an interface from the public instance members of a class and makes the class implement it.",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                className: { type: "string" },
                interfaceName: { type: "string" },
                memberNames: { type: "array", items: { type: "string" }, description: "Subset of members; all public instance members when omitted" }
            },
            required: ["className", "interfaceName"]
        }
    },
    {
        name: "introduce_variable",
        description: "Names an expression as a local const, a private readonly field or a private getter and replaces its occurrences.",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                expression: { type: "string" },
                variableName: { type: "string" },
                scope: { type: "string", enum: ["local", "field", "property"], default: "local" },
                replaceAll: { type: "boolean", default: true }
            },
            required: ["expression", "variableName"]
        }
    },
    {
        name: "auto_fix",
        description: "Applies mechanical style and modernization rewrites.",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                fixTypes: { type: "array", items: { type: "string", enum: ["style", "modernize", "all"] }, default: ["all"] }
            }
        }
    },
    {
        name: "batch_refactor",
        description: "Runs several refactorings in order over the same code. All or nothing: a failing step returns the original code.",
        inputSchema: {
            type: "object",
            properties: {
                ...sourceProperties,
                operations: {
                    type: "array",
                    minItems: 1,
                    items: {
                        type: "object",
                        properties: {
                            operation: { type: "string", enum: ["auto_fix", "rename_symbol", "extract_method", "extract_interface", "introduce_variable"] }
                        },
                        required: ["operation"]
                    },
                    description: "Each entry carries the arguments of its operation, without code or filePath"
                }
            },
            required: ["operations"]
        }
    }
];
