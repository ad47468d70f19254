import * as ts from "typescript";
import { AnalysisError } from "../errors/AnalysisError.js";

function isReservedToken(token: ts.SyntaxKind): boolean {
    return (token >= ts.SyntaxKind.FirstReservedWord && token <= ts.SyntaxKind.LastReservedWord)
        || (token >= ts.SyntaxKind.FirstFutureReservedWord && token <= ts.SyntaxKind.LastFutureReservedWord);
}

/**
 * Reserved words (including strict-mode ones) cannot name a declaration.
 * Contextual keywords such as `type` or `async` can.
 */
export function isReservedWord(name: string): boolean {
    const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, name);
    const token = scanner.scan();
    return scanner.getTokenText() === name && isReservedToken(token);
}

function isIdentifierText(name: string): boolean {
    let index = 0;
    while (index < name.length) {
        const codePoint = name.codePointAt(index);
        if (codePoint === undefined) return false;
        const accepted = index === 0
            ? ts.isIdentifierStart(codePoint, ts.ScriptTarget.Latest)
            : ts.isIdentifierPart(codePoint, ts.ScriptTarget.Latest);
        if (!accepted) return false;
        index += codePoint > 0xffff ? 2 : 1;
    }
    return index > 0;
}

export function isValidIdentifier(name: string): boolean {
    return name.length > 0 && isIdentifierText(name) && !isReservedWord(name);
}

/**
 * Throws a ConfigurationError naming `parameter` unless `name` can be used
 * as a new declaration name.
 */
export function assertValidIdentifier(name: string, parameter: string): void {
    if (name.trim().length === 0) {
        throw AnalysisError.configuration(`${parameter} must not be empty`, { parameter });
    }
    if (isReservedWord(name)) {
        throw AnalysisError.configuration(`'${name}' is a reserved word and cannot be used as ${parameter}`, { parameter, value: name });
    }
    if (!isIdentifierText(name)) {
        throw AnalysisError.configuration(`'${name}' is not a valid identifier for ${parameter}`, { parameter, value: name });
    }
}
