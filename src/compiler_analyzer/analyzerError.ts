import {TextLocation} from "../compiler_tokenizer/textLocation";

export enum SemanticErrorKind {
    DuplicateDeclaration = 'DuplicateDeclaration',
    UndeclaredVariable = 'UndeclaredVariable',
    UndeclaredFunction = 'UndeclaredFunction',
    ArgumentTypeMismatch = 'ArgumentTypeMismatch',
    ArgumentCountMismatch = 'ArgumentCountMismatch',
}

/**
 * An error in the analyzed program. The first one aborts the pass.
 */
export class SemanticError extends Error {
    public override readonly name = 'SemanticError';

    public constructor(
        public readonly kind: SemanticErrorKind,
        // The name the error is about, e.g., the undeclared variable.
        public readonly identifier: string,
        message: string,
        public readonly location: TextLocation | undefined,
    ) {
        super(message);
    }
}

/**
 * A broken invariant of the parser or of the analyzer itself, e.g., a type token that is not a builtin.
 * It is never reported as a diagnostic of the analyzed program.
 */
export class InternalAnalyzerError extends Error {
    public override readonly name = 'InternalAnalyzerError';

    public constructor(message: string) {
        super(`Internal error: ${message}`);
    }
}

export function errorDuplicateDeclaration(identifier: string, location: TextLocation | undefined): SemanticError {
    return new SemanticError(
        SemanticErrorKind.DuplicateDeclaration,
        identifier,
        `Found duplicate variable declaration for '${identifier}'.`,
        location);
}

export function errorUndeclaredVariable(identifier: string, location: TextLocation | undefined): SemanticError {
    return new SemanticError(
        SemanticErrorKind.UndeclaredVariable,
        identifier,
        `Undeclared variable '${identifier}' found.`,
        location);
}

export function errorUndeclaredFunction(identifier: string, location: TextLocation | undefined): SemanticError {
    return new SemanticError(
        SemanticErrorKind.UndeclaredFunction,
        identifier,
        `Function '${identifier}' is not defined.`,
        location);
}

export function errorArgumentTypeMismatch(
    identifier: string,
    position: number,
    expected: string,
    actual: string,
    location: TextLocation | undefined
): SemanticError {
    return new SemanticError(
        SemanticErrorKind.ArgumentTypeMismatch,
        identifier,
        `Argument ${position + 1} of '${identifier}' expects '${expected}', but got '${actual}'.`,
        location);
}

export function errorArgumentCountMismatch(
    identifier: string,
    expected: number,
    actual: number,
    location: TextLocation | undefined
): SemanticError {
    return new SemanticError(
        SemanticErrorKind.ArgumentCountMismatch,
        identifier,
        `Function '${identifier}' expects ${expected} argument(s), but got ${actual}.`,
        location);
}
