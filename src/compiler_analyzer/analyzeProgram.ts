import * as lsp from "vscode-languageserver/node";
import {NodeProgram} from "../compiler_parser/nodes";
import {SemanticAnalyzer} from "./analyzer";
import {emptyProphet, ProgramProphet} from "./analyzerScope";
import {SymbolGlobalScope, SymbolScope} from "./symbolScope";
import {InternalAnalyzerError, SemanticError} from "./analyzerError";
import {analyzerDiagnostic} from "./analyzerDiagnostic";
import {Profiler} from "../core/profiler";
import {logger} from "../core/logger";

/**
 * The result of a successful pass.
 * The program is the same tree that was given, annotated in place.
 */
export interface AnalyzedProgram {
    readonly program: NodeProgram;
    readonly globalScope: SymbolGlobalScope;
    // May share its label with a function scope in the child table.
    readonly entryScope: SymbolScope;
}

/**
 * Analyze the program and return the annotated tree with its scope tree.
 * Throws `SemanticError` for the first error in the program, and `InternalAnalyzerError` for a malformed tree.
 */
export function analyzeProgram(program: NodeProgram, prophet: ProgramProphet = emptyProphet): AnalyzedProgram {
    const profiler = new Profiler('analyzer');
    const analyzer = new SemanticAnalyzer(prophet);

    try {
        analyzer.analyze(program);
    } catch (e) {
        if (e instanceof SemanticError) {
            logger.message(`analysis failed: ${e.message}`);
        } else {
            logger.error(`analysis aborted: ${e instanceof Error ? e.message : String(e)}`);
        }

        throw e;
    }

    const entryScope = analyzer.entryScope;
    if (entryScope === undefined) throw new InternalAnalyzerError('The program has no entry block.');

    profiler.mark('analyzed program');
    logger.message(`analysis succeeded with ${analyzer.globalScope.childScopeTable.size} top-level scope(s)`);

    return {program, globalScope: analyzer.globalScope, entryScope};
}

/**
 * Analyze the program and report the semantic error, if any, as a diagnostic.
 * Internal errors are not diagnostics of the program and are rethrown.
 */
export function diagnoseProgram(program: NodeProgram, prophet: ProgramProphet = emptyProphet): lsp.Diagnostic[] {
    analyzerDiagnostic.beginSession();

    try {
        analyzeProgram(program, prophet);
    } catch (e) {
        if (!(e instanceof SemanticError)) throw e;
        analyzerDiagnostic.semanticError(e);
    }

    return analyzerDiagnostic.endSession();
}
