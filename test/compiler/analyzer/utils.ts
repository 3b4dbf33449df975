import * as assert from "node:assert";
import {NodeProgram} from "../../../src/compiler_parser/nodes";
import {analyzeProgram, AnalyzedProgram} from "../../../src/compiler_analyzer/analyzeProgram";
import {emptyProphet, ProgramProphet} from "../../../src/compiler_analyzer/analyzerScope";
import {SemanticError, SemanticErrorKind} from "../../../src/compiler_analyzer/analyzerError";

export interface AnalyzerTestCase {
    // Build a fresh tree for each run since the analyzer mutates it.
    program: () => NodeProgram;
    prophet?: ProgramProphet;
}

/**
 * Expect the pass to succeed. The callback receives the annotated result.
 */
export function expectSuccess(title: string, testCase: AnalyzerTestCase, inspect?: (result: AnalyzedProgram) => void) {
    it(`[analyzer] ${title}`, () => {
        const result = analyzeProgram(testCase.program(), testCase.prophet ?? emptyProphet);
        inspect?.(result);
    });
}

/**
 * Expect the pass to fail with the semantic error of the kind about the identifier.
 */
export function expectError(title: string, testCase: AnalyzerTestCase, kind: SemanticErrorKind, identifier: string) {
    it(`[analyzer] ${title}`, () => {
        const program = testCase.program();
        assert.throws(
            () => analyzeProgram(program, testCase.prophet ?? emptyProphet),
            (error: unknown) => {
                assert.ok(error instanceof SemanticError, `Expecting SemanticError but got ${String(error)}`);
                assert.strictEqual(error.kind, kind);
                assert.strictEqual(error.identifier, identifier);
                return true;
            });
    });
}
