export * from "./compiler_parser/nodes";
export * from "./compiler_parser/nodeFactory";
export {dispatchNode} from "./compiler_parser/nodeVisitor";
export type {NodeVisitor} from "./compiler_parser/nodeVisitor";
export {stringifyTypeToken, toArrayIdentifier, isArrayIdentifier} from "./compiler_parser/nodesUtils";
export {TextLocation, TextPosition, TextRange} from "./compiler_tokenizer/textLocation";

export * from "./compiler_analyzer/builtinType";
export * from "./compiler_analyzer/typeValue";
export * from "./compiler_analyzer/symbolObject";
export {SymbolScope, SymbolGlobalScope} from "./compiler_analyzer/symbolScope";
export type {ReadonlySymbolTable} from "./compiler_analyzer/symbolScope";
export {createGlobalScope, emptyProphet} from "./compiler_analyzer/analyzerScope";
export type {ProgramProphet, ProphetVariable} from "./compiler_analyzer/analyzerScope";
export * from "./compiler_analyzer/analyzerError";
export {SemanticAnalyzer} from "./compiler_analyzer/analyzer";
export {analyzeProgram, diagnoseProgram} from "./compiler_analyzer/analyzeProgram";
export type {AnalyzedProgram} from "./compiler_analyzer/analyzeProgram";

export {resetGlobalSettings, getGlobalSettings, copyGlobalSettings} from "./core/settings";
export type {AnalyzerSettings} from "./core/settings";
