import * as lsp from "vscode-languageserver/node";
import {getGlobalSettings} from "../core/settings";
import {TextLocation} from "../compiler_tokenizer/textLocation";
import {SemanticError} from "./analyzerError";

const s_diagnostics: lsp.Diagnostic[] = [];

function beginSession() {
    s_diagnostics.length = 0;
}

function error(location: TextLocation | undefined, message: string, code?: string) {
    const severity = getGlobalSettings().suppressAnalyzerErrors ? lsp.DiagnosticSeverity.Warning : lsp.DiagnosticSeverity.Error;

    s_diagnostics.push({
        severity: severity,
        range: (location ?? TextLocation.createEmpty()).clone(),
        message: message,
        source: getGlobalSettings().diagnosticSource,
        code: code,
    });
}

function semanticError(semanticError: SemanticError) {
    error(semanticError.location, semanticError.message, semanticError.kind);
}

function endSession(): lsp.Diagnostic[] {
    const result = s_diagnostics.slice();
    s_diagnostics.length = 0;
    return result;
}

export const analyzerDiagnostic = {
    beginSession,
    error,
    semanticError,
    endSession,
} as const;
