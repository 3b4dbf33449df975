/**
 * Analyzer settings.
 * The host (compiler driver or editor integration) passes its configuration through `resetGlobalSettings`.
 */
export interface AnalyzerSettings {
    // Report semantic errors as warnings instead of errors.
    suppressAnalyzerErrors: boolean;
    // Label of the scope created for the program entry block.
    entryScopeName: string;
    // The `source` of the published diagnostics.
    diagnosticSource: string;
    trace: {
        server: 'off' | 'messages' | 'verbose';
    };
}

const defaultSettings: AnalyzerSettings = {
    suppressAnalyzerErrors: false,
    entryScopeName: 'entry',
    diagnosticSource: 'Ola - Analyzer',
    trace: {
        server: 'off'
    }
};

let globalSettings: AnalyzerSettings = defaultSettings;

/**
 * Reset the instance of global settings.
 * Missing fields fall back to the defaults.
 */
export function resetGlobalSettings(config: Partial<AnalyzerSettings> | undefined) {
    globalSettings = {
        ...defaultSettings,
        ...config,
        trace: {...defaultSettings.trace, ...config?.trace},
    };
}

/**
 * Get the global settings.
 * The behavior of the analyzer configuration is controlled from here.
 */
export function getGlobalSettings(): Readonly<AnalyzerSettings> {
    return globalSettings;
}

export function copyGlobalSettings(): AnalyzerSettings {
    return structuredClone(globalSettings);
}
