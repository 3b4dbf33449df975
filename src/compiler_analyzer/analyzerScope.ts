import {SymbolGlobalScope} from "./symbolScope";
import {SymbolVariable} from "./symbolObject";
import {builtinFeltType} from "./builtinType";
import {logger} from "../core/logger";

export interface ProphetVariable {
    readonly name: string;
    readonly length: number;
}

/**
 * Metadata of a VM invocation, supplied by the host.
 */
export interface ProgramProphet {
    readonly inputs: ReadonlyArray<ProphetVariable>;
    readonly outputs: ReadonlyArray<ProphetVariable>;
    // Names bound by the execution context
    readonly ctx: ReadonlyArray<string>;
}

export const emptyProphet: ProgramProphet = {inputs: [], outputs: [], ctx: []};

function createProphetVariable(globalScope: SymbolGlobalScope, variable: ProphetVariable): SymbolVariable {
    return SymbolVariable.create({
        identifierText: variable.name,
        type: builtinFeltType,
        arrayLength: variable.length === 1 ? undefined : variable.length,
        scopePath: globalScope.scopePath,
    });
}

/**
 * Create the global scope seeded with the prophet variables.
 * Inputs come first, then context variables, then outputs; a later entry overwrites an earlier one with the same name.
 */
export function createGlobalScope(prophet: ProgramProphet): SymbolGlobalScope {
    const globalScope = new SymbolGlobalScope();

    for (const input of prophet.inputs) {
        globalScope.insertSymbol(createProphetVariable(globalScope, input));
    }

    for (const ctx of prophet.ctx) {
        globalScope.insertSymbol(SymbolVariable.create({
            identifierText: ctx,
            type: builtinFeltType,
            scopePath: globalScope.scopePath,
        }));
    }

    for (const output of prophet.outputs) {
        globalScope.insertSymbol(createProphetVariable(globalScope, output));
    }

    logger.verbose(
        `global scope seeded with ${prophet.inputs.length} input(s), ${prophet.ctx.length} context variable(s), ${prophet.outputs.length} output(s)`);
    return globalScope;
}
