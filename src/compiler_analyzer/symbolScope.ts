import {ScopePath, SymbolBuiltin, SymbolObject} from "./symbolObject";
import {builtinScalarTypes} from "./builtinType";
import {InternalAnalyzerError} from "./analyzerError";
import {logger} from "../core/logger";
import assert = require("node:assert");

export type ScopeTable = Map<string, SymbolScope>;

type ReadonlyScopeTable = ReadonlyMap<string, SymbolScope>;

export type SymbolTable = Map<string, SymbolObject>;

export type ReadonlySymbolTable = ReadonlyMap<string, SymbolObject>;

/**
 * Represents a lexical scope that contains symbols.
 * Each scope refers to its enclosing scope, and the enclosing scope keeps its children,
 * so the whole tree stays reachable from the global scope after the pass.
 */
export class SymbolScope {
    // The parent scope of this scope. Undefined only for the global scope.
    private readonly _parentScope: SymbolScope | undefined;

    // The child scopes of this scope, keyed by label
    private readonly _childScopeTable: ScopeTable = new Map();

    // The symbol table that contains the symbols declared in this scope
    private readonly _symbolTable: SymbolTable = new Map();

    /**
     * The nesting depth. The global scope is 1.
     */
    public readonly depth: number;

    /**
     * The labels from the global scope to this scope.
     */
    public readonly scopePath: ScopePath;

    public constructor(
        parentScope: SymbolScope | undefined,
        // A human-readable label, e.g., the function name.
        public readonly key: string,
    ) {
        assert(parentScope !== undefined || this instanceof SymbolGlobalScope);

        this._parentScope = parentScope;
        this.depth = parentScope !== undefined ? parentScope.depth + 1 : 1;
        this.scopePath = parentScope !== undefined ? [...parentScope.scopePath, key] : [];
    }

    public get parentScope(): SymbolScope | undefined {
        return this._parentScope;
    }

    public isGlobalScope(): this is SymbolGlobalScope {
        return this._parentScope === undefined;
    }

    public get symbolTable(): ReadonlySymbolTable {
        return this._symbolTable;
    }

    public get childScopeTable(): ReadonlyScopeTable {
        return this._childScopeTable;
    }

    public getGlobalScope(): SymbolGlobalScope {
        if (this.isGlobalScope()) return this;

        assert(this.parentScope !== undefined);
        return this.parentScope.getGlobalScope();
    }

    /**
     * Create a new scope and insert it into the child scope table.
     * A scope that already has the label is replaced.
     */
    public insertScope(key: string): SymbolScope {
        const newScope = new SymbolScope(this, key);
        this._childScopeTable.set(key, newScope);

        logger.verbose(`scope '${newScope.scopePath.join('::')}' (depth ${newScope.depth}) created`);
        return newScope;
    }

    public lookupScope(key: string): SymbolScope | undefined {
        return this._childScopeTable.get(key);
    }

    public resolveRelativeScope(path: ScopePath): SymbolScope | undefined {
        if (path.length === 0) return this;
        const child = this._childScopeTable.get(path[0]);
        if (child === undefined) return undefined;
        return child.resolveRelativeScope(path.slice(1));
    }

    /**
     * Insert a symbol into this scope only.
     * A symbol with the same name in this scope is overwritten, so duplicates must be checked by the caller.
     */
    public insertSymbol(symbol: SymbolObject) {
        this._symbolTable.set(symbol.identifierText, symbol);
    }

    public lookupSymbol(identifier: string): SymbolObject | undefined {
        return this._symbolTable.get(identifier);
    }

    /**
     * Find the symbol in this scope, then in the enclosing scopes.
     * This is the only name resolution in the language.
     */
    public lookupSymbolWithParent(identifier: string): SymbolObject | undefined {
        const symbol = this.lookupSymbol(identifier);
        if (symbol !== undefined) return symbol;
        return this.parentScope === undefined ? undefined : this.parentScope.lookupSymbolWithParent(identifier);
    }

    /**
     * Resolve the name of a builtin type used in an annotation.
     * The parser only produces registered names, so a failure is an internal error.
     */
    public resolveBuiltin(identifier: string): SymbolBuiltin {
        const symbol = this.lookupSymbolWithParent(identifier);
        if (symbol === undefined || !symbol.isBuiltin()) {
            throw new InternalAnalyzerError(`Invalid builtin type '${identifier}'.`);
        }

        return symbol;
    }
}

export class SymbolGlobalScope extends SymbolScope {
    public constructor() {
        super(undefined, '');

        for (const type of builtinScalarTypes) {
            this.insertSymbol(new SymbolBuiltin(type));
        }
    }

    public resolveScope(path: ScopePath): SymbolScope | undefined {
        return super.resolveRelativeScope(path);
    }
}
