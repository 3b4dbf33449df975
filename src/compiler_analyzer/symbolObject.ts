import {NodeBlock, NodeFunction} from "../compiler_parser/nodes";
import {TextLocation} from "../compiler_tokenizer/textLocation";
import {
    BuiltinType,
    createArrayBuiltinType,
    ScalarBuiltinType,
    stringifyBuiltinType
} from "./builtinType";
import {TypeValue, typeValueFromBuiltin} from "./typeValue";
import type {SymbolScope} from "./symbolScope";
import assert = require("node:assert");

export enum SymbolKind {
    Builtin = 'Builtin',
    Variable = 'Variable',
    Function = 'Function',
}

export type ScopePath = ReadonlyArray<string>;

/**
 * The base class for all symbols.
 */
export abstract class SymbolBase {
    public abstract get kind(): SymbolKind;

    public abstract get identifierText(): string;

    public isBuiltin(): this is SymbolBuiltin {
        return this.kind === SymbolKind.Builtin;
    }

    public isVariable(): this is SymbolVariable {
        return this.kind === SymbolKind.Variable;
    }

    public isFunction(): this is SymbolFunction {
        return this.kind === SymbolKind.Function;
    }
}

/**
 * The name of a builtin type such as `felt`, used in type annotations.
 */
export class SymbolBuiltin extends SymbolBase {
    public get kind(): SymbolKind {
        return SymbolKind.Builtin;
    }

    public constructor(
        public readonly scalarType: ScalarBuiltinType
    ) {
        super();
    }

    public get identifierText(): string {
        return this.scalarType.scalar;
    }
}

export class SymbolVariable extends SymbolBase {
    public get kind(): SymbolKind {
        return SymbolKind.Variable;
    }

    constructor(
        public readonly identifierText: string,
        // The element type when the variable is an array.
        public readonly type: ScalarBuiltinType,
        // Present if and only if the variable is an array.
        public readonly arrayLength: number | undefined,
        public readonly scopePath: ScopePath,
        public readonly location: TextLocation | undefined,
    ) {
        super();

        if (arrayLength !== undefined) assert(Number.isInteger(arrayLength) && arrayLength > 0);
    }

    public static create(args: {
        identifierText: string
        type: ScalarBuiltinType
        arrayLength?: number
        scopePath: ScopePath
        location?: TextLocation
    }) {
        return new SymbolVariable(
            args.identifierText,
            args.type,
            args.arrayLength,
            args.scopePath,
            args.location
        );
    }

    public isArray(): boolean {
        return this.arrayLength !== undefined;
    }

    /**
     * The declared type, with the array length applied.
     */
    public get builtinType(): BuiltinType {
        return this.arrayLength !== undefined ? createArrayBuiltinType(this.type, this.arrayLength) : this.type;
    }

    public get typeValue(): TypeValue {
        return typeValueFromBuiltin(this.builtinType);
    }

    public toString(): string {
        return `${this.identifierText}: ${stringifyBuiltinType(this.builtinType)}`;
    }
}

export interface FunctionParameter {
    readonly identifierText: string;
    readonly type: BuiltinType;
}

export class SymbolFunction extends SymbolBase {
    public get kind(): SymbolKind {
        return SymbolKind.Function;
    }

    constructor(
        public readonly identifierText: string,
        public readonly parameters: ReadonlyArray<FunctionParameter>,
        // The definition, whose body is specialized by code generation.
        public readonly linkedNode: NodeFunction,
        public readonly scopePath: ScopePath,
        // Holds the parameters and the locals of the body.
        public readonly scope: SymbolScope,
    ) {
        super();
    }

    public static create(args: {
        identifierText: string
        parameters: ReadonlyArray<FunctionParameter>
        linkedNode: NodeFunction
        scopePath: ScopePath
        scope: SymbolScope
    }) {
        return new SymbolFunction(args.identifierText, args.parameters, args.linkedNode, args.scopePath, args.scope);
    }

    public get body(): NodeBlock {
        return this.linkedNode.block;
    }

    public get location(): TextLocation | undefined {
        return this.linkedNode.identifier.location;
    }

    public toString(): string {
        const params = this.parameters.map(param => `${param.identifierText}: ${stringifyBuiltinType(param.type)}`);
        return `fn ${this.identifierText}(${params.join(', ')})`;
    }
}

export type SymbolObject = SymbolBuiltin | SymbolVariable | SymbolFunction;
