export enum ScalarKind {
    Felt = 'felt',
    I32 = 'i32',
}

export enum BuiltinTypeKind {
    Scalar = 'Scalar',
    Array = 'Array',
}

export interface ScalarBuiltinType {
    readonly kind: BuiltinTypeKind.Scalar;
    readonly scalar: ScalarKind;
}

export interface ArrayBuiltinType {
    readonly kind: BuiltinTypeKind.Array;
    // Arrays of arrays do not exist in the language.
    readonly element: ScalarBuiltinType;
    readonly length: number;
}

export type BuiltinType = ScalarBuiltinType | ArrayBuiltinType;

export const builtinFeltType: ScalarBuiltinType = {kind: BuiltinTypeKind.Scalar, scalar: ScalarKind.Felt};

export const builtinI32Type: ScalarBuiltinType = {kind: BuiltinTypeKind.Scalar, scalar: ScalarKind.I32};

/**
 * The builtin types registered by name in the global scope.
 */
export const builtinScalarTypes: ReadonlyArray<ScalarBuiltinType> = [builtinFeltType, builtinI32Type];

export function createArrayBuiltinType(element: ScalarBuiltinType, length: number): ArrayBuiltinType {
    return {kind: BuiltinTypeKind.Array, element, length};
}

export function stringifyBuiltinType(type: BuiltinType): string {
    if (type.kind === BuiltinTypeKind.Array) {
        return `[${type.element.scalar}; ${type.length}]`;
    }

    return type.scalar;
}
