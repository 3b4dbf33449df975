import {BuiltinType, BuiltinTypeKind, ScalarKind} from "./builtinType";

// The type an expression evaluates to while the pass runs.

export enum TypeValueKind {
    // Statements and context identifiers carry no value.
    Nil = 'Nil',
    I32 = 'I32',
    Felt = 'Felt',
    Array = 'Array',
}

export interface NilTypeValue {
    readonly kind: TypeValueKind.Nil;
}

export interface I32TypeValue {
    readonly kind: TypeValueKind.I32;
}

export interface FeltTypeValue {
    readonly kind: TypeValueKind.Felt;
}

export type ScalarTypeValue = I32TypeValue | FeltTypeValue;

export interface ArrayTypeValue {
    readonly kind: TypeValueKind.Array;
    readonly element: ScalarTypeValue;
    readonly length: number;
}

export type TypeValue = NilTypeValue | ScalarTypeValue | ArrayTypeValue;

export const nilTypeValue: NilTypeValue = {kind: TypeValueKind.Nil};

export const i32TypeValue: I32TypeValue = {kind: TypeValueKind.I32};

export const feltTypeValue: FeltTypeValue = {kind: TypeValueKind.Felt};

export function createArrayTypeValue(element: ScalarTypeValue, length: number): ArrayTypeValue {
    return {kind: TypeValueKind.Array, element, length};
}

export function typeValueFromScalar(scalar: ScalarKind): ScalarTypeValue {
    return scalar === ScalarKind.Felt ? feltTypeValue : i32TypeValue;
}

export function typeValueFromBuiltin(type: BuiltinType): ScalarTypeValue | ArrayTypeValue {
    if (type.kind === BuiltinTypeKind.Array) {
        return createArrayTypeValue(typeValueFromScalar(type.element.scalar), type.length);
    }

    return typeValueFromScalar(type.scalar);
}

/**
 * The scalar part of a value: the element of an array, or undefined for Nil.
 */
export function getScalarOfTypeValue(value: TypeValue): ScalarTypeValue | undefined {
    switch (value.kind) {
    case TypeValueKind.Nil:
        return undefined;
    case TypeValueKind.Array:
        return value.element;
    default:
        return value;
    }
}

/**
 * The result type of a binary operator.
 * Nil is the identity, two i32 operands stay i32, and a felt operand promotes the result to felt.
 */
export function promoteTypeValues(left: TypeValue, right: TypeValue): TypeValue {
    const lhs = getScalarOfTypeValue(left);
    const rhs = getScalarOfTypeValue(right);
    if (lhs === undefined) return rhs ?? nilTypeValue;
    if (rhs === undefined) return lhs;

    if (lhs.kind === TypeValueKind.I32 && rhs.kind === TypeValueKind.I32) return i32TypeValue;
    return feltTypeValue;
}

/**
 * Structural equality. There is no implicit widening: arrays are equal only when both the element and the length match.
 */
export function isTypeValueEqual(lhs: TypeValue, rhs: TypeValue): boolean {
    if (lhs.kind === TypeValueKind.Array && rhs.kind === TypeValueKind.Array) {
        return lhs.length === rhs.length && isTypeValueEqual(lhs.element, rhs.element);
    }

    return lhs.kind === rhs.kind;
}

export function stringifyTypeValue(value: TypeValue): string {
    switch (value.kind) {
    case TypeValueKind.Nil:
        return 'nil';
    case TypeValueKind.I32:
        return 'i32';
    case TypeValueKind.Felt:
        return 'felt';
    case TypeValueKind.Array:
        return `[${stringifyTypeValue(value.element)}; ${value.length}]`;
    }
}

// -----------------------------------------------

export enum TraversalResultKind {
    Single = 'Single',
    Multiple = 'Multiple',
}

export interface SingleTraversalResult {
    readonly kind: TraversalResultKind.Single;
    readonly value: TypeValue;
}

// Produced by array-shaped values that are spelled out element by element.
export interface MultipleTraversalResult {
    readonly kind: TraversalResultKind.Multiple;
    readonly values: ReadonlyArray<TypeValue>;
}

export type TraversalResult = SingleTraversalResult | MultipleTraversalResult;

export function single(value: TypeValue): SingleTraversalResult {
    return {kind: TraversalResultKind.Single, value};
}

export function multiple(values: ReadonlyArray<TypeValue>): MultipleTraversalResult {
    return {kind: TraversalResultKind.Multiple, values};
}

export const nilResult: SingleTraversalResult = single(nilTypeValue);

/**
 * The representative type of a result in a scalar context, e.g., an operand of a binary operator.
 */
export function reduceToRepresentative(result: TraversalResult): TypeValue {
    if (result.kind === TraversalResultKind.Single) return result.value;
    return result.values[0] ?? nilTypeValue;
}

/**
 * The type of a result passed as a call argument.
 * A multiple result is seen as an array of its first element's type with the sequence length.
 */
export function reduceToArgumentType(result: TraversalResult): TypeValue {
    if (result.kind === TraversalResultKind.Single) return result.value;

    const first = result.values[0];
    const element = first !== undefined ? getScalarOfTypeValue(first) : undefined;
    if (element === undefined) return nilTypeValue;
    return createArrayTypeValue(element, result.values.length);
}
