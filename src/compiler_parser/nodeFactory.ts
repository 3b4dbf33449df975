import {TextLocation} from "../compiler_tokenizer/textLocation";
import {
    BinaryOperator,
    ContextIdentifier,
    IdentifierKind,
    NodeArrayLiteral,
    NodeAssign,
    NodeAssignTarget,
    NodeBinaryOp,
    NodeBlock,
    NodeCall,
    NodeCompound,
    NodeCondition,
    NodeContextIdentifier,
    NodeDeclaration,
    NodeDeclarationMember,
    NodeEntryBlock,
    NodeExpr,
    NodeFelt,
    NodeFunction,
    NodeIdentifier,
    NodeIndexedIdentifier,
    NodeInteger,
    NodeLoop,
    NodeMalloc,
    NodeMultiAssign,
    NodeName,
    NodeNumber,
    NodePrintf,
    NodeProgram,
    NodeReturn,
    NodeSqrt,
    NodeStatement,
    NodeType,
    NodeUnaryOp,
    ScalarIdentifier,
    TypeToken,
    TypeTokenKind,
    UnaryOperator
} from "./nodes";

// Constructors used by the parser front end when it lowers its syntax tree.
// Identifier references always start out unclassified; the analyzer decides whether they denote arrays.

export function createScalarIdentifier(text: string, location?: TextLocation): ScalarIdentifier {
    return {kind: IdentifierKind.Scalar, text, location};
}

export function createContextIdentifierToken(text: string, location?: TextLocation): ContextIdentifier {
    return {kind: IdentifierKind.Context, text, location};
}

export function createScalarTypeToken(name: string): TypeToken {
    return {kind: TypeTokenKind.Scalar, name};
}

export function createArrayTypeToken(element: string, length: number): TypeToken {
    return {kind: TypeTokenKind.Array, element, length};
}

export function createProgram(
    declarations: NodeDeclarationMember[],
    entryBlock: NodeEntryBlock,
    location?: TextLocation
): NodeProgram {
    return {nodeName: NodeName.Program, location, declarations, entryBlock};
}

export function createEntryBlock(
    declarations: NodeDeclarationMember[],
    statements: NodeStatement[],
    location?: TextLocation
): NodeEntryBlock {
    return {nodeName: NodeName.EntryBlock, location, declarations, compound: createCompound(statements, location)};
}

export function createBlock(
    declarations: NodeDeclarationMember[],
    statements: NodeStatement[],
    location?: TextLocation
): NodeBlock {
    return {nodeName: NodeName.Block, location, declarations, compound: createCompound(statements, location)};
}

export function createType(token: TypeToken, location?: TextLocation): NodeType {
    return {nodeName: NodeName.Type, location, token};
}

export function createDeclaration(name: string, token: TypeToken, location?: TextLocation): NodeDeclaration {
    return {
        nodeName: NodeName.Declaration,
        location,
        identifier: createIdentifier(name, location),
        type: createType(token, location)
    };
}

export function createFunction(
    name: string,
    params: NodeDeclaration[],
    block: NodeBlock,
    location?: TextLocation
): NodeFunction {
    return {nodeName: NodeName.Function, location, identifier: {text: name, location}, params, block};
}

export function createFelt(value: bigint | number, location?: TextLocation): NodeFelt {
    return {nodeName: NodeName.Felt, location, value: BigInt(value)};
}

export function createInteger(value: number, location?: TextLocation): NodeInteger {
    return {nodeName: NodeName.Integer, location, value};
}

export function createArrayLiteral(values: NodeNumber[], location?: TextLocation): NodeArrayLiteral {
    return {nodeName: NodeName.ArrayLiteral, location, values};
}

export function createIdentifier(name: string, location?: TextLocation): NodeIdentifier {
    return {nodeName: NodeName.Identifier, location, identifier: createScalarIdentifier(name, location)};
}

export function createIndexedIdentifier(name: string, index: NodeExpr, location?: TextLocation): NodeIndexedIdentifier {
    return {
        nodeName: NodeName.IndexedIdentifier,
        location,
        identifier: createScalarIdentifier(name, location),
        index
    };
}

export function createContextIdentifier(name: string, location?: TextLocation): NodeContextIdentifier {
    return {
        nodeName: NodeName.ContextIdentifier,
        location,
        identifier: createContextIdentifierToken(name, location)
    };
}

export function createBinaryOp(
    operator: BinaryOperator,
    left: NodeExpr,
    right: NodeExpr,
    location?: TextLocation
): NodeBinaryOp {
    return {nodeName: NodeName.BinaryOp, location, operator, left, right};
}

export function createUnaryOp(operator: UnaryOperator, expr: NodeExpr, location?: TextLocation): NodeUnaryOp {
    return {nodeName: NodeName.UnaryOp, location, operator, expr};
}

export function createCall(name: string, args: NodeExpr[], location?: TextLocation): NodeCall {
    return {nodeName: NodeName.Call, location, callee: {text: name, location}, args, resolvedFunction: undefined};
}

export function createMalloc(size: NodeExpr, location?: TextLocation): NodeMalloc {
    return {nodeName: NodeName.Malloc, location, size};
}

export function createSqrt(operand: NodeExpr, location?: TextLocation): NodeSqrt {
    return {nodeName: NodeName.Sqrt, location, operand};
}

export function createCompound(children: NodeStatement[], location?: TextLocation): NodeCompound {
    return {nodeName: NodeName.Compound, location, children};
}

/**
 * `name = expr;`
 */
export function createAssign(name: string, expr: NodeExpr, location?: TextLocation): NodeAssign {
    return {nodeName: NodeName.Assign, location, identifier: createScalarIdentifier(name, location), expr};
}

/**
 * `context_name = expr;`
 */
export function createContextAssign(name: string, expr: NodeExpr, location?: TextLocation): NodeAssign {
    return {nodeName: NodeName.Assign, location, identifier: createContextIdentifierToken(name, location), expr};
}

export function createMultiAssign(
    targets: NodeAssignTarget[],
    call: NodeCall,
    location?: TextLocation
): NodeMultiAssign {
    return {nodeName: NodeName.MultiAssign, location, targets, call};
}

export function createCondition(
    condition: NodeExpr,
    consequences: NodeStatement[],
    alternatives: NodeStatement[] = [],
    location?: TextLocation
): NodeCondition {
    return {nodeName: NodeName.Condition, location, condition, consequences, alternatives};
}

export function createLoop(condition: NodeExpr, consequences: NodeStatement[], location?: TextLocation): NodeLoop {
    return {nodeName: NodeName.Loop, location, condition, consequences};
}

export function createReturn(returns: NodeExpr[], location?: TextLocation): NodeReturn {
    return {nodeName: NodeName.Return, location, returns};
}

export function createPrintf(flag: NodeExpr, address: NodeExpr, location?: TextLocation): NodePrintf {
    return {nodeName: NodeName.Printf, location, flag, address};
}
