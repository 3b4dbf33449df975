import {TextLocation} from "../compiler_tokenizer/textLocation";
import type {SymbolFunction} from "../compiler_analyzer/symbolObject";

// The tree below is built by the parser. The analyzer validates it and annotates it in place:
// identifier tokens may move from `Scalar` to `Array`, and calls receive their resolved function.

export enum NodeName {
    Program = 'Program',
    EntryBlock = 'EntryBlock',
    Block = 'Block',
    Declaration = 'Declaration',
    Type = 'Type',
    Felt = 'Felt',
    Integer = 'Integer',
    ArrayLiteral = 'ArrayLiteral',
    Identifier = 'Identifier',
    IndexedIdentifier = 'IndexedIdentifier',
    ContextIdentifier = 'ContextIdentifier',
    BinaryOp = 'BinaryOp',
    UnaryOp = 'UnaryOp',
    Compound = 'Compound',
    Assign = 'Assign',
    MultiAssign = 'MultiAssign',
    Condition = 'Condition',
    Loop = 'Loop',
    Function = 'Function',
    Call = 'Call',
    Return = 'Return',
    Malloc = 'Malloc',
    Printf = 'Printf',
    Sqrt = 'Sqrt',
}

export interface NodeBase {
    readonly nodeName: NodeName;
    readonly location: TextLocation | undefined;
}

// -----------------------------------------------
// Tokens carried by nodes

export interface NameToken {
    readonly text: string;
    readonly location: TextLocation | undefined;
}

export enum IdentifierKind {
    // A reference to a scalar binding, or a reference not yet classified.
    Scalar = 'Scalar',
    // A reference known to denote an array binding.
    Array = 'Array',
    // A name bound by the execution context, e.g., `caller_address`.
    Context = 'Context',
}

export interface ScalarIdentifier extends NameToken {
    readonly kind: IdentifierKind.Scalar;
}

export interface ArrayIdentifier extends NameToken {
    readonly kind: IdentifierKind.Array;
}

export interface ContextIdentifier extends NameToken {
    readonly kind: IdentifierKind.Context;
}

export type VariableIdentifier = ScalarIdentifier | ArrayIdentifier;

export type AnyIdentifier = VariableIdentifier | ContextIdentifier;

export enum TypeTokenKind {
    Scalar = 'Scalar',
    Array = 'Array',
}

// e.g., `felt`, `i32`
export interface ScalarTypeToken {
    readonly kind: TypeTokenKind.Scalar;
    readonly name: string;
}

// e.g., `[felt; 4]`
export interface ArrayTypeToken {
    readonly kind: TypeTokenKind.Array;
    readonly element: string;
    readonly length: number;
}

export type TypeToken = ScalarTypeToken | ArrayTypeToken;

export type BinaryOperator =
    '+' | '-' | '*' | '/' | '%'
    | '==' | '!=' | '<' | '<=' | '>' | '>='
    | '&&' | '||' | '&' | '|' | '^' | '<<' | '>>';

export type UnaryOperator = '-' | '!' | '~';

// -----------------------------------------------
// Program structure

// PROGRAM ::= {DECLARATION | FUNCTION} ENTRY_BLOCK
export interface NodeProgram extends NodeBase {
    readonly nodeName: NodeName.Program;
    readonly declarations: NodeDeclarationMember[];
    readonly entryBlock: NodeEntryBlock;
}

export type NodeDeclarationMember = NodeDeclaration | NodeFunction;

// ENTRY_BLOCK ::= 'fn' 'main' '(' ')' '{' {DECLARATION | FUNCTION} COMPOUND '}'
export interface NodeEntryBlock extends NodeBase {
    readonly nodeName: NodeName.EntryBlock;
    readonly declarations: NodeDeclarationMember[];
    readonly compound: NodeCompound;
}

// BLOCK ::= '{' {DECLARATION | FUNCTION} COMPOUND '}'
export interface NodeBlock extends NodeBase {
    readonly nodeName: NodeName.Block;
    readonly declarations: NodeDeclarationMember[];
    readonly compound: NodeCompound;
}

// DECLARATION ::= IDENTIFIER ':' TYPE
export interface NodeDeclaration extends NodeBase {
    readonly nodeName: NodeName.Declaration;
    readonly identifier: NodeIdentifier;
    readonly type: NodeType;
}

export interface NodeType extends NodeBase {
    readonly nodeName: NodeName.Type;
    readonly token: TypeToken;
}

// FUNCTION ::= 'fn' IDENTIFIER '(' [DECLARATION {',' DECLARATION}] ')' BLOCK
export interface NodeFunction extends NodeBase {
    readonly nodeName: NodeName.Function;
    readonly identifier: NameToken;
    readonly params: NodeDeclaration[];
    readonly block: NodeBlock;
}

// -----------------------------------------------
// Expressions

export interface NodeFelt extends NodeBase {
    readonly nodeName: NodeName.Felt;
    readonly value: bigint;
}

export interface NodeInteger extends NodeBase {
    readonly nodeName: NodeName.Integer;
    readonly value: number;
}

export type NodeNumber = NodeFelt | NodeInteger;

// ARRAY_LITERAL ::= '[' NUMBER {',' NUMBER} ']'
export interface NodeArrayLiteral extends NodeBase {
    readonly nodeName: NodeName.ArrayLiteral;
    readonly values: NodeNumber[];
}

export interface NodeIdentifier extends NodeBase {
    readonly nodeName: NodeName.Identifier;
    // Rewritten to an array identifier by the analyzer when the name denotes an array.
    identifier: VariableIdentifier;
}

// INDEXED ::= IDENTIFIER '[' EXPR ']'
export interface NodeIndexedIdentifier extends NodeBase {
    readonly nodeName: NodeName.IndexedIdentifier;
    readonly identifier: VariableIdentifier;
    readonly index: NodeExpr;
}

export interface NodeContextIdentifier extends NodeBase {
    readonly nodeName: NodeName.ContextIdentifier;
    readonly identifier: ContextIdentifier;
}

export interface NodeBinaryOp extends NodeBase {
    readonly nodeName: NodeName.BinaryOp;
    readonly operator: BinaryOperator;
    readonly left: NodeExpr;
    readonly right: NodeExpr;
}

export interface NodeUnaryOp extends NodeBase {
    readonly nodeName: NodeName.UnaryOp;
    readonly operator: UnaryOperator;
    readonly expr: NodeExpr;
}

// CALL ::= IDENTIFIER '(' [EXPR {',' EXPR}] ')'
export interface NodeCall extends NodeBase {
    readonly nodeName: NodeName.Call;
    readonly callee: NameToken;
    readonly args: NodeExpr[];
    // Attached by the analyzer so that later stages do not resolve the callee again.
    resolvedFunction: SymbolFunction | undefined;
}

// MALLOC ::= 'malloc' '(' EXPR ')'
export interface NodeMalloc extends NodeBase {
    readonly nodeName: NodeName.Malloc;
    readonly size: NodeExpr;
}

// SQRT ::= 'sqrt' '(' EXPR ')'
export interface NodeSqrt extends NodeBase {
    readonly nodeName: NodeName.Sqrt;
    readonly operand: NodeExpr;
}

export type NodeExpr =
    NodeFelt
    | NodeInteger
    | NodeArrayLiteral
    | NodeIdentifier
    | NodeIndexedIdentifier
    | NodeContextIdentifier
    | NodeBinaryOp
    | NodeUnaryOp
    | NodeCall
    | NodeMalloc
    | NodeSqrt;

// -----------------------------------------------
// Statements

export interface NodeCompound extends NodeBase {
    readonly nodeName: NodeName.Compound;
    readonly children: NodeStatement[];
}

// ASSIGN ::= (IDENTIFIER | CONTEXT_IDENTIFIER) '=' EXPR ';'
export interface NodeAssign extends NodeBase {
    readonly nodeName: NodeName.Assign;
    // Rewritten to an array identifier by the analyzer when the name denotes an array.
    identifier: AnyIdentifier;
    readonly expr: NodeExpr;
}

export type NodeAssignTarget = NodeIdentifier | NodeContextIdentifier | NodeIndexedIdentifier;

// MULTI_ASSIGN ::= '(' TARGET {',' TARGET} ')' '=' CALL ';'
export interface NodeMultiAssign extends NodeBase {
    readonly nodeName: NodeName.MultiAssign;
    readonly targets: NodeAssignTarget[];
    readonly call: NodeCall;
}

// CONDITION ::= 'if' EXPR '{' {STATEMENT} '}' ['else' '{' {STATEMENT} '}']
export interface NodeCondition extends NodeBase {
    readonly nodeName: NodeName.Condition;
    readonly condition: NodeExpr;
    readonly consequences: NodeStatement[];
    readonly alternatives: NodeStatement[];
}

// LOOP ::= 'while' EXPR '{' {STATEMENT} '}'
export interface NodeLoop extends NodeBase {
    readonly nodeName: NodeName.Loop;
    readonly condition: NodeExpr;
    readonly consequences: NodeStatement[];
}

// RETURN ::= 'return' [EXPR {',' EXPR}] ';'
export interface NodeReturn extends NodeBase {
    readonly nodeName: NodeName.Return;
    readonly returns: NodeExpr[];
}

// PRINTF ::= 'printf' '(' EXPR ',' EXPR ')' ';'
export interface NodePrintf extends NodeBase {
    readonly nodeName: NodeName.Printf;
    readonly flag: NodeExpr;
    readonly address: NodeExpr;
}

export type NodeStatement =
    NodeCompound
    | NodeAssign
    | NodeMultiAssign
    | NodeCondition
    | NodeLoop
    | NodeCall
    | NodeReturn
    | NodePrintf
    | NodeMalloc
    | NodeSqrt;

export type NodeAny =
    NodeProgram
    | NodeEntryBlock
    | NodeBlock
    | NodeDeclaration
    | NodeType
    | NodeFunction
    | NodeExpr
    | NodeStatement;
