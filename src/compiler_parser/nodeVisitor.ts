import {
    NodeAny,
    NodeArrayLiteral,
    NodeAssign,
    NodeBinaryOp,
    NodeBlock,
    NodeCall,
    NodeCompound,
    NodeCondition,
    NodeContextIdentifier,
    NodeDeclaration,
    NodeEntryBlock,
    NodeFelt,
    NodeFunction,
    NodeIdentifier,
    NodeIndexedIdentifier,
    NodeInteger,
    NodeLoop,
    NodeMalloc,
    NodeMultiAssign,
    NodeName,
    NodePrintf,
    NodeProgram,
    NodeReturn,
    NodeSqrt,
    NodeType,
    NodeUnaryOp
} from "./nodes";

/**
 * One traversal entry point per node kind.
 * A visit may mutate the node it receives.
 */
export interface NodeVisitor<R> {
    visitProgram(node: NodeProgram): R;

    visitEntryBlock(node: NodeEntryBlock): R;

    visitBlock(node: NodeBlock): R;

    visitDeclaration(node: NodeDeclaration): R;

    visitType(node: NodeType): R;

    visitFelt(node: NodeFelt): R;

    visitInteger(node: NodeInteger): R;

    visitArrayLiteral(node: NodeArrayLiteral): R;

    visitIdentifier(node: NodeIdentifier): R;

    visitIndexedIdentifier(node: NodeIndexedIdentifier): R;

    visitContextIdentifier(node: NodeContextIdentifier): R;

    visitBinaryOp(node: NodeBinaryOp): R;

    visitUnaryOp(node: NodeUnaryOp): R;

    visitCompound(node: NodeCompound): R;

    visitAssign(node: NodeAssign): R;

    visitMultiAssign(node: NodeMultiAssign): R;

    visitCondition(node: NodeCondition): R;

    visitLoop(node: NodeLoop): R;

    visitFunction(node: NodeFunction): R;

    visitCall(node: NodeCall): R;

    visitReturn(node: NodeReturn): R;

    visitMalloc(node: NodeMalloc): R;

    visitPrintf(node: NodePrintf): R;

    visitSqrt(node: NodeSqrt): R;
}

export function dispatchNode<R>(visitor: NodeVisitor<R>, node: NodeAny): R {
    switch (node.nodeName) {
    case NodeName.Program:
        return visitor.visitProgram(node);
    case NodeName.EntryBlock:
        return visitor.visitEntryBlock(node);
    case NodeName.Block:
        return visitor.visitBlock(node);
    case NodeName.Declaration:
        return visitor.visitDeclaration(node);
    case NodeName.Type:
        return visitor.visitType(node);
    case NodeName.Felt:
        return visitor.visitFelt(node);
    case NodeName.Integer:
        return visitor.visitInteger(node);
    case NodeName.ArrayLiteral:
        return visitor.visitArrayLiteral(node);
    case NodeName.Identifier:
        return visitor.visitIdentifier(node);
    case NodeName.IndexedIdentifier:
        return visitor.visitIndexedIdentifier(node);
    case NodeName.ContextIdentifier:
        return visitor.visitContextIdentifier(node);
    case NodeName.BinaryOp:
        return visitor.visitBinaryOp(node);
    case NodeName.UnaryOp:
        return visitor.visitUnaryOp(node);
    case NodeName.Compound:
        return visitor.visitCompound(node);
    case NodeName.Assign:
        return visitor.visitAssign(node);
    case NodeName.MultiAssign:
        return visitor.visitMultiAssign(node);
    case NodeName.Condition:
        return visitor.visitCondition(node);
    case NodeName.Loop:
        return visitor.visitLoop(node);
    case NodeName.Function:
        return visitor.visitFunction(node);
    case NodeName.Call:
        return visitor.visitCall(node);
    case NodeName.Return:
        return visitor.visitReturn(node);
    case NodeName.Malloc:
        return visitor.visitMalloc(node);
    case NodeName.Printf:
        return visitor.visitPrintf(node);
    case NodeName.Sqrt:
        return visitor.visitSqrt(node);
    }
}
