import {
    AnyIdentifier,
    IdentifierKind,
    NameToken,
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
    NodeDeclarationMember,
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
    NodeStatement,
    NodeType,
    NodeUnaryOp,
    TypeToken,
    TypeTokenKind
} from "../compiler_parser/nodes";
import {dispatchNode, NodeVisitor} from "../compiler_parser/nodeVisitor";
import {toArrayIdentifier} from "../compiler_parser/nodesUtils";
import {TextLocation} from "../compiler_tokenizer/textLocation";
import {FunctionParameter, SymbolFunction, SymbolObject, SymbolVariable} from "./symbolObject";
import {SymbolGlobalScope, SymbolScope} from "./symbolScope";
import {createGlobalScope, ProgramProphet} from "./analyzerScope";
import {createArrayBuiltinType, ScalarBuiltinType} from "./builtinType";
import {
    feltTypeValue,
    i32TypeValue,
    isTypeValueEqual,
    nilResult,
    promoteTypeValues,
    reduceToArgumentType,
    reduceToRepresentative,
    single,
    stringifyTypeValue,
    TraversalResult,
    TypeValue,
    typeValueFromBuiltin
} from "./typeValue";
import {
    errorArgumentCountMismatch,
    errorArgumentTypeMismatch,
    errorDuplicateDeclaration,
    errorUndeclaredFunction,
    errorUndeclaredVariable,
    InternalAnalyzerError
} from "./analyzerError";
import {getGlobalSettings} from "../core/settings";
import {logger} from "../core/logger";

interface ResolvedTypeToken {
    readonly type: ScalarBuiltinType;
    readonly arrayLength: number | undefined;
}

function getTokenLocation(token: NameToken, node: NodeAny): TextLocation | undefined {
    return token.location ?? node.location;
}

/**
 * The scope and type checking pass.
 * It walks the tree once from the top, keeping a cursor to the current scope.
 * The first semantic error is thrown and aborts the pass.
 */
export class SemanticAnalyzer implements NodeVisitor<TraversalResult> {
    public readonly globalScope: SymbolGlobalScope;

    private _currentScope: SymbolScope;

    private _entryScope: SymbolScope | undefined;

    public constructor(prophet: ProgramProphet) {
        this.globalScope = createGlobalScope(prophet);
        this._currentScope = this.globalScope;
    }

    public get currentScope(): SymbolScope {
        return this._currentScope;
    }

    /**
     * The scope of the entry block, once it has been entered.
     */
    public get entryScope(): SymbolScope | undefined {
        return this._entryScope;
    }

    public analyze(node: NodeAny): TraversalResult {
        return dispatchNode(this, node);
    }

    /**
     * Run the action with the scope as the cursor, then restore the enclosing scope even if the action throws.
     */
    private analyzeInScope<T>(scope: SymbolScope, action: () => T): T {
        const enclosingScope = this._currentScope;
        this._currentScope = scope;
        try {
            return action();
        } finally {
            this._currentScope = enclosingScope;
        }
    }

    private analyzeDeclarations(declarations: NodeDeclarationMember[]) {
        for (const declaration of declarations) {
            this.analyze(declaration);
        }
    }

    private analyzeStatements(statements: NodeStatement[]) {
        for (const statement of statements) {
            this.analyze(statement);
        }
    }

    private lookupDeclared(identifier: AnyIdentifier, node: NodeAny): SymbolObject {
        const symbol = this._currentScope.lookupSymbolWithParent(identifier.text);
        if (symbol === undefined) {
            throw errorUndeclaredVariable(identifier.text, getTokenLocation(identifier, node));
        }

        return symbol;
    }

    private resolveTypeToken(token: TypeToken): ResolvedTypeToken {
        if (token.kind === TypeTokenKind.Array) {
            const element = this._currentScope.resolveBuiltin(token.element);
            return {type: element.scalarType, arrayLength: token.length};
        }

        return {type: this._currentScope.resolveBuiltin(token.name).scalarType, arrayLength: undefined};
    }

    // PROGRAM ::= {DECLARATION | FUNCTION} ENTRY_BLOCK
    public visitProgram(node: NodeProgram): TraversalResult {
        this.analyzeDeclarations(node.declarations);
        return this.analyze(node.entryBlock);
    }

    public visitEntryBlock(node: NodeEntryBlock): TraversalResult {
        const entryScope = this._currentScope.insertScope(getGlobalSettings().entryScopeName);
        this._entryScope = entryScope;
        return this.analyzeInScope(entryScope, () => {
            this.analyzeDeclarations(node.declarations);
            return this.analyze(node.compound);
        });
    }

    // The scope of a block is opened by the function that owns it.
    public visitBlock(node: NodeBlock): TraversalResult {
        this.analyzeDeclarations(node.declarations);
        return this.analyze(node.compound);
    }

    // DECLARATION ::= IDENTIFIER ':' TYPE
    public visitDeclaration(node: NodeDeclaration): TraversalResult {
        const identifier = node.identifier.identifier;

        // Names already visible from an enclosing scope cannot be declared again.
        if (this._currentScope.lookupSymbolWithParent(identifier.text) !== undefined) {
            throw errorDuplicateDeclaration(identifier.text, getTokenLocation(identifier, node));
        }

        const resolved = this.resolveTypeToken(node.type.token);
        const variable = SymbolVariable.create({
            identifierText: identifier.text,
            type: resolved.type,
            arrayLength: resolved.arrayLength,
            scopePath: this._currentScope.scopePath,
            location: getTokenLocation(identifier, node),
        });

        this._currentScope.insertSymbol(variable);
        logger.verbose(`insert variable '${variable}' into depth ${this._currentScope.depth}`);

        return nilResult;
    }

    public visitType(node: NodeType): TraversalResult {
        const resolved = this.resolveTypeToken(node.token);
        if (resolved.arrayLength === undefined) return single(typeValueFromBuiltin(resolved.type));
        return single(typeValueFromBuiltin(createArrayBuiltinType(resolved.type, resolved.arrayLength)));
    }

    public visitFelt(node: NodeFelt): TraversalResult {
        return single(feltTypeValue);
    }

    public visitInteger(node: NodeInteger): TraversalResult {
        return single(i32TypeValue);
    }

    // The type is taken from the first element. Elements are not checked against each other.
    public visitArrayLiteral(node: NodeArrayLiteral): TraversalResult {
        const first = node.values.at(0);
        if (first === undefined) {
            throw new InternalAnalyzerError('An array literal must have at least one element.');
        }

        return single(first.nodeName === NodeName.Felt ? feltTypeValue : i32TypeValue);
    }

    public visitIdentifier(node: NodeIdentifier): TraversalResult {
        const symbol = this.lookupDeclared(node.identifier, node);
        if (!symbol.isVariable()) {
            throw new InternalAnalyzerError(`'${symbol.identifierText}' is referenced as a variable but is a ${symbol.kind}.`);
        }

        if (symbol.isArray()) {
            node.identifier = toArrayIdentifier(node.identifier);
        }

        return single(symbol.typeValue);
    }

    // The access has the type of its index. Neither the bound nor the base being an array is checked here.
    public visitIndexedIdentifier(node: NodeIndexedIdentifier): TraversalResult {
        this.lookupDeclared(node.identifier, node);
        return this.analyze(node.index);
    }

    // The value is supplied at execution time.
    public visitContextIdentifier(node: NodeContextIdentifier): TraversalResult {
        this.lookupDeclared(node.identifier, node);
        return nilResult;
    }

    public visitBinaryOp(node: NodeBinaryOp): TraversalResult {
        const left = reduceToRepresentative(this.analyze(node.left));
        const right = reduceToRepresentative(this.analyze(node.right));
        return single(promoteTypeValues(left, right));
    }

    public visitUnaryOp(node: NodeUnaryOp): TraversalResult {
        return this.analyze(node.expr);
    }

    public visitCompound(node: NodeCompound): TraversalResult {
        this.analyzeStatements(node.children);
        return nilResult;
    }

    // The type of the right-hand side is not compared with the target.
    public visitAssign(node: NodeAssign): TraversalResult {
        const identifier = node.identifier;
        const symbol = this.lookupDeclared(identifier, node);
        if (identifier.kind !== IdentifierKind.Context && symbol.isVariable() && symbol.isArray()) {
            node.identifier = toArrayIdentifier(identifier);
        }

        return this.analyze(node.expr);
    }

    public visitMultiAssign(node: NodeMultiAssign): TraversalResult {
        for (const target of node.targets) {
            if (target.nodeName === NodeName.Identifier || target.nodeName === NodeName.ContextIdentifier) {
                // Binding targets do not produce values, so only the declaration is checked.
                this.lookupDeclared(target.identifier, target);
            } else {
                this.analyze(target);
            }
        }

        this.analyze(node.call);
        return nilResult;
    }

    public visitCondition(node: NodeCondition): TraversalResult {
        this.analyze(node.condition);
        this.analyzeStatements(node.consequences);
        this.analyzeStatements(node.alternatives);
        return nilResult;
    }

    public visitLoop(node: NodeLoop): TraversalResult {
        this.analyze(node.condition);
        this.analyzeStatements(node.consequences);
        return nilResult;
    }

    // FUNCTION ::= 'fn' IDENTIFIER '(' [DECLARATION {',' DECLARATION}] ')' BLOCK
    public visitFunction(node: NodeFunction): TraversalResult {
        const functionName = node.identifier.text;
        const functionScopePath = [...this._currentScope.scopePath, functionName];

        const parameters: FunctionParameter[] = [];
        const parameterVariables: SymbolVariable[] = [];
        for (const param of node.params) {
            const resolved = this.resolveTypeToken(param.type.token);
            if (resolved.arrayLength !== undefined) {
                param.identifier.identifier = toArrayIdentifier(param.identifier.identifier);
            }

            const variable = SymbolVariable.create({
                identifierText: param.identifier.identifier.text,
                type: resolved.type,
                arrayLength: resolved.arrayLength,
                scopePath: functionScopePath,
                location: getTokenLocation(param.identifier.identifier, param),
            });

            parameters.push({identifierText: variable.identifierText, type: variable.builtinType});
            parameterVariables.push(variable);
        }

        const functionScope = this._currentScope.insertScope(functionName);

        // Register the function before its body is analyzed so that it can call itself.
        const functionSymbol = SymbolFunction.create({
            identifierText: functionName,
            parameters: parameters,
            linkedNode: node,
            scopePath: this._currentScope.scopePath,
            scope: functionScope,
        });
        this._currentScope.insertSymbol(functionSymbol);
        logger.verbose(`insert function '${functionSymbol}' into depth ${this._currentScope.depth}`);

        for (const variable of parameterVariables) {
            functionScope.insertSymbol(variable);
        }

        this.analyzeInScope(functionScope, () => this.analyze(node.block));
        return nilResult;
    }

    // CALL ::= IDENTIFIER '(' [EXPR {',' EXPR}] ')'
    public visitCall(node: NodeCall): TraversalResult {
        const callee = node.callee;
        const symbol = this._currentScope.lookupSymbolWithParent(callee.text);

        const argumentTypes: TypeValue[] = [];
        for (const arg of node.args) {
            argumentTypes.push(reduceToArgumentType(this.analyze(arg)));
        }

        if (symbol === undefined) {
            throw errorUndeclaredFunction(callee.text, getTokenLocation(callee, node));
        }

        if (!symbol.isFunction()) {
            throw new InternalAnalyzerError(`'${symbol.identifierText}' is called but is a ${symbol.kind}.`);
        }

        if (argumentTypes.length !== symbol.parameters.length) {
            throw errorArgumentCountMismatch(
                callee.text, symbol.parameters.length, argumentTypes.length, getTokenLocation(callee, node));
        }

        for (let i = 0; i < symbol.parameters.length; i++) {
            const expected = typeValueFromBuiltin(symbol.parameters[i].type);
            const actual = argumentTypes[i];
            if (isTypeValueEqual(expected, actual) === false) {
                throw errorArgumentTypeMismatch(
                    callee.text,
                    i,
                    stringifyTypeValue(expected),
                    stringifyTypeValue(actual),
                    node.args[i].location ?? getTokenLocation(callee, node));
            }
        }

        node.resolvedFunction = symbol;
        return nilResult;
    }

    // Only bare identifiers among the returned values are checked.
    public visitReturn(node: NodeReturn): TraversalResult {
        for (const returned of node.returns) {
            if (returned.nodeName !== NodeName.Identifier) continue;

            const symbol = this.lookupDeclared(returned.identifier, returned);
            if (symbol.isVariable() && symbol.isArray()) {
                returned.identifier = toArrayIdentifier(returned.identifier);
            }
        }

        return nilResult;
    }

    public visitMalloc(node: NodeMalloc): TraversalResult {
        return this.analyze(node.size);
    }

    public visitPrintf(node: NodePrintf): TraversalResult {
        this.analyze(node.flag);
        return this.analyze(node.address);
    }

    public visitSqrt(node: NodeSqrt): TraversalResult {
        return this.analyze(node.operand);
    }
}
