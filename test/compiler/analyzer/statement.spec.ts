import * as assert from "node:assert";
import {expectError, expectSuccess} from "./utils";
import {
    createArrayLiteral,
    createArrayTypeToken,
    createAssign,
    createBinaryOp,
    createBlock,
    createCall,
    createCompound,
    createCondition,
    createContextIdentifier,
    createDeclaration,
    createEntryBlock,
    createFelt,
    createFunction,
    createIdentifier,
    createIndexedIdentifier,
    createInteger,
    createLoop,
    createMalloc,
    createMultiAssign,
    createPrintf,
    createProgram,
    createReturn,
    createScalarTypeToken,
    createSqrt,
    createType,
    createUnaryOp
} from "../../../src/compiler_parser/nodeFactory";
import {IdentifierKind, NodeExpr} from "../../../src/compiler_parser/nodes";
import {InternalAnalyzerError, SemanticErrorKind} from "../../../src/compiler_analyzer/analyzerError";
import {SemanticAnalyzer} from "../../../src/compiler_analyzer/analyzer";
import {analyzeProgram} from "../../../src/compiler_analyzer/analyzeProgram";
import {emptyProphet} from "../../../src/compiler_analyzer/analyzerScope";
import {
    stringifyTypeValue,
    TraversalResultKind
} from "../../../src/compiler_analyzer/typeValue";

const felt = createScalarTypeToken('felt');
const i32 = createScalarTypeToken('i32');

// fn pair(a: felt) { return a, a; }
const createPair = () => createFunction('pair', [createDeclaration('a', felt)], createBlock([], [
    createReturn([createIdentifier('a'), createIdentifier('a')]),
]));

function typeOf(expr: NodeExpr): string {
    const analyzer = new SemanticAnalyzer({inputs: [{name: 'x', length: 1}, {name: 'xs', length: 3}], outputs: [], ctx: ['ctx']});
    const result = analyzer.analyze(expr);
    assert.ok(result.kind === TraversalResultKind.Single);
    return stringifyTypeValue(result.value);
}

describe('analyzer/statement', () => {
    it('[analyzer] a multiple assignment checks its targets and annotates its call', () => {
        const call = createCall('pair', [createFelt(1)]);
        const first = createIdentifier('buf');
        const program = createProgram([createPair()], createEntryBlock([
            createDeclaration('buf', createArrayTypeToken('felt', 2)),
            createDeclaration('k', i32),
        ], [
            createMultiAssign([first, createIndexedIdentifier('buf', createIdentifier('k'))], call),
        ]));

        analyzeProgram(program);

        assert.strictEqual(call.resolvedFunction?.identifierText, 'pair');
        // Binding targets are only looked up.
        assert.strictEqual(first.identifier.kind, IdentifierKind.Scalar);
    });

    expectError('an undeclared target of a multiple assignment', {
        program: () => createProgram([createPair()], createEntryBlock([createDeclaration('a', felt)], [
            createMultiAssign([createIdentifier('a'), createIdentifier('b')], createCall('pair', [createFelt(1)])),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'b');

    expectError('an undeclared context target of a multiple assignment', {
        program: () => createProgram([createPair()], createEntryBlock([createDeclaration('a', felt)], [
            createMultiAssign([createIdentifier('a'), createContextIdentifier('caller')], createCall('pair', [createFelt(1)])),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'caller');

    expectError('an undeclared index in a target of a multiple assignment', {
        program: () => createProgram([createPair()], createEntryBlock([
            createDeclaration('buf', createArrayTypeToken('felt', 2)),
        ], [
            createMultiAssign([createIndexedIdentifier('buf', createIdentifier('k'))], createCall('pair', [createFelt(1)])),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'k');

    expectError('targets are checked before the call', {
        program: () => createProgram([], createEntryBlock([], [
            createMultiAssign([createIdentifier('a')], createCall('missing', [])),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'a');

    expectError('the call of a multiple assignment is checked', {
        program: () => createProgram([createPair()], createEntryBlock([createDeclaration('a', felt)], [
            createMultiAssign([createIdentifier('a')], createCall('pair', [])),
        ]))
    }, SemanticErrorKind.ArgumentCountMismatch, 'pair');

    expectError('the else branch of a condition', {
        program: () => createProgram([], createEntryBlock([createDeclaration('a', felt)], [
            createCondition(createBinaryOp('==', createIdentifier('a'), createFelt(0)), [
                createAssign('a', createFelt(1)),
            ], [
                createAssign('c', createFelt(2)),
            ]),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'c');

    expectError('the condition of a loop', {
        program: () => createProgram([], createEntryBlock([], [
            createLoop(createBinaryOp('<', createIdentifier('i'), createInteger(10)), []),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'i');

    expectError('the body of a loop', {
        program: () => createProgram([], createEntryBlock([createDeclaration('i', i32)], [
            createLoop(createBinaryOp('<', createIdentifier('i'), createInteger(10)), [
                createAssign('i', createBinaryOp('+', createIdentifier('i'), createIdentifier('step'))),
            ]),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'step');

    expectError('the operand of sqrt', {
        program: () => createProgram([], createEntryBlock([], [createSqrt(createIdentifier('u'))]))
    }, SemanticErrorKind.UndeclaredVariable, 'u');

    expectError('the address of printf', {
        program: () => createProgram([], createEntryBlock([], [createPrintf(createInteger(0), createIdentifier('addr'))]))
    }, SemanticErrorKind.UndeclaredVariable, 'addr');

    expectError('the size of malloc', {
        program: () => createProgram([], createEntryBlock([], [createMalloc(createIdentifier('n'))]))
    }, SemanticErrorKind.UndeclaredVariable, 'n');

    expectError('statements after the first error are not visited', {
        program: () => createProgram([], createEntryBlock([], [
            createAssign('first', createFelt(1)),
            createCompound([createAssign('second', createFelt(2))]),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'first');

    expectError('a nested compound statement', {
        program: () => createProgram([], createEntryBlock([createDeclaration('a', felt)], [
            createAssign('a', createFelt(1)),
            createCompound([
                createAssign('a', createFelt(2)),
                createCompound([createAssign('inner', createIdentifier('a'))]),
            ]),
            createAssign('after', createFelt(3)),
        ]))
    }, SemanticErrorKind.UndeclaredVariable, 'inner');

    expectSuccess('a function defined in the entry block', {
        program: () => createProgram([], createEntryBlock([
            createFunction('f', [createDeclaration('p', felt)], createBlock([], [
                createAssign('p', createFelt(1)),
            ])),
        ], [
            createCall('f', [createFelt(2)]),
        ]))
    }, ({globalScope, entryScope}) => {
        const functionScope = globalScope.resolveScope(['entry', 'f']);
        assert.ok(functionScope !== undefined);
        assert.strictEqual(functionScope.depth, 3);
        assert.strictEqual(functionScope.parentScope, entryScope);
        assert.ok(functionScope.lookupSymbol('p')?.isVariable());

        assert.ok(entryScope.lookupSymbol('f')?.isFunction());
        assert.strictEqual(globalScope.lookupSymbol('f'), undefined);
    });

    expectSuccess('the type of an assignment is not compared with its target', {
        program: () => createProgram([], createEntryBlock([
            createDeclaration('a', i32),
            createDeclaration('buf', createArrayTypeToken('felt', 2)),
        ], [
            createAssign('a', createFelt(1)),
            createAssign('buf', createInteger(1)),
        ]))
    });

    it('[analyzer] expression types', () => {
        assert.strictEqual(typeOf(createInteger(1)), 'i32');
        assert.strictEqual(typeOf(createFelt(1n)), 'felt');
        assert.strictEqual(typeOf(createBinaryOp('+', createInteger(1), createInteger(2))), 'i32');
        assert.strictEqual(typeOf(createBinaryOp('*', createInteger(1), createIdentifier('x'))), 'felt');
        assert.strictEqual(typeOf(createBinaryOp('+', createIdentifier('xs'), createInteger(1))), 'felt');
        assert.strictEqual(typeOf(createBinaryOp('+', createContextIdentifier('ctx'), createInteger(1))), 'i32');
        assert.strictEqual(typeOf(createBinaryOp('+', createContextIdentifier('ctx'), createContextIdentifier('ctx'))), 'nil');
        assert.strictEqual(typeOf(createUnaryOp('-', createIdentifier('x'))), 'felt');
        assert.strictEqual(typeOf(createIdentifier('xs')), '[felt; 3]');
        assert.strictEqual(typeOf(createArrayLiteral([createInteger(1), createFelt(2)])), 'i32');
        assert.strictEqual(typeOf(createMalloc(createInteger(8))), 'i32');
        assert.strictEqual(typeOf(createSqrt(createIdentifier('x'))), 'felt');
    });

    it('[analyzer] type annotations evaluate to their type', () => {
        const analyzer = new SemanticAnalyzer(emptyProphet);

        const scalar = analyzer.analyze(createType(i32));
        assert.ok(scalar.kind === TraversalResultKind.Single);
        assert.strictEqual(stringifyTypeValue(scalar.value), 'i32');

        const array = analyzer.analyze(createType(createArrayTypeToken('felt', 4)));
        assert.ok(array.kind === TraversalResultKind.Single);
        assert.strictEqual(stringifyTypeValue(array.value), '[felt; 4]');

        assert.throws(() => analyzer.analyze(createType(createScalarTypeToken('bool'))), InternalAnalyzerError);
    });

    it('[analyzer] statements evaluate to nil', () => {
        const analyzer = new SemanticAnalyzer(emptyProphet);
        const result = analyzer.analyze(createCondition(createInteger(1), [], []));
        assert.ok(result.kind === TraversalResultKind.Single);
        assert.strictEqual(stringifyTypeValue(result.value), 'nil');
    });

    it('[analyzer] an empty array literal is an internal error', () => {
        const analyzer = new SemanticAnalyzer(emptyProphet);
        assert.throws(() => analyzer.analyze(createArrayLiteral([])), InternalAnalyzerError);
    });

    it('[analyzer] the cursor goes back to the global scope after a failure', () => {
        const analyzer = new SemanticAnalyzer(emptyProphet);
        const program = createProgram([
            createFunction('f', [], createBlock([], [createAssign('missing', createFelt(0))])),
        ], createEntryBlock([], []));

        assert.throws(() => analyzer.analyze(program));
        assert.strictEqual(analyzer.currentScope, analyzer.globalScope);
    });

    it('[analyzer] the printf flag comes before its address', () => {
        const program = createProgram([], createEntryBlock([], [
            createPrintf(createIdentifier('flag'), createIdentifier('addr')),
        ]));

        assert.throws(() => analyzeProgram(program), /Undeclared variable 'flag' found\./);
    });
});
