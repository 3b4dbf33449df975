import * as assert from "node:assert";
import {expectError, expectSuccess} from "./utils";
import {
    createArrayTypeToken,
    createAssign,
    createBlock,
    createCall,
    createDeclaration,
    createEntryBlock,
    createFelt,
    createFunction,
    createIdentifier,
    createInteger,
    createProgram,
    createReturn,
    createScalarTypeToken
} from "../../../src/compiler_parser/nodeFactory";
import {IdentifierKind, NodeProgram} from "../../../src/compiler_parser/nodes";
import {
    InternalAnalyzerError,
    SemanticError,
    SemanticErrorKind
} from "../../../src/compiler_analyzer/analyzerError";
import {analyzeProgram} from "../../../src/compiler_analyzer/analyzeProgram";

const felt = createScalarTypeToken('felt');
const i32 = createScalarTypeToken('i32');

function expectMessage(program: NodeProgram, message: string) {
    assert.throws(
        () => analyzeProgram(program),
        (error: unknown) => error instanceof SemanticError && error.message === message);
}

describe('analyzer/functionCall', () => {
    it('[analyzer] passing an array to a scalar parameter', () => {
        const program = createProgram([
            createDeclaration('arr', createArrayTypeToken('felt', 4)),
            createFunction('f', [createDeclaration('p', felt)], createBlock([], [])),
        ], createEntryBlock([], [createCall('f', [createIdentifier('arr')])]));

        expectMessage(program, "Argument 1 of 'f' expects 'felt', but got '[felt; 4]'.");
    });

    expectError('passing an array to a scalar parameter reports the callee', {
        program: () => createProgram([
            createDeclaration('arr', createArrayTypeToken('felt', 4)),
            createFunction('f', [createDeclaration('p', felt)], createBlock([], [])),
        ], createEntryBlock([], [createCall('f', [createIdentifier('arr')])]))
    }, SemanticErrorKind.ArgumentTypeMismatch, 'f');

    it('[analyzer] every matching call is annotated with the function', () => {
        const g = createFunction('g', [createDeclaration('a', felt)], createBlock([], [
            createReturn([createIdentifier('a')]),
        ]));
        const firstCall = createCall('g', [createFelt(1)]);
        const secondCall = createCall('g', [createIdentifier('v')]);
        const program = createProgram([g], createEntryBlock([createDeclaration('v', felt)], [firstCall, secondCall]));

        const {globalScope} = analyzeProgram(program);

        const symbol = globalScope.lookupSymbol('g');
        assert.ok(symbol?.isFunction());
        assert.strictEqual(symbol.linkedNode, g);
        assert.strictEqual(symbol.toString(), 'fn g(a: felt)');
        assert.strictEqual(firstCall.resolvedFunction, symbol);
        assert.strictEqual(secondCall.resolvedFunction, symbol);
    });

    it('[analyzer] a failed call is not annotated', () => {
        const call = createCall('g', [createInteger(1)]);
        const program = createProgram([
            createFunction('g', [createDeclaration('a', felt)], createBlock([], [])),
        ], createEntryBlock([], [call]));

        expectMessage(program, "Argument 1 of 'g' expects 'felt', but got 'i32'.");
        assert.strictEqual(call.resolvedFunction, undefined);
    });

    it('[analyzer] too many arguments', () => {
        const program = createProgram([
            createFunction('g', [createDeclaration('a', felt)], createBlock([], [])),
        ], createEntryBlock([], [createCall('g', [createFelt(1), createFelt(2)])]));

        expectMessage(program, "Function 'g' expects 1 argument(s), but got 2.");
    });

    expectError('too few arguments', {
        program: () => createProgram([
            createFunction('g', [createDeclaration('a', felt), createDeclaration('b', i32)], createBlock([], [])),
        ], createEntryBlock([], [createCall('g', [createFelt(1)])]))
    }, SemanticErrorKind.ArgumentCountMismatch, 'g');

    it('[analyzer] the second argument is checked after the first', () => {
        const program = createProgram([
            createFunction('g', [createDeclaration('a', felt), createDeclaration('b', i32)], createBlock([], [])),
        ], createEntryBlock([], [createCall('g', [createFelt(1), createFelt(2)])]));

        expectMessage(program, "Argument 2 of 'g' expects 'i32', but got 'felt'.");
    });

    expectError('calling an undefined function', {
        program: () => createProgram([], createEntryBlock([], [createCall('h', [])]))
    }, SemanticErrorKind.UndeclaredFunction, 'h');

    expectError('arguments are analyzed before the callee is resolved', {
        program: () => createProgram([], createEntryBlock([], [createCall('h', [createIdentifier('z')])]))
    }, SemanticErrorKind.UndeclaredVariable, 'z');

    expectError('calling a function defined later', {
        program: () => createProgram([
            createFunction('a', [], createBlock([], [createCall('b', [])])),
            createFunction('b', [], createBlock([], [])),
        ], createEntryBlock([], []))
    }, SemanticErrorKind.UndeclaredFunction, 'b');

    expectSuccess('a function may call itself', {
        program: () => createProgram([
            createFunction('loop', [createDeclaration('n', felt)], createBlock([], [
                createCall('loop', [createIdentifier('n')]),
            ])),
        ], createEntryBlock([], [createCall('loop', [createFelt(3)])]))
    });

    it('[analyzer] calling a variable is an internal error', () => {
        const program = createProgram([], createEntryBlock([createDeclaration('v', felt)], [createCall('v', [])]));
        assert.throws(() => analyzeProgram(program), InternalAnalyzerError);
    });

    it('[analyzer] array parameters are rewritten and matched by length', () => {
        const sum = createFunction('sum', [createDeclaration('xs', createArrayTypeToken('felt', 3))], createBlock([], [
            createReturn([createIdentifier('xs')]),
        ]));
        const call = createCall('sum', [createIdentifier('buf')]);
        const program = createProgram([sum], createEntryBlock([
            createDeclaration('buf', createArrayTypeToken('felt', 3)),
        ], [call]));

        const {globalScope} = analyzeProgram(program);

        assert.strictEqual(sum.params[0].identifier.identifier.kind, IdentifierKind.Array);
        assert.strictEqual(globalScope.lookupSymbol('sum')?.toString(), 'fn sum(xs: [felt; 3])');
        assert.ok(call.resolvedFunction !== undefined);

        const xs = globalScope.lookupScope('sum')?.lookupSymbol('xs');
        assert.ok(xs?.isVariable());
        assert.strictEqual(xs.arrayLength, 3);
        assert.deepStrictEqual(xs.scopePath, ['sum']);
    });

    it('[analyzer] an array argument of another length', () => {
        const program = createProgram([
            createFunction('sum', [createDeclaration('xs', createArrayTypeToken('felt', 3))], createBlock([], [])),
        ], createEntryBlock([
            createDeclaration('buf', createArrayTypeToken('felt', 2)),
        ], [createCall('sum', [createIdentifier('buf')])]));

        expectMessage(program, "Argument 1 of 'sum' expects '[felt; 3]', but got '[felt; 2]'.");
    });

    expectSuccess('the value of a call is usable in an expression', {
        program: () => createProgram([
            createFunction('one', [], createBlock([], [createReturn([createFelt(1)])])),
        ], createEntryBlock([createDeclaration('v', felt)], [
            createAssign('v', createCall('one', [])),
        ]))
    });
});
