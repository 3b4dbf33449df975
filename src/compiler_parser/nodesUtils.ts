import {
    ArrayIdentifier,
    IdentifierKind,
    TypeToken,
    TypeTokenKind,
    VariableIdentifier
} from "./nodes";

export function stringifyTypeToken(token: TypeToken): string {
    if (token.kind === TypeTokenKind.Array) {
        return `[${token.element}; ${token.length}]`;
    }

    return token.name;
}

/**
 * The transition of an identifier token from an unclassified reference to an array reference.
 * Applying it to a token that is already an array reference returns an equal token.
 */
export function toArrayIdentifier(identifier: VariableIdentifier): ArrayIdentifier {
    return {
        kind: IdentifierKind.Array,
        text: identifier.text,
        location: identifier.location,
    };
}

export function isArrayIdentifier(identifier: { readonly kind: IdentifierKind }): identifier is ArrayIdentifier {
    return identifier.kind === IdentifierKind.Array;
}

