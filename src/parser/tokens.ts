// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export type KeywordKind =
	| 'U8Type'
	| 'U64Type'
	| 'U128Type'
	| 'BoolType'
	| 'AddressType'
	| 'VectorType'
	| 'SignerType'
	| 'True'
	| 'False';

export type PunctuationKind = 'ColonColon' | 'Lt' | 'Gt' | 'Comma' | 'EOF';

/** Token kinds whose payload is the literal text they were lexed from. */
export type ValueKind = 'Whitespace' | 'Name' | 'Address' | 'U8' | 'U64' | 'U128' | 'Bytes';

export type Token =
	| { kind: KeywordKind }
	| { kind: PunctuationKind }
	| { kind: ValueKind; value: string };

const KEYWORDS: Record<string, KeywordKind> = {
	u8: 'U8Type',
	u64: 'U64Type',
	u128: 'U128Type',
	bool: 'BoolType',
	address: 'AddressType',
	vector: 'VectorType',
	true: 'True',
	false: 'False',
	signer: 'SignerType',
};

export const LT: Token = { kind: 'Lt' };
export const GT: Token = { kind: 'Gt' };
export const COMMA: Token = { kind: 'Comma' };
export const COLON_COLON: Token = { kind: 'ColonColon' };
export const EOF: Token = { kind: 'EOF' };

/** Classifies a complete identifier run as a keyword or a plain name. */
export function nameToken(text: string): Token {
	const keyword = Object.hasOwn(KEYWORDS, text) ? KEYWORDS[text] : undefined;
	return keyword ? { kind: keyword } : { kind: 'Name', value: text };
}

export function tokenEquals(a: Token, b: Token): boolean {
	if (a.kind !== b.kind) {
		return false;
	}
	const aValue = 'value' in a ? a.value : undefined;
	const bValue = 'value' in b ? b.value : undefined;
	return aValue === bValue;
}

export function isWhitespace(token: Token): boolean {
	return token.kind === 'Whitespace';
}

/** Renders a token for error messages, e.g. `Name("coin")` or `Gt`. */
export function describeToken(token: Token): string {
	return 'value' in token ? `${token.kind}(${JSON.stringify(token.value)})` : token.kind;
}
