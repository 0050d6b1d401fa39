// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { fromHex } from '@mysten/bcs';

import type { TransactionArgument } from '../types/transaction-argument.js';
import { MAX_U128, MAX_U64, MAX_U8 } from '../types/transaction-argument.js';
import type { TypeTag } from '../types/type-tag.js';
import { NestingLimitError, ParseError, SemanticError } from '../utils/errors.js';
import { addressFromHexLiteral, createStructTag } from '../utils/move-types.js';
import type { ResolvedParserOptions } from '../utils/options.js';
import type { TokenStream } from './token-stream.js';
import type { Token } from './tokens.js';
import { COLON_COLON, describeToken, GT, LT } from './tokens.js';

function unexpected(token: Token, expected: string): ParseError {
	return new ParseError(`unexpected token ${describeToken(token)}, expected ${expected}`, {
		expected,
		actual: describeToken(token),
	});
}

function parseName(stream: TokenStream): string {
	const token = stream.next();
	if (token.kind !== 'Name') {
		throw new ParseError(`expected name, got ${describeToken(token)}`, {
			expected: 'name',
			actual: describeToken(token),
		});
	}
	return token.value;
}

export function parseString(stream: TokenStream): string {
	const token = stream.next();
	if (token.kind !== 'Name') {
		throw unexpected(token, 'string');
	}
	return token.value;
}

export function parseTypeTag(
	stream: TokenStream,
	depth: number,
	options: ResolvedParserOptions,
): TypeTag {
	if (depth >= options.maxTypeTagNesting) {
		throw new NestingLimitError(depth, options.maxTypeTagNesting);
	}

	const token = stream.next();
	switch (token.kind) {
		case 'U8Type':
			return { u8: null };
		case 'U64Type':
			return { u64: null };
		case 'U128Type':
			return { u128: null };
		case 'BoolType':
			return { bool: null };
		case 'AddressType':
			return { address: null };
		case 'SignerType':
			return { signer: null };
		case 'VectorType': {
			stream.consume(LT);
			const inner = parseTypeTag(stream, depth + 1, options);
			stream.consume(GT);
			return { vector: inner };
		}
		case 'Address': {
			stream.consume(COLON_COLON);
			const module = parseName(stream);
			stream.consume(COLON_COLON);
			const name = parseName(stream);

			let typeParams: TypeTag[] = [];
			if (stream.peekIs(LT)) {
				stream.next();
				typeParams = stream.parseCommaList(
					(inner) => parseTypeTag(inner, depth + 1, options),
					GT,
					true,
				);
				stream.consume(GT);
			}

			return {
				struct: createStructTag({ address: token.value, module, name, typeParams }),
			};
		}
		default:
			throw unexpected(token, 'type tag');
	}
}

function parseInteger(digits: string, max: bigint, width: string): bigint {
	const value = BigInt(digits);
	if (value > max) {
		throw new SemanticError(`number too large to fit in ${width}: ${digits}`);
	}
	return value;
}

function decodeHexBytes(hex: string): Uint8Array {
	if (hex.length % 2 !== 0) {
		throw new SemanticError(`odd number of digits in byte string: x"${hex}"`);
	}
	if (!/^[0-9a-fA-F]*$/.test(hex)) {
		throw new SemanticError(`invalid hex character in byte string: x"${hex}"`);
	}
	return fromHex(hex);
}

export function parseTransactionArgument(stream: TokenStream): TransactionArgument {
	const token = stream.next();
	switch (token.kind) {
		case 'U8':
			return { u8: Number(parseInteger(token.value, BigInt(MAX_U8), 'u8')) };
		case 'U64':
			return { u64: parseInteger(token.value, MAX_U64, 'u64') };
		case 'U128':
			return { u128: parseInteger(token.value, MAX_U128, 'u128') };
		case 'True':
			return { bool: true };
		case 'False':
			return { bool: false };
		case 'Address':
			return { address: addressFromHexLiteral(token.value) };
		case 'Bytes':
			return { u8vector: decodeHexBytes(token.value) };
		default:
			throw unexpected(token, 'transaction argument');
	}
}
