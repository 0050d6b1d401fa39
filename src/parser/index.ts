// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { TransactionArgument } from '../types/transaction-argument.js';
import type { StructTag, TypeTag } from '../types/type-tag.js';
import { InvalidStructTagError, MoveSyntaxError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ParserOptions, ResolvedParserOptions } from '../utils/options.js';
import { resolveParserOptions } from '../utils/options.js';
import * as grammar from './grammar.js';
import { TokenStream } from './token-stream.js';
import { tokenize } from './tokenizer.js';
import { EOF, isWhitespace } from './tokens.js';

function logRejected(input: string, error: MoveSyntaxError) {
	logger.debug({ input, kind: error.constructor.name, err: error }, 'rejected input');
}

function parse<T>(
	input: string,
	options: ParserOptions | undefined,
	parseInput: (stream: TokenStream, options: ResolvedParserOptions) => T,
): T {
	const resolved = resolveParserOptions(options);
	try {
		const tokens = tokenize(input).filter((token) => !isWhitespace(token));
		tokens.push(EOF);

		const stream = new TokenStream(tokens);
		const result = parseInput(stream, resolved);
		stream.consume(EOF);
		return result;
	} catch (error) {
		if (error instanceof MoveSyntaxError) {
			logRejected(input, error);
		}
		throw error;
	}
}

export function parseTypeTag(input: string, options?: ParserOptions): TypeTag {
	return parse(input, options, (stream, resolved) => grammar.parseTypeTag(stream, 0, resolved));
}

/** Parses a comma separated list of type tags, e.g. `u8, vector<bool>,`. */
export function parseTypeTags(input: string, options?: ParserOptions): TypeTag[] {
	return parse(input, options, (stream, resolved) =>
		stream.parseCommaList((inner) => grammar.parseTypeTag(inner, 0, resolved), EOF, true),
	);
}

/**
 * Parses a struct type such as `0x2::coin::Coin<0x2::gem::GEM>`. Any other type tag, and any
 * parse failure, is reported as an `InvalidStructTagError` carrying the input.
 */
export function parseStructTag(input: string, options?: ParserOptions): StructTag {
	let typeTag: TypeTag;
	try {
		typeTag = parseTypeTag(input, options);
	} catch (error) {
		if (error instanceof MoveSyntaxError) {
			throw new InvalidStructTagError(input, error);
		}
		throw error;
	}

	if (!('struct' in typeTag)) {
		const error = new InvalidStructTagError(input);
		logRejected(input, error);
		throw error;
	}
	return typeTag.struct;
}

export function parseTransactionArgument(input: string): TransactionArgument {
	return parse(input, undefined, (stream) => grammar.parseTransactionArgument(stream));
}

export function parseTransactionArguments(input: string): TransactionArgument[] {
	return parse(input, undefined, (stream) =>
		stream.parseCommaList(grammar.parseTransactionArgument, EOF, true),
	);
}

/** Parses a comma separated list of plain names. Keywords such as `u8` are not names. */
export function parseStringList(input: string): string[] {
	return parse(input, undefined, (stream) => stream.parseCommaList(grammar.parseString, EOF, true));
}

export { tokenize, nextToken } from './tokenizer.js';
export { TokenStream } from './token-stream.js';
export type { Token } from './tokens.js';
