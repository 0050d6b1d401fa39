// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { Infer } from 'superstruct';
import { integer, max, min, object, optional, validate } from 'superstruct';

import { InvalidParserOptionsError } from './errors.js';

/**
 * Maximum depth of a type tag. Every `vector` wrap and every level of struct type arguments adds
 * one; the innermost element of an accepted tag sits at depth `MAX_TYPE_TAG_NESTING - 1` or less.
 */
export const MAX_TYPE_TAG_NESTING = 13;

export const ParserOptions = object({
	maxTypeTagNesting: optional(max(min(integer(), 1), 255)),
});
export type ParserOptions = Infer<typeof ParserOptions>;

export type ResolvedParserOptions = Required<ParserOptions>;

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
	const [error, value] = validate(options, ParserOptions);
	if (error) {
		throw new InvalidParserOptionsError(`Invalid parser options: ${error.message}`, {
			cause: error,
		});
	}

	return {
		maxTypeTagNesting: value?.maxTypeTagNesting ?? MAX_TYPE_TAG_NESTING,
	};
}
