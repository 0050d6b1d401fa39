// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export class MoveSyntaxError extends Error {}

/** Raised while splitting the input into tokens. */
export class LexError extends MoveSyntaxError {
	offset: number;

	constructor(message: string, offset: number) {
		super(`${message} at offset ${offset}`);
		this.offset = offset;
	}
}

export class ParseError extends MoveSyntaxError {
	expected?: string;
	actual?: string;

	constructor(message: string, options: { expected?: string; actual?: string } = {}) {
		super(message);
		this.expected = options.expected;
		this.actual = options.actual;
	}
}

/**
 * The input is well formed but its value is rejected, e.g. an integer that does not fit its width
 * or an address with too many digits.
 */
export class SemanticError extends MoveSyntaxError {}

export class InvalidStructTagError extends SemanticError {
	input: string;

	constructor(input: string, cause?: Error) {
		super(cause ? `invalid struct tag: ${input}, ${cause.message}` : `invalid struct tag: ${input}`, {
			cause,
		});
		this.input = input;
	}
}

export class NestingLimitError extends MoveSyntaxError {
	depth: number;
	limit: number;

	constructor(depth: number, limit: number) {
		super(`Exceeded TypeTag nesting limit during parsing: ${depth}`);
		this.depth = depth;
		this.limit = limit;
	}
}

export class InvalidParserOptionsError extends Error {}
