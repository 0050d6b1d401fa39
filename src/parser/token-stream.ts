// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { ParseError } from '../utils/errors.js';
import type { Token } from './tokens.js';
import { COMMA, describeToken, tokenEquals } from './tokens.js';

/**
 * Cursor over a token list with one token of lookahead. The list is expected to end with the
 * synthetic `EOF` token, so grammar routines never read past it.
 */
export class TokenStream {
	#tokens: Token[];
	#position = 0;

	constructor(tokens: Token[]) {
		this.#tokens = tokens;
	}

	next(): Token {
		const token = this.#tokens[this.#position];
		if (token === undefined) {
			throw new ParseError('out of tokens, this should not happen');
		}
		this.#position++;
		return token;
	}

	peek(): Token | undefined {
		return this.#tokens[this.#position];
	}

	/** Whether the next token equals `token`, without consuming it. */
	peekIs(token: Token): boolean {
		const next = this.peek();
		return next !== undefined && tokenEquals(next, token);
	}

	consume(expected: Token): void {
		const actual = this.next();
		if (!tokenEquals(actual, expected)) {
			throw new ParseError(
				`expected token ${describeToken(expected)}, got ${describeToken(actual)}`,
				{ expected: describeToken(expected), actual: describeToken(actual) },
			);
		}
	}

	/**
	 * Parses `item (, item)*` up to, but not including, `endToken`. An immediate `endToken` yields
	 * an empty list.
	 */
	parseCommaList<T>(
		parseItem: (stream: TokenStream) => T,
		endToken: Token,
		allowTrailingComma: boolean,
	): T[] {
		const items: T[] = [];
		if (this.peekIs(endToken)) {
			return items;
		}

		for (;;) {
			items.push(parseItem(this));
			if (this.peekIs(endToken)) {
				break;
			}
			this.consume(COMMA);
			if (allowTrailingComma && this.peekIs(endToken)) {
				break;
			}
		}
		return items;
	}
}
