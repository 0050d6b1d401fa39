// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toHex } from '@mysten/bcs';

import { LexError } from '../utils/errors.js';
import { isValidIdentifierChar } from '../utils/move-types.js';
import type { Token } from './tokens.js';
import { COLON_COLON, COMMA, GT, LT, nameToken } from './tokens.js';

const isDigit = (c: string | undefined) => c !== undefined && c >= '0' && c <= '9';
const isHexDigit = (c: string | undefined) => c !== undefined && /^[0-9a-fA-F]$/.test(c);
const isAlphanumeric = (c: string | undefined) => c !== undefined && /^[a-zA-Z0-9]$/.test(c);
const isAlphabetic = (c: string | undefined) => c !== undefined && /^[a-zA-Z]$/.test(c);
const isWhitespaceChar = (c: string | undefined) =>
	c !== undefined && /^[ \t\n\f\r]$/.test(c);
const isAscii = (c: string | undefined) => c !== undefined && c.charCodeAt(0) < 0x80;

/** Consumes `input[start..]` while `predicate` holds and returns the end index. */
function scan(input: string, start: number, predicate: (c: string) => boolean) {
	let end = start;
	while (end < input.length && predicate(input[end])) {
		end++;
	}
	return end;
}

/**
 * Lexes a numeric literal starting at `start`. The optional suffix selects the integer width,
 * which defaults to 64 bits. The returned token holds the digits without the suffix.
 */
export function nextNumber(input: string, start: number): [Token, number] {
	const digitsEnd = scan(input, start, isDigit);
	const digits = input.slice(start, digitsEnd);

	if (!isAlphanumeric(input[digitsEnd])) {
		return [{ kind: 'U64', value: digits }, digits.length];
	}

	const suffixEnd = scan(input, digitsEnd, isAlphanumeric);
	const consumed = suffixEnd - start;
	switch (input.slice(digitsEnd, suffixEnd)) {
		case 'u8':
			return [{ kind: 'U8', value: digits }, consumed];
		case 'u64':
			return [{ kind: 'U64', value: digits }, consumed];
		case 'u128':
			return [{ kind: 'U128', value: digits }, consumed];
		default:
			throw new LexError('invalid suffix', digitsEnd);
	}
}

function nextByteString(
	input: string,
	start: number,
	isBodyChar: (c: string) => boolean,
): [string, number] {
	// skip the `b"` or `x"` opener
	let end = start + 2;
	while (input[end] !== '"') {
		if (end >= input.length || !isBodyChar(input[end])) {
			throw new LexError('unrecognized token', end);
		}
		end++;
	}
	return [input.slice(start + 2, end), end + 1 - start];
}

/**
 * Lexes one token from `input` starting at `start`. Returns `null` at the end of the input,
 * otherwise the token and the number of characters it spans.
 */
export function nextToken(input: string, start = 0): [Token, number] | null {
	if (start >= input.length) {
		return null;
	}

	const c = input[start];
	const next = input[start + 1];

	switch (c) {
		case '<':
			return [LT, 1];
		case '>':
			return [GT, 1];
		case ',':
			return [COMMA, 1];
		case ':':
			if (next === ':') {
				return [COLON_COLON, 2];
			}
			throw new LexError('unrecognized token', start);
	}

	if (c === '0' && (next === 'x' || next === 'X')) {
		if (!isHexDigit(input[start + 2])) {
			throw new LexError('unrecognized token', start);
		}
		const end = scan(input, start + 2, isHexDigit);
		return [{ kind: 'Address', value: `0x${input.slice(start + 2, end)}` }, end - start];
	}

	if (isDigit(c)) {
		return nextNumber(input, start);
	}

	if (c === 'b' && next === '"') {
		const [text, consumed] = nextByteString(input, start, isAscii);
		return [{ kind: 'Bytes', value: toHex(new TextEncoder().encode(text)) }, consumed];
	}

	if (c === 'x' && next === '"') {
		const [text, consumed] = nextByteString(input, start, isHexDigit);
		return [{ kind: 'Bytes', value: text }, consumed];
	}

	if (isWhitespaceChar(c)) {
		const end = scan(input, start, isWhitespaceChar);
		return [{ kind: 'Whitespace', value: input.slice(start, end) }, end - start];
	}

	if (isAlphabetic(c)) {
		const end = scan(input, start, isValidIdentifierChar);
		return [nameToken(input.slice(start, end)), end - start];
	}

	throw new LexError('unrecognized token', start);
}

export function tokenize(input: string): Token[] {
	const tokens: Token[] = [];
	let offset = 0;
	let result = nextToken(input, offset);
	while (result) {
		const [token, consumed] = result;
		tokens.push(token);
		offset += consumed;
		result = nextToken(input, offset);
	}
	return tokens;
}
