// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { StructTag, TypeTag } from '../types/type-tag.js';
import { SemanticError } from './errors.js';

// Account addresses are 32 bytes wide.
export const MOVE_ADDRESS_LENGTH = 32;

const HEX_LITERAL_REGEX = /^0[xX]([0-9a-fA-F]+)$/;
const IDENTIFIER_REGEX = /^(?:[a-zA-Z][a-zA-Z0-9_]*|_[a-zA-Z0-9_]+)$/;

export function isValidMoveAddress(value: string): value is string {
	return /^0x[0-9a-f]+$/.test(value) && value.length === MOVE_ADDRESS_LENGTH * 2 + 2;
}

/**
 * Perform the following operations:
 * 1. Make the address lower case
 * 2. Prepend `0x` if the string does not start with `0x`.
 * 3. Add more zeros if the length of the address(excluding `0x`) is less than `MOVE_ADDRESS_LENGTH`
 */
export function normalizeMoveAddress(value: string): string {
	let address = value.toLowerCase();
	if (address.startsWith('0x')) {
		address = address.slice(2);
	}
	return `0x${address.padStart(MOVE_ADDRESS_LENGTH * 2, '0')}`;
}

/** Drops the leading zeros of an address, keeping at least one digit. */
export function toShortAddress(value: string): string {
	const digits = normalizeMoveAddress(value).slice(2).replace(/^0+/, '');
	return `0x${digits || '0'}`;
}

/**
 * Builds a normalized account address from a `0x` prefixed hex literal of up to
 * `MOVE_ADDRESS_LENGTH` bytes.
 */
export function addressFromHexLiteral(literal: string): string {
	const match = literal.match(HEX_LITERAL_REGEX);
	if (!match) {
		throw new SemanticError(`invalid address literal: ${literal}`);
	}
	if (match[1].length > MOVE_ADDRESS_LENGTH * 2) {
		throw new SemanticError(
			`address literal ${literal} is longer than ${MOVE_ADDRESS_LENGTH} bytes`,
		);
	}
	return normalizeMoveAddress(match[1]);
}

export function isValidIdentifierChar(c: string): boolean {
	return c === '_' || /^[a-zA-Z0-9]$/.test(c);
}

export function isValidIdentifier(value: string): boolean {
	return IDENTIFIER_REGEX.test(value);
}

export function createIdentifier(value: string): string {
	if (!isValidIdentifier(value)) {
		throw new SemanticError(`invalid identifier '${value}'`);
	}
	return value;
}

export function createStructTag(parts: {
	address: string;
	module: string;
	name: string;
	typeParams?: TypeTag[];
}): StructTag {
	return {
		address: addressFromHexLiteral(parts.address),
		module: createIdentifier(parts.module),
		name: createIdentifier(parts.name),
		typeParams: parts.typeParams ?? [],
	};
}
