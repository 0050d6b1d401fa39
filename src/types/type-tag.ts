// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { normalizeMoveAddress, toShortAddress } from '../utils/move-types.js';

/**
 * Kind of a TypeTag which is represented by a Move type identifier.
 */
export type StructTag = {
	/** Normalized (full width) account address that published the module */
	address: string;
	module: string;
	name: string;
	typeParams: TypeTag[];
};

/**
 * Move TypeTag object. A decoupled `0x...::module::Type<???>` parameter.
 */
export type TypeTag =
	| { bool: null }
	| { u8: null }
	| { u64: null }
	| { u128: null }
	| { address: null }
	| { signer: null }
	| { vector: TypeTag }
	| { struct: StructTag };

export interface FormatTypeTagOptions {
	/** Render struct addresses at full width instead of without leading zeros */
	normalizeAddresses?: boolean;
	/** Separator between struct type parameters, `', '` by default */
	separator?: string;
}

export function isStructTypeTag(tag: TypeTag): tag is { struct: StructTag } {
	return 'struct' in tag;
}

export function isVectorTypeTag(tag: TypeTag): tag is { vector: TypeTag } {
	return 'vector' in tag;
}

/** Depth of the innermost element of a tag; primitives sit at depth 0. */
export function typeTagDepth(tag: TypeTag): number {
	if ('vector' in tag) {
		return typeTagDepth(tag.vector) + 1;
	}
	if ('struct' in tag) {
		return tag.struct.typeParams.reduce(
			(depth, param) => Math.max(depth, typeTagDepth(param) + 1),
			0,
		);
	}
	return 0;
}

export function formatTypeTag(tag: TypeTag, options: FormatTypeTagOptions = {}): string {
	if ('bool' in tag) {
		return 'bool';
	}
	if ('u8' in tag) {
		return 'u8';
	}
	if ('u64' in tag) {
		return 'u64';
	}
	if ('u128' in tag) {
		return 'u128';
	}
	if ('address' in tag) {
		return 'address';
	}
	if ('signer' in tag) {
		return 'signer';
	}
	if ('vector' in tag) {
		return `vector<${formatTypeTag(tag.vector, options)}>`;
	}
	return formatStructTag(tag.struct, options);
}

export function formatStructTag(tag: StructTag, options: FormatTypeTagOptions = {}): string {
	const address = options.normalizeAddresses
		? normalizeMoveAddress(tag.address)
		: toShortAddress(tag.address);
	const typeParams = tag.typeParams
		.map((param) => formatTypeTag(param, options))
		.join(options.separator ?? ', ');

	return `${address}::${tag.module}::${tag.name}${typeParams ? `<${typeParams}>` : ''}`;
}

/**
 * Renders a struct tag with full width addresses and no whitespace, the form used to compare
 * struct types for equality.
 */
export function normalizeStructTag(tag: StructTag): string {
	return formatStructTag(tag, { normalizeAddresses: true, separator: ',' });
}
