// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { BcsType } from '@mysten/bcs';
import { bcs as baseBcs, fromHex, toHex } from '@mysten/bcs';

import type {
	TransactionArgument as TransactionArgumentType,
} from '../types/transaction-argument.js';
import type { TypeTag as TypeTagType } from '../types/type-tag.js';
import { parseTypeTag } from '../parser/index.js';
import { formatTypeTag } from '../types/type-tag.js';
import {
	isValidMoveAddress,
	MOVE_ADDRESS_LENGTH,
	normalizeMoveAddress,
} from '../utils/move-types.js';

export const Address = baseBcs.bytes(MOVE_ADDRESS_LENGTH).transform({
	validate: (val) => {
		const address = typeof val === 'string' ? val : toHex(val);
		if (!isValidMoveAddress(normalizeMoveAddress(address))) {
			throw new Error(`Invalid Move address ${address}`);
		}
	},
	input: (val: string | Uint8Array) =>
		typeof val === 'string' ? fromHex(normalizeMoveAddress(val)) : val,
	output: (val) => normalizeMoveAddress(toHex(val)),
});

export const StructTag = baseBcs.struct('StructTag', {
	address: Address,
	module: baseBcs.string(),
	name: baseBcs.string(),
	typeParams: baseBcs.vector(baseBcs.lazy(() => InnerTypeTag)),
});

// Variant order follows the Move core `TypeTag` enum.
const InnerTypeTag: BcsType<TypeTagType, TypeTagType> = baseBcs.enum('TypeTag', {
	bool: null,
	u8: null,
	u64: null,
	u128: null,
	address: null,
	signer: null,
	vector: baseBcs.lazy(() => InnerTypeTag),
	struct: baseBcs.lazy(() => StructTag),
}) as BcsType<TypeTagType>;

/** Accepts a parsed tag or its text; reads back the normalized text form. */
export const TypeTag = InnerTypeTag.transform({
	input: (typeTag: string | TypeTagType) =>
		typeof typeTag === 'string' ? parseTypeTag(typeTag) : typeTag,
	output: (typeTag: TypeTagType) => formatTypeTag(typeTag, { normalizeAddresses: true }),
});

export const TransactionArgument = baseBcs
	.enum('TransactionArgument', {
		u8: baseBcs.u8(),
		u64: baseBcs.u64(),
		u128: baseBcs.u128(),
		address: Address,
		u8vector: baseBcs.vector(baseBcs.u8()),
		bool: baseBcs.bool(),
	})
	.transform({
		input: (arg: TransactionArgumentType) => arg,
		output: (arg): TransactionArgumentType => {
			switch (arg.$kind) {
				case 'u8':
					return { u8: arg.u8 };
				case 'u64':
					return { u64: BigInt(arg.u64) };
				case 'u128':
					return { u128: BigInt(arg.u128) };
				case 'address':
					return { address: arg.address };
				case 'u8vector':
					return { u8vector: Uint8Array.from(arg.u8vector) };
				case 'bool':
					return { bool: arg.bool };
			}
		},
	});

export const bcs = {
	...baseBcs,
	Address,
	StructTag,
	TypeTag,
	TransactionArgument,
};
