// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toHex } from '@mysten/bcs';

import { toShortAddress } from '../utils/move-types.js';

/**
 * A literal value passed into a Move call.
 */
export type TransactionArgument =
	| { u8: number }
	| { u64: bigint }
	| { u128: bigint }
	| { bool: boolean }
	| { address: string }
	| { u8vector: Uint8Array };

export const MAX_U8 = 2 ** 8 - 1;
export const MAX_U64 = 2n ** 64n - 1n;
export const MAX_U128 = 2n ** 128n - 1n;

/**
 * Renders an argument in the literal syntax accepted by `parseTransactionArgument`.
 */
export function formatTransactionArgument(arg: TransactionArgument): string {
	if ('u8' in arg) {
		return `${arg.u8}u8`;
	}
	if ('u64' in arg) {
		return `${arg.u64}u64`;
	}
	if ('u128' in arg) {
		return `${arg.u128}u128`;
	}
	if ('bool' in arg) {
		return arg.bool ? 'true' : 'false';
	}
	if ('address' in arg) {
		return toShortAddress(arg.address);
	}
	return `x"${toHex(arg.u8vector)}"`;
}
