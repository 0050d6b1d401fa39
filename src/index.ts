// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export {
	parseTypeTag,
	parseTypeTags,
	parseStructTag,
	parseTransactionArgument,
	parseTransactionArguments,
	parseStringList,
	tokenize,
	nextToken,
	TokenStream,
	type Token,
} from './parser/index.js';

export {
	type TypeTag,
	type StructTag,
	type FormatTypeTagOptions,
	formatTypeTag,
	formatStructTag,
	normalizeStructTag,
	isStructTypeTag,
	isVectorTypeTag,
	typeTagDepth,
} from './types/type-tag.js';

export {
	type TransactionArgument,
	formatTransactionArgument,
	MAX_U8,
	MAX_U64,
	MAX_U128,
} from './types/transaction-argument.js';

export {
	MOVE_ADDRESS_LENGTH,
	addressFromHexLiteral,
	createIdentifier,
	createStructTag,
	isValidIdentifier,
	isValidIdentifierChar,
	isValidMoveAddress,
	normalizeMoveAddress,
	toShortAddress,
} from './utils/move-types.js';

export {
	MoveSyntaxError,
	LexError,
	ParseError,
	SemanticError,
	InvalidStructTagError,
	NestingLimitError,
	InvalidParserOptionsError,
} from './utils/errors.js';

export { MAX_TYPE_TAG_NESTING, ParserOptions } from './utils/options.js';

export { bcs } from './bcs/index.js';
