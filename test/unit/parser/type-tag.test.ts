// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { afterEach, describe, it, expect, vi } from 'vitest';

import {
	formatStructTag,
	InvalidParserOptionsError,
	InvalidStructTagError,
	MAX_TYPE_TAG_NESTING,
	NestingLimitError,
	ParseError,
	parseStructTag,
	parseTypeTag,
	parseTypeTags,
	SemanticError,
} from '../../../src/index.js';
import { logger } from '../../../src/utils/logger.js';

const ADDRESS_1 = `0x${'0'.repeat(63)}1`;
const ADDRESS_2 = `0x${'0'.repeat(63)}2`;

function nestedVectors(depth: number, inner = 'u64') {
	return `${'vector<'.repeat(depth)}${inner}${'>'.repeat(depth)}`;
}

describe('parseTypeTag', () => {
	it('parses primitive types', () => {
		expect(parseTypeTag('u8')).toEqual({ u8: null });
		expect(parseTypeTag('u64')).toEqual({ u64: null });
		expect(parseTypeTag('u128')).toEqual({ u128: null });
		expect(parseTypeTag('bool')).toEqual({ bool: null });
		expect(parseTypeTag('address')).toEqual({ address: null });
		expect(parseTypeTag('signer')).toEqual({ signer: null });
	});

	it('ignores surrounding whitespace', () => {
		expect(parseTypeTag('  vector < u8 >\n')).toEqual({ vector: { u8: null } });
	});

	it('parses nested vectors', () => {
		expect(parseTypeTag('vector<vector<u64>>')).toEqual({ vector: { vector: { u64: null } } });
	});

	it('parses struct types with normalized addresses', () => {
		expect(parseTypeTag('0x2::coin::Coin<0x1::pool::LP<u8, bool>>')).toEqual({
			struct: {
				address: ADDRESS_2,
				module: 'coin',
				name: 'Coin',
				typeParams: [
					{
						struct: {
							address: ADDRESS_1,
							module: 'pool',
							name: 'LP',
							typeParams: [{ u8: null }, { bool: null }],
						},
					},
				],
			},
		});
	});

	it('accepts a trailing comma in type parameters', () => {
		expect(parseTypeTag('0x1::M::S<u8, bool,>')).toEqual(parseTypeTag('0x1::M::S<u8, bool>'));
	});

	it('accepts an empty type parameter list', () => {
		expect(parseTypeTag('0x1::M::S<>')).toEqual(parseTypeTag('0x1::M::S'));
	});

	it.each([
		'u64',
		'bool',
		'vector<u8>',
		'vector<vector<u64>>',
		'signer',
		'0x1::M::S',
		'0x2::M::S_',
		'0x3::M_::S',
		'0x4::M_::S_',
		'0x00000000004::M::S',
		'0X1::M::S<u64>',
		'0x1::M::S<0x2::P::Q>',
		'vector<0x1::M::S>',
		'vector<vector<0x1::M_::S_>>',
		'0x1::M::S<vector<u8>>',
	])('parses %s', (input) => {
		expect(() => parseTypeTag(input)).not.toThrow();
	});

	it('reports unexpected tokens', () => {
		expect(() => parseTypeTag('vector2')).toThrow(
			new ParseError('unexpected token Name("vector2"), expected type tag'),
		);
		expect(() => parseTypeTag('')).toThrow('unexpected token EOF, expected type tag');
		expect(() => parseTypeTag('vector<u8')).toThrow('expected token Gt, got EOF');
		expect(() => parseTypeTag('vector u8')).toThrow('expected token Lt, got U8Type');
		expect(() => parseTypeTag('0x1::M')).toThrow('expected token ColonColon, got EOF');
		expect(() => parseTypeTag('0x1::u8::S')).toThrow('expected name, got U8Type');
		expect(() => parseTypeTag('0x1::M::S<u8 u64>')).toThrow('expected token Comma, got U64Type');
	});

	it('rejects trailing input', () => {
		expect(() => parseTypeTag('u8 u64')).toThrow('expected token EOF, got U64Type');
		expect(() => parseTypeTag('u8,')).toThrow('expected token EOF, got Comma');
	});

	it('rejects addresses wider than 32 bytes', () => {
		expect(() => parseTypeTag(`0x1${'0'.repeat(64)}::M::S`)).toThrow(SemanticError);
	});

	describe('nesting limit', () => {
		it('accepts tags whose innermost element sits just below the limit', () => {
			expect(MAX_TYPE_TAG_NESTING).toBe(13);
			expect(() => parseTypeTag(nestedVectors(12))).not.toThrow();
		});

		it('rejects one level more', () => {
			let error: unknown;
			try {
				parseTypeTag(nestedVectors(13));
			} catch (e) {
				error = e;
			}
			expect(error).toBeInstanceOf(NestingLimitError);
			expect(error).toMatchObject({
				message: 'Exceeded TypeTag nesting limit during parsing: 13',
				depth: 13,
				limit: 13,
			});
		});

		it('counts struct type parameters as a level', () => {
			expect(() =>
				parseTypeTag(`0x1::M::S<${nestedVectors(11, '0x1::M::T<u8>')}>`),
			).toThrow(NestingLimitError);
			expect(() => parseTypeTag(`0x1::M::S<${nestedVectors(11, '0x1::M::T')}>`)).not.toThrow();
		});

		it('fails cleanly on very deep input', () => {
			expect(() => parseTypeTag(nestedVectors(10_000))).toThrow(NestingLimitError);
		});

		it('takes the limit from the options', () => {
			expect(parseTypeTag('vector<u8>', { maxTypeTagNesting: 2 })).toEqual({
				vector: { u8: null },
			});
			expect(() => parseTypeTag('vector<vector<u8>>', { maxTypeTagNesting: 2 })).toThrow(
				NestingLimitError,
			);
			expect(() => parseTypeTag(nestedVectors(20), { maxTypeTagNesting: 21 })).not.toThrow();
		});

		it('rejects invalid options', () => {
			expect(() => parseTypeTag('u8', { maxTypeTagNesting: 0 })).toThrow(
				InvalidParserOptionsError,
			);
			expect(() => parseTypeTag('u8', { maxTypeTagNesting: 2.5 })).toThrow(
				InvalidParserOptionsError,
			);
		});
	});
});

describe('parseTypeTags', () => {
	it('parses a comma separated list with an optional trailing comma', () => {
		expect(parseTypeTags('u8, vector<bool>,')).toEqual([{ u8: null }, { vector: { bool: null } }]);
		expect(parseTypeTags('u8, vector<bool>')).toEqual([{ u8: null }, { vector: { bool: null } }]);
	});

	it('parses an empty list', () => {
		expect(parseTypeTags('')).toEqual([]);
		expect(parseTypeTags('   ')).toEqual([]);
	});

	it('rejects a lone comma', () => {
		expect(() => parseTypeTags(',')).toThrow('unexpected token Comma, expected type tag');
	});

	it('applies the nesting limit to every element', () => {
		expect(() => parseTypeTags(`u8, ${nestedVectors(13)}`)).toThrow(NestingLimitError);
	});
});

describe('parseStructTag', () => {
	it.each([
		'0x1::coin::Coin',
		'0x1::coin_type::Coin',
		'0x1::coin_::Coin',
		'0x1::X_123::X32_',
		'0x1::coin::Coin_Type',
		'0x1::coin::Coin<0x1::gem::GEM>',
		'0x1::coin::Coin<u8>',
		'0x1::coin::Coin<u64>',
		'0x1::coin::Coin<u128>',
		'0x1::coin::Coin<bool>',
		'0x1::coin::Coin<address>',
		'0x1::coin::Coin<signer>',
		'0x1::coin::Coin<vector<0x1::gem::GEM>>',
		'0x1::coin::Coin<u8,bool>',
		'0x1::coin::Coin<u8,   bool>',
		'0x1::coin::Coin<u8  ,bool>',
		'0x1::coin::Coin<u8 , bool  ,    vector<u8>,address,signer>',
		'0x1::coin::Coin<vector<0x1::coin::Wrap<0x1::gem::GEM>>>',
		'0x1::coin::Coin<0x1::coin::Wrap<vector<0x1::gem::GEM>, 0x1::coin::Coin<vector<0x1::coin::Wrap<0x1::gem::GEM>>>>>',
		'0x1::coin::Coin<vector<vector<vector<vector<vector<0x1::gem::GEM<vector<vector<vector<0x1::gem::GEM<vector<u64>>>>>>>>>>>>',
		'0xabc::coin::Coin',
	])('round trips %s', (input) => {
		expect(formatStructTag(parseStructTag(input)).replace(/ /g, '')).toBe(input.replace(/ /g, ''));
	});

	it('rejects non-struct type tags with the input', () => {
		expect(() => parseStructTag('vector<u8>')).toThrow(
			new InvalidStructTagError('vector<u8>'),
		);
		expect(() => parseStructTag('u8')).toThrow('invalid struct tag: u8');
	});

	it('wraps parse failures and keeps the cause', () => {
		const input = nestedVectors(
			4,
			'0x1::coin::Coin<vector<0x1::gem::GEM<vector<vector<vector<0x1::gem::GEM<vector<vector<u64>>>>>>>>>',
		);
		let error: unknown;
		try {
			parseStructTag(input);
		} catch (e) {
			error = e;
		}
		expect(error).toBeInstanceOf(InvalidStructTagError);
		expect(error).toBeInstanceOf(SemanticError);
		expect(error).toMatchObject({
			input,
			message: `invalid struct tag: ${input}, Exceeded TypeTag nesting limit during parsing: 13`,
		});
		expect(error instanceof InvalidStructTagError && error.cause).toBeInstanceOf(NestingLimitError);
	});

	describe('rejection logging', () => {
		afterEach(() => {
			vi.restoreAllMocks();
		});

		it('logs non-struct type tags before throwing', () => {
			const debug = vi.spyOn(logger, 'debug');
			expect(() => parseStructTag('u8')).toThrow(InvalidStructTagError);
			expect(debug).toHaveBeenCalledTimes(1);
			expect(debug).toHaveBeenCalledWith(
				expect.objectContaining({ input: 'u8', kind: 'InvalidStructTagError' }),
				'rejected input',
			);
		});

		it('logs parse failures once', () => {
			const debug = vi.spyOn(logger, 'debug');
			expect(() => parseStructTag('0x1::coin::')).toThrow(InvalidStructTagError);
			expect(debug).toHaveBeenCalledTimes(1);
			expect(debug).toHaveBeenCalledWith(
				expect.objectContaining({ input: '0x1::coin::', kind: 'ParseError' }),
				'rejected input',
			);
		});
	});

	it('wraps lexical failures', () => {
		expect(() => parseStructTag('0x1::coin::Coin<$>')).toThrow(
			'invalid struct tag: 0x1::coin::Coin<$>, unrecognized token at offset 16',
		);
	});
});
