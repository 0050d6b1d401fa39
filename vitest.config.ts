// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['test/**/*.test.ts'],
		env: {
			MOVE_SYNTAX_LOG_LEVEL: 'silent',
		},
	},
});
