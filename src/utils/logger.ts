// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { pino } from 'pino';

export enum Level {
	fatal = 'fatal',
	error = 'error',
	warn = 'warn',
	info = 'info',
	debug = 'debug',
	trace = 'trace',
	silent = 'silent', // use this to disable logging
}

function levelFromEnv(value: string | undefined): Level {
	const level = Object.values(Level).find((candidate) => candidate === value);
	return level ?? Level.silent;
}

export const logger = pino({
	base: null,
	level: levelFromEnv(process.env.MOVE_SYNTAX_LOG_LEVEL),
	timestamp: () => `,"time":"${new Date().toISOString()}"`,
	formatters: {
		level(label) {
			return { level: label };
		},
	},
});
