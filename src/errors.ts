// @typescript-eslint/indent is known to be iffy with type definitions
/* eslint-disable @typescript-eslint/indent */
import type { Primitive } from 'type-fest';

import { messages } from './messages.js';
import type { MessageCode } from './messages.js';

type Tokens<S extends string> =
	S extends `${string}{${infer Token}}${infer Rest}`
	? Token | Tokens<Rest>
	: never;

export type Replacements<MSG extends MessageCode> = Record<Tokens<typeof messages[MSG]>, Primitive>;

export class CustomError extends Error {}

/**
 * A failure the user can act on: bad input data, a bad manifest, or a bad path argument.
 * `code` identifies the kind; the message names the entry or path at fault.
 */
export class NonFatalError<MSG extends MessageCode = MessageCode> extends CustomError {
	constructor(readonly code: MSG, readonly replacements: Replacements<MSG>) {
		let message: string = messages[code];
		for (const [token, value] of Object.entries(replacements)) {
			message = message.replaceAll(`{${token}}`, String(value));
		}

		super(message);
	}
}

export function isNonFatalError<MSG extends MessageCode>(err: unknown, code: MSG): err is NonFatalError<MSG> {
	return err instanceof NonFatalError && err.code === code;
}
