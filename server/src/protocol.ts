import { ErrorCodes, LSPErrorCodes } from 'vscode-languageserver/node';
import { isObject } from './utils';

export type MessageId = number | string;

// Codes surfaced by the server. The numbering is the JSON-RPC / LSP one.
export const ServerErrorCodes = {
	ParseError: ErrorCodes.ParseError,
	InvalidParams: ErrorCodes.InvalidParams,
	MethodNotFound: ErrorCodes.MethodNotFound,
	InternalError: ErrorCodes.InternalError,
	RequestFailed: LSPErrorCodes.RequestFailed,
} as const;

export const Methods = {
	initialize: 'initialize',
	initialized: 'initialized',
	shutdown: 'shutdown',
	exit: 'exit',
	cancelRequest: '$/cancelRequest',
	legacyCancelRequest: 'cancelRequest',
	didOpen: 'textDocument/didOpen',
	didChange: 'textDocument/didChange',
	didClose: 'textDocument/didClose',
	didChangeConfiguration: 'workspace/didChangeConfiguration',
	publishDiagnostics: 'textDocument/publishDiagnostics',
} as const;

export function isMessageId(value: unknown): value is MessageId {
	return typeof value === 'number' || typeof value === 'string';
}

// Pull the id out of anything that came off the wire; undefined for notifications and garbage.
export function messageIdOf(message: unknown): MessageId | undefined {
	if (!isObject(message)) return undefined;
	const id = message.id;
	return isMessageId(id) ? id : undefined;
}

export function methodOf(message: unknown): string | undefined {
	if (!isObject(message)) return undefined;
	return typeof message.method === 'string' ? message.method : undefined;
}
