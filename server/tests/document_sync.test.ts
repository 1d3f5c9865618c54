import { describe, it, expect } from 'vitest';
import { ScriptedEngine, initializeServer, notification, openDocument, publishedDiagnostics } from './testUtils';

const URI_A = 'file:///proj/a.txt';
const URI_B = 'file:///proj/b.txt';

function change(uri: string, contentChanges: unknown, version?: number) {
	return notification('textDocument/didChange', { textDocument: { uri, version }, contentChanges });
}

function range(sl: number, sc: number, el: number, ec: number) {
	return { start: { line: sl, character: sc }, end: { line: el, character: ec } };
}

describe('textDocument/didOpen', () => {
	it('stores the text and publishes diagnostics', () => {
		const engine = new ScriptedEngine();
		const { server, transport } = initializeServer(engine);
		openDocument(server, URI_A, 'hello', 4);
		expect(server.documents.get('a.txt')?.getText()).toBe('hello');
		expect(server.documents.get('a.txt')?.version).toBe(4);
		expect(engine.calls).toEqual([new Map([['a.txt', 'hello']])]);
		expect(publishedDiagnostics(transport)).toEqual([{ uri: URI_A, diagnostics: [] }]);
	});

	it('republishes every open document, clean ones included', () => {
		const engine = new ScriptedEngine(sources => sources.has('b.txt')
			? [{ category: 'error', typeName: 'E', id: 1, location: { sourceName: 'b.txt', start: 0, end: 1 } }]
			: []);
		const { server, transport } = initializeServer(engine);
		openDocument(server, URI_A, 'a');
		transport.clear();
		openDocument(server, URI_B, 'b');
		const reports = publishedDiagnostics(transport);
		expect(reports.map(r => r.uri)).toEqual([URI_A, URI_B]);
		expect(reports[0]).toEqual({ uri: URI_A, diagnostics: [] });
		expect(reports[1]?.diagnostics).toHaveLength(1);
	});

	it('fails with RequestFailed when textDocument is missing', () => {
		const engine = new ScriptedEngine();
		const { server, transport } = initializeServer(engine);
		server.dispatch({ jsonrpc: '2.0', id: 5, method: 'textDocument/didOpen', params: {} });
		expect(transport.sent).toEqual([{ jsonrpc: '2.0', error: { code: -32803, message: 'Text document parameter missing.' }, id: 5 }]);
		expect(engine.calls).toHaveLength(0);
		expect(server.documents.names()).toEqual([]);
	});

	it('fails with RequestFailed when uri or text is not a string', () => {
		const { server, transport } = initializeServer();
		server.dispatch(notification('textDocument/didOpen', { textDocument: { uri: URI_A } }));
		expect(transport.sent).toEqual([{ jsonrpc: '2.0', error: { code: -32803, message: 'Text document needs a uri and a text.' }, id: null }]);
	});
});

describe('textDocument/didChange', () => {
	it('applies a full replacement', () => {
		const { server } = initializeServer();
		openDocument(server, URI_A, 'old text');
		server.dispatch(change(URI_A, [{ text: 'new text' }], 2));
		expect(server.documents.get('a.txt')?.getText()).toBe('new text');
		expect(server.documents.get('a.txt')?.version).toBe(2);
	});

	it('splices a ranged edit into the current text', () => {
		const { server } = initializeServer();
		openDocument(server, URI_A, 'line one\nline two\nline three');
		server.dispatch(change(URI_A, [{ range: range(1, 5, 1, 8), text: '2' }]));
		expect(server.documents.get('a.txt')?.getText()).toBe('line one\nline 2\nline three');
	});

	it('inserts at the end of a line and into an empty document', () => {
		const { server } = initializeServer();
		openDocument(server, URI_A, 'ab\ncd');
		server.dispatch(change(URI_A, [{ range: range(0, 2, 0, 2), text: ' C' }]));
		expect(server.documents.get('a.txt')?.getText()).toBe('ab C\ncd');

		openDocument(server, URI_B, '');
		server.dispatch(change(URI_B, [{ range: range(0, 0, 0, 0), text: 'filled\n' }]));
		expect(server.documents.get('b.txt')?.getText()).toBe('filled\n');
	});

	it('applies entries in order, each against the previous result', () => {
		const { server } = initializeServer();
		openDocument(server, URI_A, 'abc');
		server.dispatch(change(URI_A, [
			{ range: range(0, 3, 0, 3), text: '\ndef' },
			{ range: range(1, 0, 1, 1), text: 'D' },
			{ range: range(0, 0, 0, 1), text: '' },
		]));
		expect(server.documents.get('a.txt')?.getText()).toBe('bc\nDef');
	});

	it('treats a range spanning the whole text like a full replacement', () => {
		const text = 'first\nsecond\n';
		const ranged = initializeServer();
		openDocument(ranged.server, URI_A, text);
		ranged.server.dispatch(change(URI_A, [{ range: range(0, 0, 2, 0), text: 'replaced' }]));

		const full = initializeServer();
		openDocument(full.server, URI_A, text);
		full.server.dispatch(change(URI_A, [{ text: 'replaced' }]));

		expect(ranged.server.documents.get('a.txt')?.getText()).toBe('replaced');
		expect(full.server.documents.get('a.txt')?.getText()).toBe('replaced');
	});

	it('publishes diagnostics once for the whole batch', () => {
		const engine = new ScriptedEngine();
		const { server, transport } = initializeServer(engine);
		openDocument(server, URI_A, 'x');
		openDocument(server, URI_B, 'y');
		transport.clear();
		server.dispatch(change(URI_A, [{ text: '1' }, { text: '2' }, { text: '3' }]));
		expect(engine.calls).toHaveLength(3);
		expect(engine.calls[2]).toEqual(new Map([['a.txt', '3'], ['b.txt', 'y']]));
		expect(publishedDiagnostics(transport).map(r => r.uri)).toEqual([URI_A, URI_B]);
	});

	it('rejects a range whose end precedes its start and keeps the text', () => {
		const { server, transport } = initializeServer();
		openDocument(server, URI_A, 'hello\nworld');
		transport.clear();
		const bad = range(1, 2, 0, 1);
		server.dispatch(change(URI_A, [{ range: bad, text: 'X' }]));
		expect(server.documents.get('a.txt')?.getText()).toBe('hello\nworld');
		expect(transport.sent.at(-1)).toEqual({
			jsonrpc: '2.0',
			error: { code: -32803, message: `Invalid source range: ${JSON.stringify(bad)}` },
			id: null,
		});
	});

	it('rejects a range outside the document and keeps the text', () => {
		const { server, transport } = initializeServer();
		openDocument(server, URI_A, 'hello');
		server.dispatch(change(URI_A, [{ range: range(0, 0, 3, 0), text: 'X' }]));
		server.dispatch(change(URI_A, [{ range: range(0, 2, 0, 9), text: 'X' }]));
		expect(server.documents.get('a.txt')?.getText()).toBe('hello');
		const errors = transport.sent.filter(m => 'error' in m);
		expect(errors).toHaveLength(2);
	});

	it('keeps earlier entries when a later one fails, and still publishes before the error', () => {
		const engine = new ScriptedEngine();
		const { server, transport } = initializeServer(engine);
		openDocument(server, URI_A, 'abc');
		transport.clear();
		server.dispatch(change(URI_A, [
			{ text: 'xyz' },
			'not an object',
			{ text: 'never applied' },
		]));
		expect(server.documents.get('a.txt')?.getText()).toBe('xyz');
		expect(transport.sent.map(m => m.method ?? 'error')).toEqual(['textDocument/publishDiagnostics', 'error']);
		expect(transport.sent[1]).toEqual({ jsonrpc: '2.0', error: { code: -32803, message: 'Invalid content reference.' }, id: null });
	});

	it('reuses the last analysis when a failed batch changed nothing', () => {
		const engine = new ScriptedEngine();
		const { server } = initializeServer(engine);
		openDocument(server, URI_A, 'abc');
		server.dispatch(change(URI_A, [{ range: range(4, 0, 4, 0), text: 'X' }]));
		expect(engine.calls).toHaveLength(1);
	});

	it('fails for documents that were never opened', () => {
		const engine = new ScriptedEngine();
		const { server, transport } = initializeServer(engine);
		server.dispatch({ jsonrpc: '2.0', id: 11, method: 'textDocument/didChange', params: { textDocument: { uri: URI_B }, contentChanges: [{ text: 'x' }] } });
		expect(transport.sent).toEqual([{ jsonrpc: '2.0', error: { code: -32803, message: `Unknown file: ${URI_B}` }, id: 11 }]);
		expect(server.documents.has('b.txt')).toBe(false);
		expect(engine.calls).toHaveLength(0);
	});

	it('fails when contentChanges is missing', () => {
		const { server, transport } = initializeServer();
		openDocument(server, URI_A, 'abc');
		transport.clear();
		server.dispatch(notification('textDocument/didChange', { textDocument: { uri: URI_A } }));
		expect(transport.sent).toEqual([{ jsonrpc: '2.0', error: { code: -32803, message: 'Content changes missing.' }, id: null }]);
	});
});
