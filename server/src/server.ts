import { ResponseError, TextDocumentSyncKind, type InitializeResult } from 'vscode-languageserver/node';
import { URI } from 'vscode-uri';
import { version as SERVER_VERSION } from '../../package.json';
import type { AnalysisEngine, AnalysisError } from './analysisTypes';
import { buildDiagnosticReports } from './diagnostics';
import { filterErrors } from './diagSettings';
import { DocumentStore, isFileUri } from './documents';
import { Logger } from './logger';
import { type MessageId, Methods, ServerErrorCodes, messageIdOf, methodOf } from './protocol';
import { type ServerSettings, defaultSettings, resolveSettings } from './settings';
import type { Transport } from './transport';
import { errorMessage, isObject } from './utils';

export const SERVER_NAME = 'bracket-lsp';

export type ServerState = 'uninitialized' | 'running' | 'shutdownRequested' | 'exited';

/** Receives the message id (absent for notifications) and the raw `params`. */
export type Handler = (id: MessageId | undefined, params: unknown) => void;

export interface LanguageServerOptions {
	logger?: Logger;
}

type Outcome = { ok: true } | { ok: false; error: unknown };

// last engine run, reused while neither documents nor settings changed
type AnalysisCache = { settings: ServerSettings; errors: AnalysisError[] };

function requestFailed(message: string): ResponseError<void> {
	return new ResponseError(ServerErrorCodes.RequestFailed, message);
}

function invoke(handler: Handler, id: MessageId | undefined, params: unknown): Outcome {
	try {
		handler(id, params);
		return { ok: true };
	} catch (error) {
		return { ok: false, error };
	}
}

/**
 * Single-threaded language server: pulls one message at a time from the transport,
 * runs its handler to completion (analysis included) and only then reads the next.
 */
export class LanguageServer {
	readonly documents = new DocumentStore();
	private readonly handlers: ReadonlyMap<string, Handler>;
	private readonly logger: Logger;
	private config: unknown = {};
	private settings: ServerSettings = defaultSettings();
	private state: ServerState = 'uninitialized';
	private shutdownRequested = false;
	private cache: AnalysisCache | null = null;

	constructor(private readonly client: Transport, private readonly engine: AnalysisEngine, options: LanguageServerOptions = {}) {
		this.logger = options.logger ?? new Logger();
		// nothing to cancel: analysis runs synchronously inside the handler
		const ignore: Handler = () => {};
		this.handlers = new Map<string, Handler>([
			[Methods.cancelRequest, ignore],
			[Methods.legacyCancelRequest, ignore],
			[Methods.exit, () => this.handleExit()],
			[Methods.initialize, (id, params) => this.handleInitialize(id, params)],
			[Methods.initialized, ignore],
			[Methods.shutdown, id => this.handleShutdown(id)],
			[Methods.didChange, (_id, params) => this.handleTextDocumentDidChange(params)],
			[Methods.didClose, ignore],
			[Methods.didOpen, (_id, params) => this.handleTextDocumentDidOpen(params)],
			[Methods.didChangeConfiguration, (_id, params) => this.handleWorkspaceDidChangeConfiguration(params)],
		]);
	}

	get lifecycle(): ServerState {
		return this.state;
	}

	/** The configuration object exactly as the client sent it. */
	get configuration(): unknown {
		return this.config;
	}

	get currentSettings(): ServerSettings {
		return this.settings;
	}

	/** Serves until `exit` or end of input; resolves whether `shutdown` was requested first. */
	async run(): Promise<boolean> {
		while (this.state !== 'exited' && !this.client.closed()) {
			const received = await this.client.receive();
			if (received.kind === 'closed') break;
			if (received.kind === 'failure') {
				this.logger.warn(`dropping unreadable message: ${received.error.message}`);
				this.client.error(null, ServerErrorCodes.ParseError, received.error.message);
				continue;
			}
			this.dispatch(received.message);
		}
		this.logger.info(this.shutdownRequested ? 'stopped after shutdown' : 'input closed without shutdown');
		return this.shutdownRequested;
	}

	dispatch(message: unknown): void {
		const id = messageIdOf(message);
		const method = methodOf(message);
		const handler = method === undefined ? undefined : this.handlers.get(method);
		if (!handler) {
			this.client.error(id, ServerErrorCodes.MethodNotFound, `Unknown method ${method ?? '<none>'}`);
			return;
		}
		this.logger.debug(`<- ${method}${id === undefined ? '' : ` #${id}`}`);
		const outcome = invoke(handler, id, isObject(message) ? message.params : undefined);
		if (outcome.ok) return;

		const error = outcome.error;
		if (error instanceof ResponseError) {
			this.logger.warn(`${method} failed: ${error.message}`);
			this.client.error(id, error.code, error.message);
			return;
		}
		this.logger.error(`unhandled exception in ${method}: ${error instanceof Error && error.stack ? error.stack : String(error)}`);
		this.client.error(null, ServerErrorCodes.InternalError, `Unhandled exception: ${errorMessage(error)}`);
	}

	compileAndUpdateDiagnostics(): void {
		const cached = this.cache;
		let errors: AnalysisError[];
		if (cached && !this.documents.isDirty && cached.settings === this.settings) {
			this.logger.debug('sources unchanged, reusing previous analysis');
			errors = cached.errors;
		} else {
			errors = this.engine.analyze(this.documents.sourceUnits(), this.settings);
			this.cache = { settings: this.settings, errors };
			this.documents.markClean();
		}

		const reports = buildDiagnosticReports(filterErrors(errors, this.settings.disabledCodes), this.documents, SERVER_NAME);
		for (const report of reports) this.client.notify(Methods.publishDiagnostics, report);
		this.logger.debug(`published diagnostics for ${reports.length} document(s)`);
	}

	private changeConfiguration(raw: unknown): void {
		this.config = raw;
		const { settings, problems } = resolveSettings(raw);
		this.settings = settings;
		this.logger.configure(settings);
		for (const p of problems) this.logger.warn(`invalid settings, using defaults: ${p}`);
	}

	private handleInitialize(id: MessageId | undefined, args: unknown): void {
		const params = isObject(args) ? args : {};
		// the directory the process was started from must not matter
		let rootPath = '/';
		const rootUri = params.rootUri;
		if (rootUri !== undefined && rootUri !== null) {
			if (typeof rootUri !== 'string' || !isFileUri(rootUri)) {
				throw new ResponseError(ServerErrorCodes.InvalidParams, 'rootUri only supports file URI scheme.');
			}
			rootPath = URI.parse(rootUri).path || '/';
		} else if (typeof params.rootPath === 'string' && params.rootPath) {
			rootPath = params.rootPath;
		}

		this.documents.setBasePath(rootPath);
		if (isObject(params.initializationOptions)) this.changeConfiguration(params.initializationOptions);
		this.state = 'running';
		this.logger.info(`initialized with root ${this.documents.basePath}`);

		const result: InitializeResult = {
			serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
			capabilities: {
				textDocumentSync: { openClose: true, change: TextDocumentSyncKind.Incremental },
			},
		};
		this.client.reply(id ?? null, result);
	}

	private handleShutdown(id: MessageId | undefined): void {
		this.shutdownRequested = true;
		this.state = 'shutdownRequested';
		this.cache = null;
		this.logger.info('shutdown requested');
		if (id !== undefined) this.client.reply(id, null);
	}

	private handleExit(): void {
		this.state = 'exited';
		this.logger.info('exit');
	}

	private handleWorkspaceDidChangeConfiguration(args: unknown): void {
		if (!isObject(args) || !isObject(args.settings)) return;
		this.changeConfiguration(args.settings);
		// settings feed the engine and the filter, so open documents are re-published
		if (this.documents.names().length) this.compileAndUpdateDiagnostics();
	}

	private handleTextDocumentDidOpen(args: unknown): void {
		const doc = isObject(args) ? args.textDocument : undefined;
		if (!isObject(doc)) throw requestFailed('Text document parameter missing.');
		if (typeof doc.uri !== 'string' || typeof doc.text !== 'string') throw requestFailed('Text document needs a uri and a text.');
		this.documents.setSourceByClientPath(
			doc.uri,
			doc.text,
			typeof doc.languageId === 'string' ? doc.languageId : undefined,
			typeof doc.version === 'number' ? doc.version : undefined,
		);
		this.compileAndUpdateDiagnostics();
	}

	private handleTextDocumentDidChange(args: unknown): void {
		const params = isObject(args) ? args : {};
		const textDocument = params.textDocument;
		if (!isObject(textDocument) || typeof textDocument.uri !== 'string') throw requestFailed('Text document parameter missing.');
		const uri = textDocument.uri;
		const name = this.documents.clientPathToSourceUnitName(uri);
		if (!this.documents.has(name)) throw requestFailed(`Unknown file: ${uri}`);
		if (!Array.isArray(params.contentChanges)) throw requestFailed('Content changes missing.');
		const version = typeof textDocument.version === 'number' ? textDocument.version : undefined;

		// Entries apply left to right; on the first bad one the rest are skipped, the
		// ones before it stay applied.
		let failure: ResponseError<void> | undefined;
		for (const change of params.contentChanges) {
			failure = this.applyContentChange(uri, name, change, version);
			if (failure) break;
		}
		this.compileAndUpdateDiagnostics();
		if (failure) throw failure;
	}

	private applyContentChange(uri: string, name: string, change: unknown, version: number | undefined): ResponseError<void> | undefined {
		if (!isObject(change) || typeof change.text !== 'string') return requestFailed('Invalid content reference.');
		let text = change.text;
		// no range means a full content update
		if (change.range !== undefined && change.range !== null) {
			const span = this.documents.parseRange(name, change.range);
			if (!span) return requestFailed(`Invalid source range: ${JSON.stringify(change.range)}`);
			const buffer = this.documents.get(name)?.getText() ?? '';
			text = buffer.slice(0, span.start) + text + buffer.slice(span.end);
		}
		this.documents.setSourceByClientPath(uri, text, undefined, version);
		return undefined;
	}
}
