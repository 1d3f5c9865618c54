import type { Readable, Writable } from 'node:stream';
import { type MessageId, ServerErrorCodes } from './protocol';
import type { JsonObject } from './utils';

export class ParseError extends Error {
	readonly code = ServerErrorCodes.ParseError;
	constructor(message: string) {
		super(message);
		this.name = 'ParseError';
	}
}

export type ReceiveResult =
	| { kind: 'message'; message: unknown }
	| { kind: 'failure'; error: ParseError }
	| { kind: 'closed' };

/**
 * Bidirectional JSON-RPC channel. Inbound messages are pulled one at a time;
 * outbound ones are written immediately.
 */
export interface Transport {
	receive(): Promise<ReceiveResult>;
	send(json: JsonObject, id?: MessageId | null): void;
	notify(method: string, params: unknown): void;
	reply(id: MessageId | null, result: unknown): void;
	error(id: MessageId | null | undefined, code: number, message: string): void;
	closed(): boolean;
}

const LF = 0x0a;

function toBuffer(chunk: unknown): Buffer {
	if (Buffer.isBuffer(chunk)) return chunk;
	if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
	if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
	return Buffer.from(String(chunk), 'utf8');
}

// Pull-based byte buffer over a readable stream. Only ever pulls more input when the
// buffered bytes cannot satisfy the current read, so nothing past a frame is consumed early.
class StreamBuffer {
	// unread bytes: `head`, then the chunks not yet joined onto it; `size` counts both
	private head: Buffer = Buffer.alloc(0);
	private tail: Buffer[] = [];
	private size = 0;
	private ended = false;
	private readonly chunks: AsyncIterator<unknown>;

	constructor(input: Readable) {
		this.chunks = input[Symbol.asyncIterator]();
	}

	get exhausted(): boolean {
		return this.ended && this.size === 0;
	}

	private async fill(): Promise<boolean> {
		if (this.ended) return false;
		const next = await this.chunks.next();
		if (next.done) {
			this.ended = true;
			return false;
		}
		const bytes = toBuffer(next.value);
		this.tail.push(bytes);
		this.size += bytes.length;
		return true;
	}

	private joined(): Buffer {
		if (this.tail.length) {
			this.head = Buffer.concat([this.head, ...this.tail]);
			this.tail = [];
		}
		return this.head;
	}

	private consume(count: number): Buffer {
		const buffer = this.joined();
		this.head = buffer.subarray(count);
		this.size -= count;
		return buffer.subarray(0, count);
	}

	/** Next line without its terminator (`\n`, optionally preceded by `\r`); undefined at end of input. */
	async readLine(): Promise<string | undefined> {
		let from = 0;
		for (;;) {
			const buffer = this.joined();
			const nl = buffer.indexOf(LF, from);
			if (nl >= 0) {
				const line = this.consume(nl + 1).subarray(0, nl).toString('utf8');
				return line.endsWith('\r') ? line.slice(0, -1) : line;
			}
			from = buffer.length;
			if (!(await this.fill())) {
				if (!this.size) return undefined;
				// last line without terminator
				const rest = this.consume(this.size).toString('utf8');
				return rest.endsWith('\r') ? rest.slice(0, -1) : rest;
			}
		}
	}

	async readBytes(count: number): Promise<Buffer | undefined> {
		while (this.size < count) {
			if (!(await this.fill())) return undefined;
		}
		return this.consume(count);
	}

	discard(): void {
		this.head = Buffer.alloc(0);
		this.tail = [];
		this.size = 0;
	}
}

export interface JsonTransportOptions {
	/** Called once when the output stream fails (e.g. the client closed its end); later sends are dropped. */
	onOutputError?: (error: Error) => void;
}

type HeaderParse = { ok: true; headers: Map<string, string> } | { ok: false; reason: string } | { ok: 'eof' };

/**
 * Content-Length framed JSON over a pair of byte streams:
 *
 *     Content-Length: <n>\r\n
 *     \r\n
 *     <n bytes of UTF-8 JSON>
 */
export class JsonTransport implements Transport {
	private readonly input: StreamBuffer;
	private outputFailed = false;

	constructor(input: Readable, private readonly output: Writable, options: JsonTransportOptions = {}) {
		this.input = new StreamBuffer(input);
		const { onOutputError } = options;
		if (onOutputError) {
			output.on('error', (error: Error) => {
				if (this.outputFailed) return;
				this.outputFailed = true;
				onOutputError(error);
			});
		}
	}

	closed(): boolean {
		return this.input.exhausted;
	}

	async receive(): Promise<ReceiveResult> {
		const parsed = await this.parseHeaders();
		if (parsed.ok === 'eof') return { kind: 'closed' };
		if (!parsed.ok) return failure(parsed.reason);

		const rawLength = parsed.headers.get('content-length');
		if (rawLength === undefined) return failure('No content-length header found.');
		if (!/^\d+$/.test(rawLength)) return failure(`Invalid content-length header: ${rawLength}`);

		const body = await this.input.readBytes(Number(rawLength));
		if (!body) {
			this.input.discard();
			return failure('Unexpected end of input while reading the message body.');
		}
		try {
			return { kind: 'message', message: JSON.parse(body.toString('utf8')) };
		} catch (e) {
			return failure(`Could not parse RPC JSON payload. ${e instanceof Error ? e.message : String(e)}`);
		}
	}

	send(json: JsonObject, id?: MessageId | null): void {
		if (this.outputFailed) return;
		const message: JsonObject = { jsonrpc: '2.0', ...json };
		if (id !== undefined) message.id = id;
		const body = JSON.stringify(message);
		this.output.write(`Content-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`);
	}

	notify(method: string, params: unknown): void {
		this.send({ method, params });
	}

	reply(id: MessageId | null, result: unknown): void {
		this.send({ result }, id);
	}

	error(id: MessageId | null | undefined, code: number, message: string): void {
		this.send({ error: { code, message } }, id ?? null);
	}

	private async parseHeaders(): Promise<HeaderParse> {
		const headers = new Map<string, string>();
		let first = true;
		for (;;) {
			const line = await this.input.readLine();
			if (line === undefined) {
				return first ? { ok: 'eof' } : { ok: false, reason: 'Unexpected end of input while reading headers.' };
			}
			first = false;
			if (line.trim() === '') return { ok: true, headers };
			const colon = line.indexOf(':');
			if (colon < 0) return { ok: false, reason: `Could not parse RPC headers: ${JSON.stringify(line)}` };
			headers.set(line.slice(0, colon).toLowerCase(), line.slice(colon + 1).trim());
		}
	}
}

function failure(reason: string): ReceiveResult {
	return { kind: 'failure', error: new ParseError(reason) };
}
