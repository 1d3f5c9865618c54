import path from 'node:path';
import type { Position } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { LineIndex } from './lineIndex';
import { isObject } from './utils';

/** Half-open offset span `[start, end)` inside one source unit. */
export interface SourceRange { sourceName: string; start: number; end: number; }

type Entry = { doc: TextDocument; index?: LineIndex };

const FILE_SCHEME = /^file:/i;
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

export function isFileUri(uri: string): boolean {
	return FILE_SCHEME.test(uri);
}

function isPosition(value: unknown): value is Position {
	return isObject(value) && typeof value.line === 'number' && typeof value.character === 'number';
}

/**
 * Text of every document the client told us about, keyed by source-unit name (the
 * name the analysis engine sees). Client URIs are remembered so that diagnostics go
 * back to exactly the locator the client used.
 */
export class DocumentStore {
	private base = '/';
	private readonly units = new Map<string, Entry>();
	private readonly clientPaths = new Map<string, string>();
	private dirty = false;

	get basePath(): string {
		return this.base;
	}

	setBasePath(root: string): void {
		// relative roots are anchored at '/', never at the process's working directory
		this.base = path.posix.resolve('/', root || '/');
	}

	get isDirty(): boolean {
		return this.dirty;
	}

	markClean(): void {
		this.dirty = false;
	}

	clientPathToSourceUnitName(uri: string): string {
		if (!isFileUri(uri)) return uri;
		const filePath = URI.parse(uri).path;
		const rel = path.posix.relative(this.base, filePath);
		if (rel && !rel.startsWith('..') && !path.posix.isAbsolute(rel)) return rel;
		return filePath;
	}

	sourceUnitNameToClientPath(name: string): string {
		const known = this.clientPaths.get(name);
		if (known !== undefined) return known;
		if (ANY_SCHEME.test(name)) return name;
		return URI.file(path.posix.resolve(this.base, name)).toString();
	}

	/** Inserts or replaces a document's full text; returns its source-unit name. */
	setSourceByClientPath(uri: string, text: string, languageId = 'plaintext', version?: number): string {
		const name = this.clientPathToSourceUnitName(uri);
		const prev = this.units.get(name);
		const doc = prev
			? TextDocument.update(prev.doc, [{ text }], version ?? prev.doc.version + 1)
			: TextDocument.create(uri, languageId, version ?? 0, text);
		this.units.set(name, { doc });
		this.clientPaths.set(name, uri);
		this.dirty = true;
		return name;
	}

	has(name: string): boolean {
		return this.units.has(name);
	}

	get(name: string): TextDocument | undefined {
		return this.units.get(name)?.doc;
	}

	names(): string[] {
		return [...this.units.keys()];
	}

	sourceUnits(): Map<string, string> {
		const out = new Map<string, string>();
		for (const [name, entry] of this.units) out.set(name, entry.doc.getText());
		return out;
	}

	lineIndex(name: string): LineIndex | undefined {
		const entry = this.units.get(name);
		if (!entry) return undefined;
		entry.index ??= new LineIndex(entry.doc.getText());
		return entry.index;
	}

	positionToOffset(name: string, position: unknown): number | undefined {
		if (!isPosition(position)) return undefined;
		return this.lineIndex(name)?.positionToOffset(position);
	}

	offsetToPosition(name: string, offset: number): Position | undefined {
		return this.lineIndex(name)?.offsetToPosition(offset);
	}

	/** Resolves a protocol range against the current text; undefined if it is not a valid sub-range. */
	parseRange(name: string, range: unknown): SourceRange | undefined {
		if (!isObject(range)) return undefined;
		const start = this.positionToOffset(name, range.start);
		const end = this.positionToOffset(name, range.end);
		if (start === undefined || end === undefined || start > end) return undefined;
		return { sourceName: name, start, end };
	}
}
